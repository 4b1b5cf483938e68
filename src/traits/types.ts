export interface Trait {
  readonly name: string;
  readonly weight: number;
  readonly min: number;
  readonly max: number;
}

export interface TraitChange {
  readonly name: string;
  readonly from: number;
  readonly to: number;
}

export interface TraitState {
  readonly traits: readonly Trait[];
  readonly processed: readonly string[];
}
