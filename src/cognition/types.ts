import type { DreamEntry, DreamPhase } from "../dream/types.js";
import type { DriveState, Intent } from "../drives/types.js";
import type { ExperienceRecord, ExperienceState, Outcome } from "../experience/types.js";
import type { Goal, GoalState } from "../goals/types.js";
import type { LongTermState, MemoryItem, ShortTermState } from "../memory/types.js";
import type { AssociationState, WordAssociation } from "../nlp/types.js";
import type { DriveSignal, SelfState } from "../self-state/types.js";
import type { Trait, TraitState } from "../traits/types.js";
import type { FilterResult, ValueState, ValueViolation } from "../values/types.js";

/** Everything a responder sees for one turn. Plain, serialisable data. */
export interface ContextPayload {
  readonly input: string;
  readonly recent: readonly MemoryItem[];
  readonly recalled: readonly MemoryItem[];
  readonly selfState: SelfState;
  readonly dominantDrive: DriveSignal | null;
  readonly drives: Readonly<Record<string, number>>;
  readonly intents: readonly Intent[];
  readonly valueFlags: {
    readonly aligned: boolean;
    readonly violated: readonly string[];
    readonly note: string;
  };
  readonly traits: readonly { readonly name: string; readonly weight: number }[];
  readonly goals: readonly string[];
  /** Moods previously heard alongside words in the input. */
  readonly associations: readonly WordAssociation[];
  readonly lastDream: { readonly theme: string; readonly text: string } | null;
}

export type CommandKind = "reflect" | "dream" | "add_goal" | "recall";

export interface TurnResult {
  readonly interactionId: string;
  readonly reply: string;
  readonly outcome: Outcome;
  readonly command: CommandKind | null;
  readonly filter: FilterResult["action"] | null;
  readonly selfState: SelfState;
  readonly intents: readonly Intent[];
  readonly record: ExperienceRecord;
}

export interface TurnOptions {
  readonly now?: number;
  readonly signal?: AbortSignal;
}

export interface IdleTickOptions {
  readonly now?: number;
  readonly forceDecay?: boolean;
}

export interface IdleTickResult {
  readonly tick: number;
  readonly intents: readonly Intent[];
  readonly dream: DreamEntry | null;
  readonly decayed: boolean;
  readonly thought: string | null;
}

export interface DreamRunResult {
  readonly status: "integrated" | "skipped" | "aborted";
  readonly entry: DreamEntry | null;
}

/** Read-only view served by the snapshot API. */
export interface EngineSnapshot {
  readonly takenAt: number;
  readonly stm: readonly MemoryItem[];
  readonly ltmSize: number;
  readonly selfState: SelfState;
  readonly dominantDrive: DriveSignal | null;
  readonly drives: Readonly<Record<string, number>>;
  readonly intents: readonly Intent[];
  readonly topTraits: readonly Trait[];
  readonly goals: readonly Goal[];
  readonly recentViolations: readonly ValueViolation[];
  readonly lastDream: DreamEntry | null;
  readonly dreamPhase: DreamPhase;
  readonly turns: number;
}

/** Full serialisable engine state, used for checkpoints and the vault. */
export interface EngineState {
  readonly version: 1;
  readonly stm: ShortTermState;
  readonly ltm: LongTermState;
  readonly selfState: SelfState;
  readonly drives: DriveState;
  readonly traits: TraitState;
  readonly values: ValueState;
  readonly experience: ExperienceState;
  readonly goals: GoalState;
  readonly associations: AssociationState;
  readonly dreams: readonly DreamEntry[];
  readonly seenTags: readonly string[];
  readonly pendingViolations: number;
  readonly turns: number;
  readonly ticks: number;
  readonly lastTurnAt: number | null;
}

export type CognitionEvent =
  | { readonly type: "turn"; readonly result: TurnResult }
  | { readonly type: "dream"; readonly entry: DreamEntry }
  | { readonly type: "dream:aborted"; readonly reason: string }
  | { readonly type: "decay"; readonly decayed: number; readonly retired: readonly string[]; readonly merged: number }
  | { readonly type: "thought"; readonly text: string }
  | { readonly type: "goal"; readonly goal: Goal };
