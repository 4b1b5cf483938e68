import type { SelfStateConfig } from "../config/types.js";
import type { Outcome } from "../experience/types.js";
import { clampSigned, clampUnit } from "../utils/math.js";
import { moodForValence, nextMood } from "./mood.js";
import type { DriveSignal, SelfState } from "./types.js";

export function initialSelfState(config: SelfStateConfig): SelfState {
  return Object.freeze({
    mood: config.initialMood,
    valence: 0,
    energy: clampUnit(config.initialEnergy),
    confidence: clampUnit(config.initialConfidence),
  });
}

/**
 * Per-turn transition. Pure: the same (state, sentiment, drive) always
 * yields the same state.
 */
export function updateSelfState(
  state: SelfState,
  sentiment: number,
  dominant: DriveSignal | null,
  config: SelfStateConfig,
): SelfState {
  const s = clampSigned(sentiment);
  return Object.freeze({
    mood: nextMood(state.mood, s, dominant, config.driveMoodThreshold),
    valence: clampSigned((state.valence + s) / 2),
    energy: clampUnit(state.energy - config.turnEnergyCost),
    confidence: state.confidence,
  });
}

export function applyOutcome(state: SelfState, outcome: Outcome, config: SelfStateConfig): SelfState {
  let delta = 0;
  if (outcome === "success" || outcome === "joy") delta = config.confidenceGain;
  else if (outcome === "failure" || outcome === "friction") delta = -config.confidenceLoss;
  if (delta === 0) return state;
  return Object.freeze({ ...state, confidence: clampUnit(state.confidence + delta) });
}

export function applyValueConflict(state: SelfState, config: SelfStateConfig): SelfState {
  return Object.freeze({
    ...state,
    confidence: clampUnit(state.confidence - config.valueConflictLoss),
  });
}

export function recoverEnergy(state: SelfState, config: SelfStateConfig): SelfState {
  return Object.freeze({ ...state, energy: clampUnit(state.energy + config.idleEnergyRecovery) });
}

/** Dream integration: valence moves halfway to the dream's, mood follows. */
export function shiftTowardValence(state: SelfState, valence: number): SelfState {
  const next = clampSigned((state.valence + clampSigned(valence)) / 2);
  return Object.freeze({ ...state, valence: next, mood: moodForValence(next) });
}

const percent = (value: number): string => `${Math.round(value * 100)}%`;

export function describeSelfState(state: SelfState): string {
  return `I'm feeling ${state.mood}, with energy at ${percent(state.energy)} and confidence at ${percent(state.confidence)}.`;
}
