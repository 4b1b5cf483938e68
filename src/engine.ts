export { CognitiveEngine, type CognitiveEngineDeps } from "./cognition/engine.js";
export { CognitionBus } from "./cognition/bus.js";
export { parseCommand, type Command } from "./cognition/commands.js";
export { renderContext } from "./cognition/context.js";
export { engineStateSchema, parseEngineState } from "./cognition/state.js";
export type * from "./cognition/types.js";

export { loadConfig, parseConfigText } from "./config/loader.js";
export { parseConfig, ponderConfigSchema } from "./config/schema.js";
export type * from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";

export { ShortTermMemory } from "./memory/short-term.js";
export { LongTermMemory } from "./memory/long-term.js";
export { textSimilarity } from "./memory/similarity.js";
export type * from "./memory/types.js";
export * from "./self-state/state.js";
export { nextMood, sentimentBand } from "./self-state/mood.js";
export type * from "./self-state/types.js";
export { DriveSystem, DEFAULT_TARGETS } from "./drives/system.js";
export type * from "./drives/types.js";
export { TraitEngine } from "./traits/engine.js";
export type * from "./traits/types.js";
export { ValueSystem } from "./values/system.js";
export { keywordPrinciple } from "./values/principles.js";
export type * from "./values/types.js";
export { ExperienceEngine, inferOutcome } from "./experience/engine.js";
export type * from "./experience/types.js";
export { DreamModule, sampleEntries } from "./dream/module.js";
export { DREAM_THEMES, templateNarrative } from "./dream/synthesis.js";
export type * from "./dream/types.js";
export { GoalTracker } from "./goals/tracker.js";
export type * from "./goals/types.js";
export { LexiconAnalyzer, loadLexicon } from "./nlp/lexicon.js";
export { WordAssociations, prevailingMood } from "./nlp/associations.js";
export type * from "./nlp/types.js";
export { RuleResponder } from "./responder/rules.js";
export { TracingResponder } from "./responder/tracing.js";
export type * from "./responder/types.js";
export { seededRandom, sequenceRandom, type RandomSource } from "./utils/random.js";

export { IdleScheduler } from "./scheduler/idle.js";
export { SnapshotServer, type SnapshotReader } from "./gateway/snapshot-server.js";
export { startPonder, type PonderContext, type StartOptions } from "./gateway/lifecycle.js";
export { VaultDB } from "./vault/db.js";
export { StateVault } from "./vault/store.js";
