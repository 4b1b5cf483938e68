import { randomUUID } from "node:crypto";
import type { PonderConfig } from "../config/types.js";
import { DreamModule } from "../dream/module.js";
import type { DreamEntry, DreamSynthesizer } from "../dream/types.js";
import { DriveSystem } from "../drives/system.js";
import type { Intent } from "../drives/types.js";
import { ExperienceEngine, inferOutcome } from "../experience/engine.js";
import type { Outcome } from "../experience/types.js";
import { GoalTracker } from "../goals/tracker.js";
import type { Logger } from "../logging/logger.js";
import { LongTermMemory } from "../memory/long-term.js";
import { ShortTermMemory } from "../memory/short-term.js";
import { normalizeTags, toPlainItem, type MemoryItem } from "../memory/types.js";
import { WordAssociations } from "../nlp/associations.js";
import type { SentimentAnalyzer } from "../nlp/types.js";
import type { Responder } from "../responder/types.js";
import {
  applyOutcome,
  applyValueConflict,
  describeSelfState,
  initialSelfState,
  recoverEnergy,
  shiftTowardValence,
  updateSelfState,
} from "../self-state/state.js";
import type { DriveSignal, SelfState } from "../self-state/types.js";
import { TraitEngine } from "../traits/engine.js";
import { clampSigned, clampUnit } from "../utils/math.js";
import { mathRandom, type RandomSource } from "../utils/random.js";
import { SerialQueue } from "../utils/serial-queue.js";
import { withTimeout } from "../utils/timeout.js";
import { ValueSystem } from "../values/system.js";
import type { FilterResult, ValueJudgment, ValuePrinciple } from "../values/types.js";
import { CognitionBus } from "./bus.js";
import { parseCommand, type Command } from "./commands.js";
import { parseEngineState } from "./state.js";
import { internalThought } from "./thoughts.js";
import type {
  ContextPayload,
  DreamRunResult,
  EngineSnapshot,
  EngineState,
  IdleTickOptions,
  IdleTickResult,
  TurnOptions,
  TurnResult,
} from "./types.js";

const MAX_DREAM_LOG = 50;
const VIOLATION_IMPORTANCE_BONUS = 0.2;
const FRICTION_NOTICE = "I've noticed that doesn't work anymore.";

export interface CognitiveEngineDeps {
  readonly config: PonderConfig;
  readonly logger: Logger;
  readonly analyzer: SentimentAnalyzer;
  readonly responder: Responder;
  readonly random?: RandomSource;
  readonly clock?: () => number;
  readonly ids?: () => string;
  readonly synthesizer?: DreamSynthesizer;
  /** Replaces the keyword principles built from config. */
  readonly principles?: readonly ValuePrinciple[];
}

interface CommandOutcome {
  readonly reply: string;
  /** Engine narratives are not candidate responses and skip the value filter. */
  readonly filtered: boolean;
}

/**
 * Orchestrates one agent's cognition. Every entry point runs through a
 * single serial queue, so turns, idle ticks, dreams and snapshots never
 * interleave. A turn or tick that throws is rolled back to the state it
 * started from.
 */
export class CognitiveEngine {
  readonly bus = new CognitionBus();

  private readonly config: PonderConfig;
  private readonly logger: Logger;
  private readonly analyzer: SentimentAnalyzer;
  private readonly responder: Responder;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly ids: () => string;
  private readonly queue = new SerialQueue();

  private readonly ltm: LongTermMemory;
  private readonly stm: ShortTermMemory;
  private readonly drives: DriveSystem;
  private readonly traits: TraitEngine;
  private readonly values: ValueSystem;
  private readonly experience: ExperienceEngine;
  private readonly goals: GoalTracker;
  private readonly dreamer: DreamModule;
  private readonly associations: WordAssociations;

  private selfState: SelfState;
  private seenTags = new Set<string>();
  private dreams: DreamEntry[] = [];
  /** Value violations seen since the last drive tick. */
  private pendingViolations = 0;
  private turns = 0;
  private ticks = 0;
  private lastTurnAt: number | null = null;

  constructor(deps: CognitiveEngineDeps) {
    const { config, logger } = deps;
    this.config = config;
    this.logger = logger;
    this.analyzer = deps.analyzer;
    this.responder = deps.responder;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? Date.now;
    this.ids = deps.ids ?? randomUUID;

    this.ltm = new LongTermMemory(config.memory, logger.child({ component: "ltm" }));
    this.stm = new ShortTermMemory({
      capacity: config.memory.stmCapacity,
      promotionThreshold: config.memory.promotionThreshold,
      sink: this.ltm,
      logger: logger.child({ component: "stm" }),
    });
    this.drives = new DriveSystem(config.drives, logger.child({ component: "drives" }));
    this.traits = new TraitEngine(config.traits, logger.child({ component: "traits" }));
    this.values = new ValueSystem(config.values, logger.child({ component: "values" }), deps.principles);
    this.experience = new ExperienceEngine({
      logger: logger.child({ component: "experience" }),
      clock: this.clock,
      ids: this.ids,
    });
    this.goals = new GoalTracker({
      config: config.goals,
      logger: logger.child({ component: "goals" }),
      clock: this.clock,
      ids: this.ids,
    });
    this.dreamer = new DreamModule({
      config: config.dream,
      promotionThreshold: config.memory.promotionThreshold,
      random: this.random,
      logger: logger.child({ component: "dream" }),
      clock: this.clock,
      ids: this.ids,
      synthesizer: deps.synthesizer,
    });
    this.associations = new WordAssociations(config.associations, logger.child({ component: "associations" }));
    this.selfState = initialSelfState(config.selfState);
  }

  handleTurn(text: string, opts: TurnOptions = {}): Promise<TurnResult> {
    return this.queue.run(() => this.atomically("turn", (now) => this.runTurn(text, now, opts.signal), opts.now));
  }

  idleTick(opts: IdleTickOptions = {}): Promise<IdleTickResult> {
    return this.queue.run(() => this.atomically("idle tick", (now) => this.runIdleTick(now, opts), opts.now));
  }

  /** Forced dream cycle, ignoring the energy and idle conditions. */
  dream(opts: { now?: number } = {}): Promise<DreamRunResult> {
    return this.queue.run(() => this.atomically("dream", (now) => this.runDream(now), opts.now));
  }

  /** Cancels an in-flight dream before it integrates. */
  abortDream(): boolean {
    return this.dreamer.abort();
  }

  reflect(): Promise<string> {
    return this.queue.run(() => this.reflection());
  }

  snapshot(): Promise<EngineSnapshot> {
    return this.queue.run(() => this.takeSnapshot());
  }

  /** LTM entries matching any tag, as plain items. */
  query(tags: readonly string[], limit = this.config.memory.recallLimit): Promise<MemoryItem[]> {
    return this.queue.run(() => this.ltm.query(tags, limit).map(toPlainItem));
  }

  recentDreams(limit = 10): Promise<DreamEntry[]> {
    return this.queue.run(() => this.dreams.slice(-limit).reverse());
  }

  exportState(): Promise<EngineState> {
    return this.queue.run(() => this.captureState());
  }

  /** Replaces all state. Accepts untrusted input, e.g. a vault row. */
  importState(raw: unknown): Promise<void> {
    return this.queue.run(() => {
      const state = parseEngineState(raw);
      this.restoreState(state);
      this.logger.info({ turns: state.turns, ltm: state.ltm.entries.length }, "Engine state restored");
    });
  }

  /** Resolves once every queued operation has settled. */
  idle(): Promise<void> {
    return this.queue.drain();
  }

  // ── Turn protocol ──

  private async runTurn(text: string, now: number, signal?: AbortSignal): Promise<TurnResult> {
    const interactionId = this.ids();
    const analysis = await this.analyzer.analyze(text);
    const sentiment = clampSigned(analysis.sentiment);
    const tags = normalizeTags(analysis.tags);
    const novelTags = tags.filter((t) => !this.seenTags.has(t));
    for (const tag of tags) this.seenTags.add(tag);

    // (1) user input enters STM
    const userItem: MemoryItem = {
      id: this.ids(),
      timestamp: now,
      speaker: "user",
      text,
      tags,
      importance: clampUnit(this.config.memory.baseImportance + Math.abs(sentiment) * 0.5),
      valence: sentiment,
      ...(this.config.memory.defaultTtlMs !== undefined ? { ttlMs: this.config.memory.defaultTtlMs } : {}),
    };
    const promoted = [...this.stm.append(userItem).promoted];

    // (2) words learn the current mood, then sentiment feeds self-state
    this.associations.observe(tags, this.selfState.mood, now);
    this.selfState = updateSelfState(this.selfState, sentiment, this.dominantSignal(), this.config.selfState);

    // (3) drives
    this.drives.tick({
      idle: false,
      novelTags: novelTags.length,
      sentiment,
      valueViolations: this.pendingViolations,
    });
    this.pendingViolations = 0;

    // (4) value flags on the input
    const inputJudgment = this.values.evaluate(text, { speaker: "user", mood: this.selfState.mood, tags });
    if (!inputJudgment.aligned) {
      this.stm.retag(
        userItem.id,
        inputJudgment.violated.map((name) => `value:${name}`),
        clampUnit(userItem.importance + VIOLATION_IMPORTANCE_BONUS),
      );
      this.selfState = applyValueConflict(this.selfState, this.config.selfState);
      this.pendingViolations = inputJudgment.violated.length;
    }

    // (5) goal progress, then context and the responder or a command
    const command = parseCommand(text);
    if (command?.kind !== "add_goal") {
      for (const goal of this.goals.progress(text)) this.bus.emit({ type: "goal", goal });
    }
    let reply: string;
    let filterAction: FilterResult["action"] | null = null;
    let responderFailed = false;
    let hint: Outcome | undefined;

    if (command) {
      const result = await this.runCommand(command, userItem.id, now);
      reply = result.reply;
      if (result.filtered) {
        const filtered = this.filter(reply, tags);
        reply = filtered.text;
        filterAction = filtered.action;
      }
    } else {
      const payload = this.buildPayload(text, tags, inputJudgment);
      try {
        const response = await withTimeout(
          (sig) => this.responder.generate(payload, sig),
          this.config.responder.timeoutMs,
          "responder",
          signal,
        );
        reply = response.text;
        hint = response.outcomeHint;
      } catch (err) {
        this.logger.warn({ err, interactionId }, "Responder failed, using fallback reply");
        responderFailed = true;
        reply = this.config.responder.fallbackText;
      }

      // (6) value filter on the way out
      if (!responderFailed) {
        const filtered = this.filter(reply, tags);
        reply = filtered.text;
        filterAction = filtered.action;
      }
    }

    promoted.push(
      ...this.stm.append({
        id: this.ids(),
        timestamp: now,
        speaker: "agent",
        text: reply,
        tags,
        importance: this.config.memory.baseImportance,
      }).promoted,
    );

    // (7) experience
    const outcome = inferOutcome({
      responderFailed,
      hint,
      filterAction: filterAction ?? undefined,
      sentiment,
    });
    const record = this.experience.record(
      interactionId,
      outcome,
      `${command ? command.kind : (filterAction ?? "fallback")}: ${reply.slice(0, 80)}`,
      tags,
    );
    this.selfState = applyOutcome(this.selfState, outcome, this.config.selfState);

    // (8) traits, trend, then reconcile what reached LTM
    this.traits.applyExperience(record);
    this.traits.applyTrend(this.experience.recentTrend(this.config.experience.trendWindow), this.config.experience);
    if (promoted.length > 0) this.ltm.reconcile(promoted.map((p) => p.id));

    this.turns++;
    this.lastTurnAt = now;

    const result: TurnResult = {
      interactionId,
      reply,
      outcome,
      command: command?.kind ?? null,
      filter: filterAction,
      selfState: this.selfState,
      intents: this.drives.intents(),
      record,
    };
    this.logger.debug({ interactionId, outcome, mood: this.selfState.mood }, "Turn complete");
    this.bus.emit({ type: "turn", result });
    return result;
  }

  private async runCommand(command: Command, inputId: string, now: number): Promise<CommandOutcome> {
    switch (command.kind) {
      case "reflect":
        return { reply: this.reflection(), filtered: false };
      case "dream": {
        const result = await this.runDream(now);
        const reply = result.entry
          ? result.entry.text
          : result.status === "aborted"
            ? "The dream slipped away before I could hold on to it."
            : "I tried to dream, but there isn't enough to dream about yet.";
        return { reply, filtered: false };
      }
      case "add_goal": {
        const goal = this.goals.add(command.text, "requested");
        this.bus.emit({ type: "goal", goal });
        return { reply: `I've added a new goal: ${goal.description}`, filtered: false };
      }
      case "recall":
        return { reply: await this.recall(command.topic, inputId), filtered: true };
    }
  }

  private async recall(topic: string, excludeId: string): Promise<string> {
    const analysis = await this.analyzer.analyze(topic);
    const topicTags = normalizeTags([topic, ...topic.split(/\s+/), ...analysis.tags]);
    const needle = topic.toLowerCase();
    const limit = this.config.memory.recallLimit;

    const found = new Map<string, MemoryItem>();
    for (const entry of this.ltm.query(topicTags, limit)) found.set(entry.id, entry);
    const fromStm = this.stm.find(
      (item) =>
        item.id !== excludeId &&
        item.speaker === "user" &&
        (item.text.toLowerCase().includes(needle) || item.tags.some((t) => topicTags.includes(t))),
    );
    for (const item of fromStm.reverse()) {
      if (found.size >= limit) break;
      if (!found.has(item.id)) found.set(item.id, item);
    }

    if (found.size === 0) return `I don't know anything about ${topic} yet.`;
    const lines = [...found.values()].slice(0, limit).map((item) => `- ${item.text}`);
    return [`Here's what I remember about ${topic}:`, ...lines].join("\n");
  }

  private reflection(): string {
    const lines = [
      describeSelfState(this.selfState),
      this.traits.describeIdentity(),
      this.values.expressBeliefs().join(" "),
      this.goals.summary(),
    ];
    const trend = this.experience.recentTrend(this.config.experience.trendWindow);
    if (trend.window > 0 && trend.frequencies.friction >= this.config.experience.frictionAlertThreshold) {
      lines.push(FRICTION_NOTICE);
    }
    return lines.join("\n");
  }

  private filter(candidate: string, tags: readonly string[]): FilterResult {
    return this.values.filterOrReshape(candidate, { speaker: "agent", mood: this.selfState.mood, tags });
  }

  private buildPayload(input: string, tags: readonly string[], judgment: ValueJudgment): ContextPayload {
    const lastDream = this.dreams[this.dreams.length - 1];
    return {
      input,
      recent: this.stm.snapshot().map(toPlainItem),
      recalled: this.ltm.query(tags, this.config.memory.recallLimit).map(toPlainItem),
      selfState: { ...this.selfState },
      dominantDrive: this.dominantSignal(),
      drives: this.drives.levels(),
      intents: this.drives.intents(),
      valueFlags: { aligned: judgment.aligned, violated: [...judgment.violated], note: judgment.note },
      traits: this.traits.topTraits(3).map((t) => ({ name: t.name, weight: t.weight })),
      goals: this.goals.active().map((g) => g.description),
      associations: this.associations.associationsFor(tags),
      lastDream: lastDream ? { theme: lastDream.theme, text: lastDream.text } : null,
    };
  }

  // ── Idle protocol ──

  private async runIdleTick(now: number, opts: IdleTickOptions): Promise<IdleTickResult> {
    const tick = ++this.ticks;
    this.selfState = recoverEnergy(this.selfState, this.config.selfState);
    const expired = this.stm.expire(now).promoted;

    const intents: Intent[] = this.drives.tick({ idle: true, valueViolations: this.pendingViolations });
    this.pendingViolations = 0;

    let dream: DreamEntry | null = null;
    const idleMs = this.lastTurnAt === null ? Number.POSITIVE_INFINITY : now - this.lastTurnAt;
    const shouldDream = this.dreamer.shouldDream({
      forced: false,
      intentRaised: intents.includes("dream"),
      energy: this.selfState.energy,
      idleMs,
    });
    if (shouldDream) dream = (await this.runDream(now)).entry;

    let decayed = false;
    if (opts.forceDecay || tick % this.config.idle.decayEveryTicks === 0) {
      const decay = this.ltm.decayPass(now);
      const { merged } = this.ltm.reconcile();
      this.bus.emit({ type: "decay", decayed: decay.decayed, retired: decay.retired, merged: merged.length });
      decayed = true;
    } else if (expired.length > 0) {
      this.ltm.reconcile(expired.map((e) => e.id));
    }

    let thought: string | null = null;
    if (this.drives.hasIntent("reflect")) {
      const latestUser = this.stm.find((i) => i.speaker === "user").pop();
      thought = internalThought(this.selfState, this.dominantSignal(), this.random, latestUser?.text);
      this.logger.info({ thought }, "Internal thought");
      this.bus.emit({ type: "thought", text: thought });
    }

    return { tick, intents: this.drives.intents(), dream, decayed, thought };
  }

  /**
   * Runs one dream cycle. Integration happens in a single synchronous
   * step after the module hands back its candidate.
   */
  private async runDream(now: number): Promise<DreamRunResult> {
    const dominant = this.drives.dominant();
    const focus = normalizeTags([...(dominant ? [dominant.name] : []), ...this.goals.keywords()]);
    const outcome = await this.dreamer.dream(this.ltm.liveEntries(), focus);

    if (outcome.status === "skipped") return { status: "skipped", entry: null };
    if (outcome.status === "aborted") {
      this.bus.emit({ type: "dream:aborted", reason: "aborted before integration" });
      return { status: "aborted", entry: null };
    }

    const { entry } = outcome;
    try {
      this.ltm.promote(entry, now);
      this.selfState = shiftTowardValence(this.selfState, entry.valence);
      const kind: Outcome = entry.valence >= 0.15 ? "joy" : entry.valence <= -0.15 ? "friction" : "neutral";
      const record = this.experience.record(entry.id, kind, `dream: ${entry.theme}`, ["dream"]);
      this.traits.applyExperience(record);
      this.drives.tick({ idle: true, dreamed: true });
      this.dreams.push(entry);
      if (this.dreams.length > MAX_DREAM_LOG) this.dreams.shift();
    } finally {
      this.dreamer.complete();
    }

    this.logger.info({ dreamId: entry.id, theme: entry.theme, sources: entry.provenance }, "Dream integrated");
    this.bus.emit({ type: "dream", entry });
    return { status: "integrated", entry };
  }

  // ── State ──

  private async atomically<T>(label: string, fn: (now: number) => Promise<T>, at?: number): Promise<T> {
    const checkpoint = this.captureState();
    try {
      return await fn(at ?? this.clock());
    } catch (err) {
      this.restoreState(checkpoint);
      this.logger.error({ err }, `${label} failed, state rolled back`);
      throw err;
    }
  }

  private dominantSignal(): DriveSignal | null {
    const dominant = this.drives.dominant();
    return dominant ? { name: dominant.name, level: dominant.level } : null;
  }

  private takeSnapshot(): EngineSnapshot {
    const lastDream = this.dreams[this.dreams.length - 1] ?? null;
    return Object.freeze({
      takenAt: this.clock(),
      stm: Object.freeze(this.stm.snapshot().map(toPlainItem)),
      ltmSize: this.ltm.liveEntries().length,
      selfState: this.selfState,
      dominantDrive: this.dominantSignal(),
      drives: Object.freeze(this.drives.levels()),
      intents: Object.freeze(this.drives.intents()),
      topTraits: Object.freeze(this.traits.topTraits(3)),
      goals: Object.freeze(this.goals.active()),
      recentViolations: Object.freeze(this.values.recentViolations()),
      lastDream,
      dreamPhase: this.dreamer.phase,
      turns: this.turns,
    });
  }

  private captureState(): EngineState {
    return {
      version: 1,
      stm: this.stm.exportState(),
      ltm: this.ltm.exportState(),
      selfState: this.selfState,
      drives: this.drives.exportState(),
      traits: this.traits.exportState(),
      values: this.values.exportState(),
      experience: this.experience.exportState(),
      goals: this.goals.exportState(),
      associations: this.associations.exportState(),
      dreams: [...this.dreams],
      seenTags: [...this.seenTags],
      pendingViolations: this.pendingViolations,
      turns: this.turns,
      ticks: this.ticks,
      lastTurnAt: this.lastTurnAt,
    };
  }

  private restoreState(state: EngineState): void {
    this.stm.importState(state.stm);
    this.ltm.importState(state.ltm);
    this.selfState = Object.freeze({ ...state.selfState });
    this.drives.importState(state.drives);
    this.traits.importState(state.traits);
    this.values.importState(state.values);
    this.experience.importState(state.experience);
    this.goals.importState(state.goals);
    this.associations.importState(state.associations);
    this.dreams = state.dreams.map((d) => Object.freeze({ ...d }));
    this.seenTags = new Set(state.seenTags);
    this.pendingViolations = state.pendingViolations;
    this.turns = state.turns;
    this.ticks = state.ticks;
    this.lastTurnAt = state.lastTurnAt;
  }
}
