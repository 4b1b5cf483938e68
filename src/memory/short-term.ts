import type { Logger } from "../logging/logger.js";
import {
  freezeItem,
  normalizeTags,
  type AppendResult,
  type MemoryItem,
  type PromotionSink,
  type ShortTermState,
} from "./types.js";

export interface ShortTermMemoryOptions {
  readonly capacity: number;
  readonly promotionThreshold: number;
  readonly sink: PromotionSink;
  readonly logger?: Logger;
}

/**
 * Bounded FIFO of recent exchanges. Insertion order is recency order;
 * the head is evicted on overflow and promoted when important enough.
 */
export class ShortTermMemory {
  private items: MemoryItem[] = [];
  private readonly capacity: number;
  private readonly promotionThreshold: number;
  private readonly sink: PromotionSink;
  private readonly logger?: Logger;

  constructor(opts: ShortTermMemoryOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new Error(`STM capacity must be a positive integer (got ${opts.capacity})`);
    }
    this.capacity = opts.capacity;
    this.promotionThreshold = opts.promotionThreshold;
    this.sink = opts.sink;
    this.logger = opts.logger;
  }

  append(item: MemoryItem): AppendResult {
    this.items.push(freezeItem({ ...item, tags: normalizeTags(item.tags) }));

    const evicted: MemoryItem[] = [];
    while (this.items.length > this.capacity) {
      const head = this.items.shift();
      if (head) evicted.push(head);
    }
    return { evicted, promoted: this.route(evicted) };
  }

  /** Drops items whose ttl has elapsed, routing them like evictions. */
  expire(now: number): AppendResult {
    const expired: MemoryItem[] = [];
    this.items = this.items.filter((item) => {
      const alive = item.ttlMs === undefined || now - item.timestamp <= item.ttlMs;
      if (!alive) expired.push(item);
      return alive;
    });
    if (expired.length > 0) {
      this.logger?.debug({ count: expired.length }, "STM items expired");
    }
    return { evicted: expired, promoted: this.route(expired) };
  }

  /** Replaces the item with a copy carrying the extra tags. */
  retag(id: string, tags: readonly string[], importance?: number): MemoryItem | undefined {
    const index = this.items.findIndex((item) => item.id === id);
    const current = this.items[index];
    if (!current) return undefined;

    const next = freezeItem({
      ...current,
      tags: normalizeTags([...current.tags, ...tags]),
      importance: importance ?? current.importance,
    });
    this.items[index] = next;
    return next;
  }

  /** Ordered view, most recent last. */
  snapshot(): readonly MemoryItem[] {
    return Object.freeze([...this.items]);
  }

  find(predicate: (item: MemoryItem) => boolean): MemoryItem[] {
    return this.items.filter(predicate);
  }

  latest(): MemoryItem | undefined {
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }

  exportState(): ShortTermState {
    return { items: [...this.items] };
  }

  importState(state: ShortTermState): void {
    this.items = state.items
      .slice(-this.capacity)
      .map((item) => freezeItem(item));
  }

  private route(evicted: readonly MemoryItem[]): MemoryItem[] {
    const promoted: MemoryItem[] = [];
    for (const item of evicted) {
      if (item.importance >= this.promotionThreshold) {
        this.sink.promote(item);
        promoted.push(item);
      }
    }
    if (evicted.length > 0) {
      this.logger?.debug(
        { evicted: evicted.length, promoted: promoted.length },
        "STM eviction",
      );
    }
    return promoted;
  }
}
