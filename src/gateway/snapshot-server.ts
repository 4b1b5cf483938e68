import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { EngineSnapshot } from "../cognition/types.js";
import type { DreamEntry } from "../dream/types.js";
import type { MemoryItem } from "../memory/types.js";

/** Read-only view of the engine. Never a mutation path. */
export interface SnapshotReader {
  snapshot(): Promise<EngineSnapshot>;
  query(tags: readonly string[], limit?: number): Promise<MemoryItem[]>;
  recentDreams(limit?: number): Promise<DreamEntry[]>;
}

const MAX_LIMIT = 100;

function parseLimit(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) return fallback;
  return Math.min(value, MAX_LIMIT);
}

export class SnapshotServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly reader: SnapshotReader,
    private readonly port: number,
    private readonly hostname: string,
    private readonly version: string,
  ) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const mem = process.memoryUsage();
      return c.json({
        status: "ok",
        version: this.version,
        uptime: Date.now() - this.startedAt,
        uptimeHuman: formatUptime(Date.now() - this.startedAt),
        system: {
          memoryMB: {
            rss: Math.round(mem.rss / 1024 / 1024),
            heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
          },
          nodeVersion: process.version,
          pid: process.pid,
        },
      });
    });

    this.app.get("/snapshot", async (c) => c.json(await this.reader.snapshot()));

    this.app.get("/memories", async (c) => {
      const tags = (c.req.query("tags") ?? "")
        .split(",")
        .map((t) => t.trim())
        .filter((t) => t.length > 0);
      if (tags.length === 0) {
        return c.json({ error: "tags query parameter is required" }, 400);
      }
      const limit = parseLimit(c.req.query("limit"), 5);
      return c.json({ tags, memories: await this.reader.query(tags, limit) });
    });

    this.app.get("/dreams", async (c) => {
      const limit = parseLimit(c.req.query("limit"), 10);
      return c.json({ dreams: await this.reader.recentDreams(limit) });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
