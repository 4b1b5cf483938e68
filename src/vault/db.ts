import Database from "better-sqlite3";
import { getVaultPath } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS engine_state (
  key         TEXT PRIMARY KEY,
  value       TEXT NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS experiences (
  id              TEXT PRIMARY KEY,
  interaction_id  TEXT NOT NULL,
  outcome         TEXT NOT NULL CHECK(outcome IN ('success','failure','friction','joy','neutral')),
  evidence        TEXT NOT NULL,
  tags            TEXT NOT NULL DEFAULT '[]',
  timestamp       INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_experiences_timestamp ON experiences(timestamp);

CREATE TABLE IF NOT EXISTS dreams (
  id          TEXT PRIMARY KEY,
  theme       TEXT NOT NULL,
  text        TEXT NOT NULL,
  valence     REAL NOT NULL,
  importance  REAL NOT NULL,
  tags        TEXT NOT NULL DEFAULT '[]',
  provenance  TEXT NOT NULL DEFAULT '[]',
  timestamp   INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_dreams_timestamp ON dreams(timestamp);
`;

export class VaultDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(getVaultPath(stateDir));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
