/**
 * Grindboard — src/db/db.ts
 * WHAT: SQLite connection lifecycle: open with PRAGMAs, one shared handle opened by initDb, explicit close.
 * FLOWS:
 *  - initDb() at startup → openDb(env.DB_PATH) → ensureSchema → shared handle
 *  - closeDb() on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { ensureSchema } from "./ensure.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;

let shared: Db | null = null;

/**
 * Open a database and bring its schema up to date. ":memory:" gives a
 * private in-process database (tests).
 */
export function openDb(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist: false });
  if (dbPath !== ":memory:") {
    // WAL lets the leaderboard read while a reaction write is in flight
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
  ensureSchema(db);
  return db;
}

/** Throws when the file cannot be opened; the entrypoint treats that as fatal. */
export function initDb(dbPath: string = env.DB_PATH): Db {
  if (shared) return shared;
  shared = openDb(dbPath);
  logger.info({ evt: "db_open", dbPath }, "[db] SQLite opened");
  return shared;
}

export function closeDb(): void {
  if (!shared) return;
  try {
    shared.close();
    logger.info({ evt: "db_close" }, "[db] Database closed");
  } catch (err) {
    logger.error({ evt: "db_close_fail", err }, "[db] Error closing database");
  } finally {
    shared = null;
  }
}
