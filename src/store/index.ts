/**
 * Grindboard — src/store/index.ts
 * WHAT: Bundles every store over one database handle.
 * USAGE:
 *  const stores = createStores(initDb());
 *  stores.transaction(() => { ... });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { UserStore } from "./userStore.js";
import { PointsHistoryStore } from "./pointsHistoryStore.js";
import { SubmissionStore } from "./submissionStore.js";
import { ValuePostStore } from "./valuePostStore.js";
import { DailyActivityStore } from "./dailyActivityStore.js";

export interface Stores {
  users: UserStore;
  history: PointsHistoryStore;
  submissions: SubmissionStore;
  valuePosts: ValuePostStore;
  activity: DailyActivityStore;
  /** Runs fn inside a SQLite transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T;
}

export function createStores(db: Database.Database): Stores {
  return {
    users: new UserStore(db),
    history: new PointsHistoryStore(db),
    submissions: new SubmissionStore(db),
    valuePosts: new ValuePostStore(db),
    activity: new DailyActivityStore(db),
    transaction: <T>(fn: () => T): T => db.transaction(fn)(),
  };
}

export type { UserRow } from "./userStore.js";
export type { PointsHistoryRow, PointsReference } from "./pointsHistoryStore.js";
export type { SubmissionRow, NewSubmission, SubmissionCounts } from "./submissionStore.js";
export type { ValuePostRow, ReactionCounts } from "./valuePostStore.js";
export type { DailyActivityRow } from "./dailyActivityStore.js";
