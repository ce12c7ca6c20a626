// src/services/journalSession.ts
// Owns the in-memory document for the running process. Every mutation goes
// through `mutate`, which saves the whole document before returning.

import type { JournalDocument } from "../domain/types";
import type { JournalDocumentStore } from "../db/documentStore";
import { logger } from "../lib/logger";
import { todayDateOnly } from "../utils/date";
import { goalProfileOf } from "./profileService";
import { DEFAULT_STREAK_POLICY, StreakPolicy, evaluateStreaks, streaksEqual } from "./streakService";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export class JournalSession {
  constructor(
    private readonly store: JournalDocumentStore,
    private doc: JournalDocument,
    private readonly clock: Clock = systemClock
  ) {}

  get document(): JournalDocument {
    return this.doc;
  }

  get storePath(): string {
    return this.store.path;
  }

  now(): Date {
    return this.clock();
  }

  today(): string {
    return todayDateOnly(this.clock());
  }

  commit(reason: string): void {
    this.store.save(this.doc);
    logger.debug({ reason }, "[session] saved");
  }

  /**
   * Applies `change` to the document and saves it. A change that throws
   * leaves nothing saved.
   */
  mutate<T>(reason: string, change: (doc: JournalDocument) => T): T {
    const result = change(this.doc);
    this.commit(reason);
    return result;
  }

  replaceDocument(next: JournalDocument, reason: string): void {
    this.doc = next;
    this.commit(reason);
  }

  /**
   * Start-of-session streak evaluation. Saves only when the state moved.
   */
  refreshStreaks(policy: StreakPolicy = DEFAULT_STREAK_POLICY): boolean {
    const next = evaluateStreaks(this.doc.streaks, this.doc.dailyLogs, goalProfileOf(this.doc), this.today(), policy);
    if (streaksEqual(next, this.doc.streaks)) return false;

    this.doc.streaks = next;
    this.commit("streaks");
    logger.info({ streaks: next }, "[streaks] evaluated");
    return true;
  }

  /**
   * Last-chance save on the crash path. Never throws.
   */
  trySave(): boolean {
    try {
      this.store.save(this.doc);
      return true;
    } catch (err) {
      logger.error({ err }, "[session] emergency save failed");
      return false;
    }
  }
}
