// src/db/documentStore.ts
// Whole-document persistence for the journal. Writes go to a temp file that is
// fsynced and renamed over the target, so a crash leaves either the old or the
// new document on disk, never half of one.

import * as fs from "fs";
import * as path from "path";
import type { JournalDocument } from "../domain/types";
import { DocumentWriteError, errMessage } from "../domain/errors";
import { logger } from "../lib/logger";
import { backupStamp } from "../utils/date";
import { migrateDocument } from "./migrate";

export type LoadResult =
  | { status: "loaded"; document: JournalDocument; fromVersion: number; applied: string[] }
  | { status: "missing" }
  | { status: "corrupt"; reason: string; preservedAs: string | null };

export class JournalDocumentStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * Reads and migrates the document. An unreadable or invalid file is copied
   * aside (`<file>.corrupt-<stamp>`) before reporting it, so starting over
   * never destroys what was there.
   */
  load(now: Date = new Date()): LoadResult {
    if (!this.exists()) return { status: "missing" };

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      return this.corrupt(`could not read ${this.filePath}: ${errMessage(err)}`, now);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      return this.corrupt(`invalid JSON: ${errMessage(err)}`, now);
    }

    try {
      const { document, fromVersion, applied, repairs } = migrateDocument(raw);
      if (applied.length) {
        logger.info({ file: this.filePath, fromVersion, applied }, "[store] migrated journal document");
      }
      if (repairs.length) {
        logger.warn({ file: this.filePath, repairs }, "[store] repaired legacy values");
      }
      return { status: "loaded", document, fromVersion, applied };
    } catch (err) {
      return this.corrupt(`document failed validation: ${errMessage(err)}`, now);
    }
  }

  save(document: JournalDocument): void {
    const dir = path.dirname(path.resolve(this.filePath));
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    const body = JSON.stringify(document, null, 2);

    try {
      fs.mkdirSync(dir, { recursive: true });
      const fd = fs.openSync(tmp, "w");
      try {
        fs.writeSync(fd, body);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      this.removeTemp(tmp);
      logger.error({ err, file: this.filePath }, "[store] save failed");
      throw new DocumentWriteError(`Could not save journal: ${errMessage(err)}`, this.filePath);
    }
  }

  /**
   * Copies the saved document to `<name>_backup_<stamp>.json` next to it and
   * returns the backup path.
   */
  exportBackup(now: Date = new Date()): string {
    const parsed = path.parse(this.filePath);
    const target = path.join(parsed.dir, `${parsed.name}_backup_${backupStamp(now)}${parsed.ext || ".json"}`);
    try {
      fs.copyFileSync(this.filePath, target, fs.constants.COPYFILE_EXCL);
    } catch (err) {
      throw new DocumentWriteError(`Could not create backup: ${errMessage(err)}`, target);
    }
    logger.info({ backup: target }, "[store] backup written");
    return target;
  }

  private corrupt(reason: string, now: Date): LoadResult {
    const preservedAs = `${this.filePath}.corrupt-${backupStamp(now)}`;
    try {
      fs.copyFileSync(this.filePath, preservedAs);
      logger.warn({ file: this.filePath, preservedAs, reason }, "[store] corrupt journal preserved");
      return { status: "corrupt", reason, preservedAs };
    } catch (err) {
      logger.error({ err, file: this.filePath, reason }, "[store] could not preserve corrupt journal");
      return { status: "corrupt", reason, preservedAs: null };
    }
  }

  private removeTemp(tmp: string): void {
    try {
      if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
    } catch (err) {
      logger.warn({ err, tmp }, "[store] could not remove temp file");
    }
  }
}
