import type { JournalSession } from "../services/journalSession";
import { errMessage } from "../domain/errors";
import { logger } from "../lib/logger";
import type { Terminal } from "./terminal";

/**
 * Last stop for anything the menus did not handle: save what we can, tell the
 * user, and return the process exit code.
 */
export function handleFatalError(err: unknown, session: JournalSession | null, terminal: Terminal): number {
  logger.fatal({ err }, "[cli] unexpected error");
  const saved = session?.trySave() ?? false;

  terminal.write(`An unexpected error occurred: ${errMessage(err)}`);
  terminal.write(
    saved
      ? `Your journal was saved to ${session?.storePath}. Please restart the app.`
      : "Your latest changes could not be saved."
  );
  return 1;
}
