// src/cli/main.ts
// Wires configuration, storage, the food lookup and the terminal together.

import { getEnv, trendPolicyOverrides } from "../env";
import { JournalDocumentStore } from "../db/documentStore";
import { logger } from "../lib/logger";
import { createFoodLookup } from "../services/openFoodFactsClient";
import { JournalSession } from "../services/journalSession";
import { resolveTrendPolicy } from "../services/trendService";
import { JournalCli, openJournal } from "./app";
import type { CliSettings } from "./context";
import { handleFatalError } from "./errorHandler";
import { EndOfInputError, ReadlinePrompter, StdoutTerminal } from "./terminal";

export async function main(): Promise<number> {
  const env = getEnv();
  const settings: CliSettings = {
    trendPolicy: resolveTrendPolicy(trendPolicyOverrides(env)),
    streakPolicy: { calorieToleranceKcal: env.STREAK_CALORIE_TOLERANCE },
    defaultFastHours: env.DEFAULT_FAST_HOURS,
  };

  const terminal = new StdoutTerminal();
  const prompter = new ReadlinePrompter();
  const store = new JournalDocumentStore(env.JOURNAL_DATA_FILE);
  let session: JournalSession | null = null;

  const interrupt = () => {
    const saved = session?.trySave() ?? true;
    terminal.write(saved ? "\nJournal saved. Goodbye!" : "\nCould not save the journal.");
    logger.info("[cli] interrupted");
    process.exit(saved ? 0 : 1);
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  logger.info({ file: store.path }, "[cli] starting");
  try {
    const doc = await openJournal(store, prompter, terminal, settings);
    if (!doc) return 1;

    session = new JournalSession(store, doc);
    session.refreshStreaks(settings.streakPolicy);

    const cli = new JournalCli({ session, store, prompter, terminal, foodLookup: createFoodLookup(env), settings });
    await cli.run();
    terminal.write("Journal saved. Goodbye!");
    return 0;
  } catch (err) {
    if (err instanceof EndOfInputError) {
      const saved = session?.trySave() ?? true;
      terminal.write(saved ? "" : "Could not save the journal.");
      return saved ? 0 : 1;
    }
    return handleFatalError(err, session, terminal);
  } finally {
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
    prompter.close();
  }
}
