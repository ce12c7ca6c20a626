import type { TrendPolicy } from "../domain/types";
import type { FoodLookup } from "../services/openFoodFactsClient";
import type { JournalSession } from "../services/journalSession";
import type { StreakPolicy } from "../services/streakService";
import type { JournalDocumentStore } from "../db/documentStore";
import type { Prompter, Terminal } from "./terminal";

export interface CliSettings {
  trendPolicy: TrendPolicy;
  streakPolicy: StreakPolicy;
  defaultFastHours: number;
}

/**
 * Everything a flow needs. `viewDate` is the date the dashboard shows and the
 * date new entries land on.
 */
export interface CliContext {
  session: JournalSession;
  store: JournalDocumentStore;
  prompter: Prompter;
  terminal: Terminal;
  foodLookup: FoodLookup;
  settings: CliSettings;
  viewDate: string;
  // shown once on the next dashboard render
  notify(message: string): void;
}
