// src/cli/app.ts
// Dashboard loop and menu dispatch.

import type { JournalDocument } from "../domain/types";
import { DocumentWriteError, InvalidEntryError, JournalError } from "../domain/errors";
import type { JournalDocumentStore } from "../db/documentStore";
import { createEmptyDocument } from "../db/migrate";
import { logger } from "../lib/logger";
import type { FoodLookup } from "../services/openFoodFactsClient";
import type { JournalSession } from "../services/journalSession";
import { shiftDateOnly } from "../utils/date";
import {
  DashboardAction,
  MORE_MENU,
  MoreAction,
  assertNever,
  parseDashboardKey,
  parseMoreKey,
} from "./actions";
import type { CliContext, CliSettings } from "./context";
import { logFoodFlow } from "./flows/food";
import {
  customFoodFlow,
  editProfileFlow,
  exportFlow,
  mealPlannerFlow,
  progressPhotosFlow,
  reportFlow,
  weightHistoryFlow,
} from "./flows/more";
import { runFirstSetup } from "./flows/profile";
import { fastingFlow, logWaterFlow, logWeightFlow, logWorkoutFlow, notesFlow } from "./flows/tracking";
import { TooManyInvalidAnswersError } from "./prompt";
import { renderDashboard } from "./render";
import type { Prompter, Terminal } from "./terminal";

export interface CliDeps {
  session: JournalSession;
  store: JournalDocumentStore;
  prompter: Prompter;
  terminal: Terminal;
  foodLookup: FoodLookup;
  settings: CliSettings;
}

/**
 * Loads the journal, or runs first-time setup when there is none. A corrupt
 * file that could not be copied aside is left alone and null is returned.
 */
export async function openJournal(
  store: JournalDocumentStore,
  prompter: Prompter,
  terminal: Terminal,
  settings: Pick<CliSettings, "defaultFastHours">,
  now: Date = new Date()
): Promise<JournalDocument | null> {
  const result = store.load(now);

  switch (result.status) {
    case "loaded":
      return result.document;
    case "corrupt":
      if (result.preservedAs === null) {
        terminal.write(`Your journal at ${store.path} could not be read (${result.reason}).`);
        terminal.write("It could not be backed up either, so it was left untouched. Fix or move it and try again.");
        return null;
      }
      terminal.write(`Your journal could not be read (${result.reason}).`);
      terminal.write(`A copy was kept at ${result.preservedAs}. Starting a new journal.`);
      break;
    case "missing":
      break;
  }

  const doc = await runFirstSetup(prompter, terminal, createEmptyDocument(), settings.defaultFastHours);
  store.save(doc);
  logger.info({ file: store.path }, "[cli] new journal created");
  return doc;
}

type Step = "continue" | "quit";

export class JournalCli {
  private viewDate: string;
  private notices: string[] = [];

  constructor(private readonly deps: CliDeps) {
    this.viewDate = deps.session.today();
  }

  get currentDate(): string {
    return this.viewDate;
  }

  async run(): Promise<void> {
    for (;;) {
      this.render();
      const input = await this.deps.prompter.ask("Choose an option");
      if (!input) continue;

      const action = parseDashboardKey(input);
      if (!action) {
        this.notices.push(`Unknown option "${input}".`);
        continue;
      }
      if ((await this.guarded(() => this.dispatch(action))) === "quit") {
        this.deps.session.commit("quit");
        return;
      }
    }
  }

  private context(): CliContext {
    return {
      ...this.deps,
      viewDate: this.viewDate,
      notify: (message) => {
        this.notices.push(message);
      },
    };
  }

  private render(): void {
    const { session, terminal } = this.deps;
    const lines = renderDashboard(session.document, {
      date: this.viewDate,
      today: session.today(),
      now: session.now(),
      notices: this.notices,
    });
    this.notices = [];
    terminal.clear();
    for (const line of lines) terminal.write(line);
  }

  /**
   * Rejected input ends the current action with a notice; everything else
   * (write failures included) goes up to the crash handler.
   */
  private async guarded(run: () => Promise<Step>): Promise<Step> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof JournalError && !(err instanceof DocumentWriteError)) {
        const detail = err instanceof InvalidEntryError && err.issues.length ? ` (${err.issues.join("; ")})` : "";
        logger.warn({ err, code: err.code }, "[cli] action rejected");
        this.notices.push(`${err.message}${detail}`);
        return "continue";
      }
      if (err instanceof TooManyInvalidAnswersError) {
        this.notices.push(err.message);
        return "continue";
      }
      throw err;
    }
  }

  private async dispatch(action: DashboardAction): Promise<Step> {
    const ctx = this.context();
    switch (action.kind) {
      case "log-food":
        await logFoodFlow(ctx);
        return "continue";
      case "log-workout":
        await logWorkoutFlow(ctx);
        return "continue";
      case "log-weight":
        await logWeightFlow(ctx);
        return "continue";
      case "log-water":
        await logWaterFlow(ctx);
        return "continue";
      case "fasting":
        await fastingFlow(ctx);
        return "continue";
      case "more":
        await this.moreMenu(ctx);
        return "continue";
      case "navigate":
        this.viewDate = shiftDateOnly(this.viewDate, action.days);
        return "continue";
      case "quit":
        return "quit";
      default:
        return assertNever(action);
    }
  }

  private async moreMenu(ctx: CliContext): Promise<void> {
    const { prompter, terminal } = this.deps;
    terminal.write("");
    for (const item of MORE_MENU) terminal.write(`  [${item.key}] ${item.label}`);

    const input = await prompter.ask("Choose an option", "b");
    const action = parseMoreKey(input);
    if (!action) {
      ctx.notify(`Unknown option "${input}".`);
      return;
    }
    await this.dispatchMore(action, ctx);
  }

  private async dispatchMore(action: MoreAction, ctx: CliContext): Promise<void> {
    switch (action.kind) {
      case "report":
        return reportFlow(ctx);
      case "weight-history":
        return weightHistoryFlow(ctx);
      case "meal-planner":
        return mealPlannerFlow(ctx);
      case "custom-food":
        return customFoodFlow(ctx);
      case "progress-photos":
        return progressPhotosFlow(ctx);
      case "export":
        return exportFlow(ctx);
      case "edit-profile":
        return editProfileFlow(ctx);
      case "notes":
        return notesFlow(ctx);
      case "back":
        return;
      default:
        return assertNever(action);
    }
  }
}
