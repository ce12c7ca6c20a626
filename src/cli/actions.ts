// src/cli/actions.ts
// Closed sets of things the user can do from each menu.

export type DashboardAction =
  | { kind: "log-food" }
  | { kind: "log-workout" }
  | { kind: "log-weight" }
  | { kind: "log-water" }
  | { kind: "fasting" }
  | { kind: "more" }
  | { kind: "navigate"; days: 1 | -1 }
  | { kind: "quit" };

export type MoreAction =
  | { kind: "report" }
  | { kind: "weight-history" }
  | { kind: "meal-planner" }
  | { kind: "custom-food" }
  | { kind: "progress-photos" }
  | { kind: "export" }
  | { kind: "edit-profile" }
  | { kind: "notes" }
  | { kind: "back" };

interface MenuItem<A> {
  key: string;
  label: string;
  action: A;
}

export const DASHBOARD_MENU: ReadonlyArray<MenuItem<DashboardAction>> = [
  { key: "1", label: "Log Food", action: { kind: "log-food" } },
  { key: "2", label: "Log Workout", action: { kind: "log-workout" } },
  { key: "3", label: "Log Weight", action: { kind: "log-weight" } },
  { key: "4", label: "Log Water", action: { kind: "log-water" } },
  { key: "f", label: "Fasting", action: { kind: "fasting" } },
  { key: "m", label: "More", action: { kind: "more" } },
  { key: "<", label: "Prev Day", action: { kind: "navigate", days: -1 } },
  { key: ">", label: "Next Day", action: { kind: "navigate", days: 1 } },
  { key: "q", label: "Quit", action: { kind: "quit" } },
];

export const MORE_MENU: ReadonlyArray<MenuItem<MoreAction>> = [
  { key: "1", label: "View Reports & Trends", action: { kind: "report" } },
  { key: "2", label: "Weight History", action: { kind: "weight-history" } },
  { key: "3", label: "Meal Planner", action: { kind: "meal-planner" } },
  { key: "4", label: "Create Custom Food / Recipe", action: { kind: "custom-food" } },
  { key: "5", label: "Progress Photos", action: { kind: "progress-photos" } },
  { key: "6", label: "Export Data (Backup)", action: { kind: "export" } },
  { key: "7", label: "Edit Profile & Goals", action: { kind: "edit-profile" } },
  { key: "n", label: "Day Notes", action: { kind: "notes" } },
  { key: "b", label: "Back to Dashboard", action: { kind: "back" } },
];

function lookup<A>(menu: ReadonlyArray<MenuItem<A>>, input: string): A | null {
  const key = input.trim().toLowerCase();
  return menu.find((item) => item.key === key)?.action ?? null;
}

export function parseDashboardKey(input: string): DashboardAction | null {
  return lookup(DASHBOARD_MENU, input);
}

export function parseMoreKey(input: string): MoreAction | null {
  return lookup(MORE_MENU, input);
}

export function menuLine<A>(menu: ReadonlyArray<MenuItem<A>>): string {
  return menu.map((item) => `[${item.key}] ${item.label}`).join("  ");
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(value)}`);
}
