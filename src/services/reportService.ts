import type { JournalDocument, PeriodReport, ReportPeriod, TrendPolicy } from "../domain/types";
import { PERIOD_DAYS } from "../domain/types";
import { averageTotals, computePeriodTotals, countLoggedDays, periodWindow } from "./nutritionService";
import { goalProfileOf } from "./profileService";
import { DEFAULT_TREND_POLICY, analyzeTrend, weightsInWindow } from "./trendService";

/**
 * Weekly (7 days) or monthly (30 days) summary ending today: per-day totals,
 * full-span averages and the weight trend for the same window.
 */
export function buildPeriodReport(
  doc: Pick<JournalDocument, "dailyLogs" | "weightLogs" | "profile" | "micronutrientGoals">,
  today: string,
  period: ReportPeriod,
  policy: TrendPolicy = DEFAULT_TREND_POLICY
): PeriodReport {
  const window = periodWindow(today, PERIOD_DAYS[period]);
  const days = computePeriodTotals(doc.dailyLogs, window.start, window.end);
  const goals = goalProfileOf(doc);

  return {
    period,
    window,
    days,
    loggedDays: countLoggedDays(doc.dailyLogs, window),
    averages: averageTotals(days),
    goals,
    trend: analyzeTrend({
      weights: weightsInWindow(doc.weightLogs, window),
      days,
      goals,
      period,
      policy,
    }),
  };
}
