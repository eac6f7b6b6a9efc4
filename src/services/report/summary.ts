/**
 * Progress figures derived from a reconciliation result
 */

import type { ReconciliationResult, ReconciliationRow, SprintWindow } from '../../types/index.js';

export interface ReportRow extends ReconciliationRow {
  ratio: number | null; // spent / estimated; null when nothing was estimated
}

export interface ReportSummary {
  scheduledHours: number;
  spentHours: number;
  totalBudget: number;
  achievementPercent: number | null;
  totalPercent: number | null;
  expectedPercent: number;
}

export function spentRatio(row: ReconciliationRow): number | null {
  return row.estimatedHours === 0 ? null : row.spentHours / row.estimatedHours;
}

export function toReportRows(result: ReconciliationResult): ReportRow[] {
  return result.rows.map((row) => ({ ...row, ratio: spentRatio(row) }));
}

/**
 * Task achievement only credits planned rows, and never beyond their
 * estimate. Expected progress is the elapsed share of the sprint.
 */
export function summarize(
  result: ReconciliationResult,
  window: SprintWindow,
  totalBudget: number,
  now: number
): ReportSummary {
  const planned = result.rows.slice(0, -1);
  const achieved = planned.reduce(
    (sum, row) => sum + Math.min(row.spentHours, row.estimatedHours),
    0
  );
  const spentHours = result.rows.reduce((sum, row) => sum + row.spentHours, 0);

  const length = window.end - window.start;
  const elapsed = Math.max(0, Math.min(now - window.start, length));

  return {
    scheduledHours: result.scheduledHours,
    spentHours,
    totalBudget,
    achievementPercent:
      result.scheduledHours === 0 ? null : (achieved * 100) / result.scheduledHours,
    totalPercent: totalBudget === 0 ? null : (spentHours * 100) / totalBudget,
    expectedPercent: length === 0 ? 100 : (elapsed * 100) / length,
  };
}

export function formatPercent(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(1)}%`;
}
