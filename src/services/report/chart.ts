/**
 * Text bar chart: one spent bar and one estimated bar per row, both drawn
 * relative to the row's estimate.
 */

import type { ReportRow, ReportSummary } from './summary.js';
import { formatPercent } from './summary.js';

export const CHART_WIDTH = 40;
const BAR_CHAR = '#';

export function chartTitle(summary: ReportSummary): string {
  return (
    `Tasks achievement: ${formatPercent(summary.achievementPercent)} - ` +
    `Total time: ${formatPercent(summary.totalPercent)} - ` +
    `Expected: ${formatPercent(summary.expectedPercent)}`
  );
}

function bar(value: number, scale: number, width: number): string {
  const length = Math.round((Math.max(0, value) / scale) * width);
  return BAR_CHAR.repeat(Math.min(length, width));
}

function line(kind: string, barText: string, label: string, width: number): string {
  return `  ${kind.padEnd(9)}  ${barText.padEnd(width)}  ${label}`;
}

export function renderChart(
  rows: readonly ReportRow[],
  summary: ReportSummary,
  width: number = CHART_WIDTH
): string {
  // The longest bar fills the width; an estimate is always 1.0
  const scale = rows.reduce((max, row) => Math.max(max, row.ratio ?? 0), 1);

  const lines = [chartTitle(summary), ''];
  for (const row of rows) {
    lines.push(row.label);
    lines.push(
      line(
        'Spent',
        row.ratio === null ? '' : bar(row.ratio, scale, width),
        row.ratio === null ? 'n/a' : formatPercent(row.ratio * 100),
        width
      )
    );
    lines.push(line('Estimated', bar(1, scale, width), row.estimatedHours.toFixed(2), width));
  }
  return lines.join('\n');
}
