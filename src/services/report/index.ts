/**
 * Report services
 */

export { summarize, toReportRows, spentRatio, formatPercent } from './summary.js';
export type { ReportRow, ReportSummary } from './summary.js';
export { renderChart, chartTitle, CHART_WIDTH } from './chart.js';
export { runSprintReport, loadConfiguredPlan, createClockifyClient } from './runner.js';
export type { ReportDependencies, ReportOptions, SprintReport } from './runner.js';
