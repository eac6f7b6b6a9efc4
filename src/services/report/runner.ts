/**
 * End-to-end sprint report: Clockify + task plan -> reconciliation -> summary
 */

import type {
  PlannedTask,
  SprintConfig,
  SprintSettings,
  SprintWindow,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { ClockifyClient, loadTimesheet } from '../clockify/index.js';
import { readPlan } from '../plan/index.js';
import { createSprintWindow, reconcile } from '../reconcile/index.js';
import { renderChart } from './chart.js';
import { summarize, toReportRows } from './summary.js';
import type { ReportRow, ReportSummary } from './summary.js';

export interface ReportDependencies {
  clockify?: ClockifyClient | undefined;
  loadPlan?: ((filePath: string, sheetName: string) => Promise<PlannedTask[]>) | undefined;
  now?: (() => number) | undefined; // Epoch seconds
}

export interface ReportOptions {
  sprint?: Partial<SprintSettings> | undefined;
  includeChart?: boolean | undefined;
}

export interface SprintReport {
  window: SprintWindow;
  rows: ReportRow[];
  summary: ReportSummary;
  entriesCounted: number;
  entriesSkipped: number;
  chart?: string;
}

export function createClockifyClient(config: SprintConfig): ClockifyClient {
  return new ClockifyClient({
    apiKey: config.clockify.apiKey,
    baseUrl: config.clockify.baseUrl,
    pageSize: config.clockify.pageSize,
  });
}

export function loadConfiguredPlan(
  config: SprintConfig,
  deps: ReportDependencies = {}
): Promise<PlannedTask[]> {
  const load = deps.loadPlan ?? readPlan;
  return load(config.tasks.filePath, config.tasks.sheetName);
}

export async function runSprintReport(
  config: SprintConfig,
  options: ReportOptions = {},
  deps: ReportDependencies = {}
): Promise<SprintReport> {
  const sprint: SprintSettings = { ...config.sprint, ...options.sprint };
  const window = createSprintWindow(sprint.startOfSprint, sprint.sprintDays);
  const client = deps.clockify ?? createClockifyClient(config);
  const now = deps.now ?? (() => Date.now() / 1000);

  const tasks = await loadConfiguredPlan(config, deps);
  const timesheet = await loadTimesheet(client, {
    workspaceName: config.clockify.workspaceName,
    userName: config.clockify.userName,
  });

  const result = reconcile({
    entries: timesheet.entries,
    projects: timesheet.projects,
    tasks,
    window,
    totalBudget: sprint.totalSprintTime,
  });

  const rows = toReportRows(result);
  const summary = summarize(result, window, sprint.totalSprintTime, now());

  logger.info('Sprint report ready', {
    tasks: tasks.length,
    entries: result.entriesCounted,
    spentHours: summary.spentHours,
  });

  const report: SprintReport = {
    window,
    rows,
    summary,
    entriesCounted: result.entriesCounted,
    entriesSkipped: result.entriesSkipped,
  };
  if (options.includeChart ?? true) {
    report.chart = renderChart(rows, summary);
  }
  return report;
}
