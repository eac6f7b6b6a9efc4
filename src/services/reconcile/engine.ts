/**
 * Reconciliation engine
 *
 * Credits each in-window time entry to at most one planned task and
 * collects the rest as off-plan time.
 */

import type {
  PlannedTask,
  ProjectLookup,
  ReconciliationResult,
  ReconciliationRow,
  SprintWindow,
  TimeEntry,
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { entryElapsedHours } from './duration.js';
import { findMatchingTask, prioritizeTasks } from './matcher.js';

export const OFF_PLAN_LABEL = 'Off-scheduled';

const SECONDS_PER_DAY = 86400;

export interface ReconcileInput {
  entries: Iterable<TimeEntry>;
  projects: ProjectLookup;
  tasks: readonly PlannedTask[];
  window: SprintWindow;
  totalBudget: number; // Hours available in the sprint
}

export function createSprintWindow(start: number, days: number): SprintWindow {
  return { start, days, end: start + days * SECONDS_PER_DAY };
}

export function isInWindow(timestamp: number, window: SprintWindow): boolean {
  return timestamp >= window.start && timestamp < window.end;
}

export function reconcile(input: ReconcileInput): ReconciliationResult {
  const { entries, projects, tasks, window, totalBudget } = input;

  const orderedTasks = prioritizeTasks(tasks);
  const spent = new Map<PlannedTask, number>(tasks.map((task) => [task, 0]));
  const seen = new Set<string>();
  let offPlanSpent = 0;
  let counted = 0;
  let skipped = 0;

  for (const entry of entries) {
    // The upstream feed repeats entries
    if (seen.has(entry.id)) {
      skipped++;
      continue;
    }
    seen.add(entry.id);

    if (!isInWindow(entry.start, window)) {
      skipped++;
      continue;
    }

    const elapsed = entryElapsedHours(entry);
    const task = findMatchingTask(entry, orderedTasks, projects);
    if (task) {
      spent.set(task, (spent.get(task) ?? 0) + elapsed);
    } else {
      offPlanSpent += elapsed;
    }
    counted++;
  }

  const scheduledHours = tasks.reduce((sum, task) => sum + task.estimatedHours, 0);
  const rows: ReconciliationRow[] = orderedTasks.map((task) => ({
    spentHours: spent.get(task) ?? 0,
    estimatedHours: task.estimatedHours,
    label: task.label,
  }));

  rows.push({
    spentHours: offPlanSpent,
    estimatedHours: totalBudget - scheduledHours,
    label: OFF_PLAN_LABEL,
  });

  logger.debug(`Reconciled ${counted} entries (${skipped} skipped) against ${tasks.length} tasks`);

  return {
    rows,
    scheduledHours,
    entriesCounted: counted,
    entriesSkipped: skipped,
  };
}
