/**
 * sprint_plan tool
 *
 * Lists planned tasks in the order they compete for time entries.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { RuleKind, ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { loadConfiguredPlan } from '../services/report/runner.js';
import { prioritizeTasks, formatMatchRule } from '../services/reconcile/index.js';
import { toToolError } from '../utils/errors.js';

export interface PlanEntry {
  priority: number;
  position: number;
  label: string;
  kind: RuleKind;
  rule: string; // Parsed rule, as the matcher compares it
  estimated_hours: number;
}

export interface PlanData {
  file: string;
  sheet: string;
  scheduled_hours: number;
  tasks: PlanEntry[];
}

export const planTool: Tool = {
  name: 'sprint_plan',
  description:
    'List the planned sprint tasks in matching priority order, with each task\'s parsed rule (project or task) and estimate.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

export async function planHandler(_args: Record<string, unknown>): Promise<ToolResult<PlanData>> {
  try {
    const config = getConfig();
    const tasks = await loadConfiguredPlan(config);

    return {
      success: true,
      data: {
        file: config.tasks.filePath,
        sheet: config.tasks.sheetName,
        scheduled_hours: tasks.reduce((sum, t) => sum + t.estimatedHours, 0),
        tasks: prioritizeTasks(tasks).map((task, index) => ({
          priority: index + 1,
          position: task.position,
          label: task.label,
          kind: task.rule.kind,
          rule: formatMatchRule(task.rule),
          estimated_hours: task.estimatedHours,
        })),
      },
    };
  } catch (error) {
    return toToolError(error, 'PLAN_ERROR');
  }
}
