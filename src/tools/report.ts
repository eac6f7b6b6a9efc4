/**
 * sprint_report tool
 *
 * Reconcile the sprint's Clockify entries against the task plan.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SprintSettings, ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { runSprintReport } from '../services/report/runner.js';
import type { SprintReport } from '../services/report/runner.js';
import { logger } from '../utils/logger.js';
import { toToolError } from '../utils/index.js';

const inputSchema = z.object({
  start_of_sprint: z.number().nonnegative().optional(),
  sprint_days: z.number().positive().optional(),
  total_sprint_time: z.number().nonnegative().optional(),
  include_chart: z.boolean().optional().default(true),
});

export const reportTool: Tool = {
  name: 'sprint_report',
  description:
    'Reconcile Clockify time entries against the planned sprint tasks. Each entry inside the sprint window is credited to the first matching task (task rules before project rules); unmatched time is reported as "Off-scheduled". Returns spent vs estimated hours per task, overall progress and a text chart.',
  inputSchema: {
    type: 'object',
    properties: {
      start_of_sprint: {
        type: 'number',
        description: 'Sprint start as epoch seconds (defaults to config)',
      },
      sprint_days: {
        type: 'number',
        description: 'Sprint length in days (defaults to config)',
      },
      total_sprint_time: {
        type: 'number',
        description: 'Total hours available in the sprint (defaults to config)',
      },
      include_chart: {
        type: 'boolean',
        description: 'Include a text bar chart (default: true)',
      },
    },
  },
};

export async function reportHandler(args: Record<string, unknown>): Promise<ToolResult<SprintReport>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const input = parseResult.data;

  try {
    const sprint: Partial<SprintSettings> = {
      ...(input.start_of_sprint !== undefined ? { startOfSprint: input.start_of_sprint } : {}),
      ...(input.sprint_days !== undefined ? { sprintDays: input.sprint_days } : {}),
      ...(input.total_sprint_time !== undefined ? { totalSprintTime: input.total_sprint_time } : {}),
    };

    const report = await runSprintReport(getConfig(), {
      sprint,
      includeChart: input.include_chart,
    });

    return { success: true, data: report };
  } catch (error) {
    logger.error('Sprint report failed', error);
    return toToolError(error, 'REPORT_ERROR');
  }
}
