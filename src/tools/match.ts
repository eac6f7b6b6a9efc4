/**
 * sprint_match tool
 *
 * Shows which planned task a time entry would be credited to.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolResult } from '../types/index.js';
import { getConfig } from '../config/index.js';
import { loadConfiguredPlan } from '../services/report/runner.js';
import { matches, prioritizeTasks, OFF_PLAN_LABEL } from '../services/reconcile/index.js';
import { toToolError } from '../utils/errors.js';

const inputSchema = z.object({
  project: z.string().default(''),
  description: z.string().default(''),
});

export interface MatchData {
  project: string;
  description: string;
  matched: boolean;
  label: string;
  position: number | null;
  candidates: string[]; // Every rule that matches, in priority order
}

export const matchTool: Tool = {
  name: 'sprint_match',
  description:
    'Check which planned task a time entry with the given project name and description would be credited to. Only the first match in priority order receives the time.',
  inputSchema: {
    type: 'object',
    properties: {
      project: {
        type: 'string',
        description: 'Project display name of the entry',
      },
      description: {
        type: 'string',
        description: 'Description of the entry',
      },
    },
  },
};

export async function matchHandler(args: Record<string, unknown>): Promise<ToolResult<MatchData>> {
  const parseResult = inputSchema.safeParse(args);
  if (!parseResult.success) {
    return {
      success: false,
      error: parseResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      code: 'VALIDATION_ERROR',
    };
  }

  const { project, description } = parseResult.data;

  try {
    const tasks = prioritizeTasks(await loadConfiguredPlan(getConfig()));
    const matching = tasks.filter((task) => matches(project, description, task.rule));
    const winner = matching[0];

    return {
      success: true,
      data: {
        project,
        description,
        matched: winner !== undefined,
        label: winner?.label ?? OFF_PLAN_LABEL,
        position: winner?.position ?? null,
        candidates: matching.map((task) => task.label),
      },
    };
  } catch (error) {
    return toToolError(error, 'MATCH_ERROR');
  }
}
