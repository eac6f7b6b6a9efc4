/**
 * Loads everything the reconciliation needs from Clockify: the active
 * project lookup and the user's time entries.
 */

import type { ProjectLookup, TimeEntry } from '../../types/index.js';
import { SprintError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ClockifyClient, ClockifyTimeEntry } from './client.js';

export class WorkspaceNotFoundError extends SprintError {
  constructor(public readonly workspaceName: string) {
    super(`workspace ${workspaceName} not found!`, 'WORKSPACE_NOT_FOUND');
    this.name = 'WorkspaceNotFoundError';
  }
}

export class UserNotFoundError extends SprintError {
  constructor(public readonly userName: string) {
    super(`user ${userName} not found!`, 'USER_NOT_FOUND');
    this.name = 'UserNotFoundError';
  }
}

export interface TimesheetOptions {
  workspaceName: string; // Empty matches any workspace
  userName: string; // Empty matches any user
}

export interface Timesheet {
  workspaceId: string;
  userId: string;
  projects: ProjectLookup;
  entries: TimeEntry[];
}

/**
 * Pick the last item whose name equals `wanted`, or the last item at all
 * when nothing specific is wanted
 */
export function pickByName<T extends { name: string | null }>(
  items: readonly T[],
  wanted: string
): T | undefined {
  let picked: T | undefined;
  for (const item of items) {
    if (wanted === '' || item.name === wanted) {
      picked = item;
    }
  }
  return picked;
}

export function toTimeEntry(raw: ClockifyTimeEntry): TimeEntry {
  const startMs = Date.parse(raw.timeInterval.start);
  if (Number.isNaN(startMs)) {
    throw new SprintError(
      `Time entry ${raw.id} has an invalid start: "${raw.timeInterval.start}"`,
      'INVALID_TIME_ENTRY'
    );
  }

  const duration = raw.timeInterval.duration;
  return {
    id: raw.id,
    start: startMs / 1000,
    interval: duration === null ? { state: 'running' } : { state: 'stopped', duration },
    projectId: raw.projectId,
    description: raw.description ?? '',
  };
}

export async function loadTimesheet(
  client: ClockifyClient,
  options: TimesheetOptions
): Promise<Timesheet> {
  const workspace = pickByName(await client.listWorkspaces(), options.workspaceName);
  if (!workspace) {
    throw new WorkspaceNotFoundError(options.workspaceName);
  }

  const user = pickByName(await client.listUsers(workspace.id), options.userName);
  if (!user) {
    throw new UserNotFoundError(options.userName);
  }

  const projects = new Map<string, string>();
  for (const project of await client.listProjects(workspace.id)) {
    if (!project.archived) {
      projects.set(project.id, project.name);
    }
  }

  const rawEntries = await client.listTimeEntries(workspace.id, user.id);
  const entries = rawEntries.map(toTimeEntry);

  logger.info(`Loaded ${entries.length} time entries and ${projects.size} active projects`, {
    workspace: workspace.name,
    user: user.name,
  });

  return { workspaceId: workspace.id, userId: user.id, projects, entries };
}
