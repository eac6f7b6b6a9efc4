/**
 * Clockify REST client
 *
 * Only the read endpoints needed to reconcile a sprint are covered.
 */

import { z } from 'zod';
import { SprintError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_BASE_URL = 'https://api.clockify.me/api/v1';
export const DEFAULT_PAGE_SIZE = 50;

const workspaceSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const userSchema = z.object({
  id: z.string(),
  name: z.string().nullable().default(''),
});

const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
  archived: z.boolean().default(false),
});

const timeEntrySchema = z.object({
  id: z.string(),
  description: z.string().nullable().default(''),
  projectId: z.string().nullable().default(null),
  timeInterval: z.object({
    start: z.string(),
    end: z.string().nullable().optional(),
    duration: z.string().nullable().default(null),
  }),
});

export type ClockifyWorkspace = z.infer<typeof workspaceSchema>;
export type ClockifyUser = z.infer<typeof userSchema>;
export type ClockifyProject = z.infer<typeof projectSchema>;
export type ClockifyTimeEntry = z.infer<typeof timeEntrySchema>;

export class ClockifyRequestError extends SprintError {
  constructor(
    public readonly path: string,
    public readonly status: number,
    detail: string
  ) {
    super(`Clockify request ${path} failed (${status}): ${detail}`, 'CLOCKIFY_REQUEST_FAILED');
    this.name = 'ClockifyRequestError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClockifyClientOptions {
  apiKey: string;
  baseUrl?: string | undefined;
  pageSize?: number | undefined;
  fetch?: FetchLike | undefined;
}

export class ClockifyClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ClockifyClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async listWorkspaces(): Promise<ClockifyWorkspace[]> {
    return this.get('/workspaces', z.array(workspaceSchema));
  }

  async listUsers(workspaceId: string): Promise<ClockifyUser[]> {
    return this.getAllPages(`/workspaces/${workspaceId}/users`, userSchema);
  }

  async listProjects(workspaceId: string): Promise<ClockifyProject[]> {
    return this.getAllPages(`/workspaces/${workspaceId}/projects`, projectSchema);
  }

  async listTimeEntries(workspaceId: string, userId: string): Promise<ClockifyTimeEntry[]> {
    return this.getAllPages(
      `/workspaces/${workspaceId}/user/${userId}/time-entries`,
      timeEntrySchema
    );
  }

  /**
   * Follow page numbers until a page comes back shorter than the page size
   */
  private async getAllPages<T extends z.ZodTypeAny>(
    path: string,
    itemSchema: T
  ): Promise<z.infer<T>[]> {
    const items: z.infer<T>[] = [];
    for (let page = 1; ; page++) {
      const query = new URLSearchParams({ page: String(page), 'page-size': String(this.pageSize) });
      const batch = await this.get(`${path}?${query.toString()}`, z.array(itemSchema));
      items.push(...batch);
      if (batch.length < this.pageSize) break;
    }
    logger.debug(`Fetched ${items.length} items from ${path}`);
    return items;
  }

  private async get<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T>> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'GET',
      headers: {
        'X-Api-Key': this.apiKey,
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new ClockifyRequestError(path, response.status, detail || response.statusText);
    }

    const body: unknown = await response.json();
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ClockifyRequestError(path, response.status, `unexpected response (${issues})`);
    }
    return result.data;
  }
}
