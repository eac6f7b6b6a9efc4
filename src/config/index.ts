/**
 * Configuration loading and validation
 * Loads from SPRINT_CONFIG_PATH or ./config.yml
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { parse as parseYaml } from 'yaml';
import { logger, ConfigError } from '../utils/index.js';
import type { SprintConfig } from '../types/index.js';
import { DEFAULT_BASE_URL, DEFAULT_PAGE_SIZE } from '../services/clockify/index.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// Zod schema for the Clockify section
const clockifySchema = z.object({
  api_key: z.string().default(''),
  workspace_name: z.string().default(''),
  user_name: z.string().default(''),
  base_url: z.string().url().default(DEFAULT_BASE_URL),
  page_size: z.number().int().min(1).max(5000).default(DEFAULT_PAGE_SIZE),
});

// Zod schema for the task plan location
const tasksSchema = z.object({
  file_path: z.string().min(1),
  sheet_name: z.string().min(1).default('Sheet1'),
});

// Zod schema for the sprint window and budget
const sprintSchema = z.object({
  start_of_sprint: z.number().nonnegative(),
  sprint_days: z.number().positive(),
  total_sprint_time: z.number().nonnegative(),
});

const settingsSchema = z.object({
  log_level: logLevelSchema.default('info'),
});

const configFileSchema = z.object({
  clockify: clockifySchema.default({}),
  tasks: tasksSchema,
  sprint: sprintSchema,
  settings: settingsSchema.default({}),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export function getDefaultConfigPath(): string {
  return resolve('config.yml');
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Validate a raw (YAML-decoded) config and turn it into a SprintConfig.
 * Relative task plan paths are resolved against `baseDir`.
 */
export function parseConfig(
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env
): SprintConfig {
  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config:\n${formatIssues(result.error)}`);
  }
  const file = result.data;

  const apiKey = env.CLOCKIFY_API_KEY || file.clockify.api_key;
  if (!apiKey) {
    throw new ConfigError(
      'Invalid config:\n  - clockify.api_key: required (or set CLOCKIFY_API_KEY)'
    );
  }

  const envLevel = logLevelSchema.safeParse(env.SPRINT_LOG_LEVEL);

  return Object.freeze({
    clockify: Object.freeze({
      apiKey,
      workspaceName: file.clockify.workspace_name,
      userName: file.clockify.user_name,
      baseUrl: file.clockify.base_url,
      pageSize: file.clockify.page_size,
    }),
    tasks: Object.freeze({
      filePath: resolve(baseDir, file.tasks.file_path),
      sheetName: file.tasks.sheet_name,
    }),
    sprint: Object.freeze({
      startOfSprint: file.sprint.start_of_sprint,
      sprintDays: file.sprint.sprint_days,
      totalSprintTime: file.sprint.total_sprint_time,
    }),
    logLevel: envLevel.success ? envLevel.data : file.settings.log_level,
  });
}

/**
 * Load configuration from SPRINT_CONFIG_PATH or ./config.yml
 */
export function loadConfig(): SprintConfig {
  const configPath = process.env.SPRINT_CONFIG_PATH
    ? resolve(process.env.SPRINT_CONFIG_PATH)
    : getDefaultConfigPath();

  if (!existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${configPath} (set SPRINT_CONFIG_PATH to point at it)`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Could not read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const config = parseConfig(raw, dirname(configPath));
  logger.debug(`Loaded config from ${configPath}`);
  return config;
}

// Singleton config instance
let configInstance: SprintConfig | null = null;

/**
 * Get the current config (cached)
 */
export function getConfig(): SprintConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export schemas for testing
export const schemas = {
  clockify: clockifySchema,
  tasks: tasksSchema,
  sprint: sprintSchema,
  settings: settingsSchema,
  configFile: configFileSchema,
};
