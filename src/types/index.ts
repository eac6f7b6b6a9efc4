/**
 * Sprint Progress MCP - Type Definitions
 */

// ============================================
// Time entries (supplied by the time tracker)
// ============================================

// A timer still running has no elapsed duration yet
export interface RunningInterval {
  state: 'running';
}

export interface StoppedInterval {
  state: 'stopped';
  duration: string; // Compact encoding, e.g. PT1H30M
}

export type EntryInterval = RunningInterval | StoppedInterval;

export interface TimeEntry {
  id: string;
  start: number; // Epoch seconds
  interval: EntryInterval;
  projectId: string | null;
  description: string;
}

// Project id -> display name, active projects only
export type ProjectLookup = ReadonlyMap<string, string>;

// ============================================
// Planned tasks
// ============================================

export type RuleKind = 'project' | 'task';

export interface ProjectRule {
  kind: 'project';
  projectName: string;
}

export interface TaskRule {
  kind: 'task';
  substring: string;
}

export type MatchRule = ProjectRule | TaskRule;

export interface PlannedTask {
  position: number; // Row order in the plan
  label: string; // Rule text as written in the plan
  rule: MatchRule;
  estimatedHours: number;
}

// ============================================
// Reconciliation
// ============================================

export interface SprintWindow {
  start: number; // Epoch seconds, inclusive
  days: number;
  end: number; // Epoch seconds, exclusive
}

export interface ReconciliationRow {
  spentHours: number;
  estimatedHours: number;
  label: string;
}

export interface ReconciliationResult {
  rows: ReconciliationRow[]; // Planned tasks in priority order, off-plan row last
  scheduledHours: number;
  entriesCounted: number;
  entriesSkipped: number;
}

// ============================================
// Configuration
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ClockifySettings {
  readonly apiKey: string;
  readonly workspaceName: string;
  readonly userName: string;
  readonly baseUrl: string;
  readonly pageSize: number;
}

export interface TaskPlanSettings {
  readonly filePath: string;
  readonly sheetName: string;
}

export interface SprintSettings {
  readonly startOfSprint: number; // Epoch seconds
  readonly sprintDays: number;
  readonly totalSprintTime: number; // Hours
}

export interface SprintConfig {
  readonly clockify: ClockifySettings;
  readonly tasks: TaskPlanSettings;
  readonly sprint: SprintSettings;
  readonly logLevel: LogLevel;
}

// ============================================
// Tool response types
// ============================================

export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;
