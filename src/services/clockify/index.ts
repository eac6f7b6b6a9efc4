/**
 * Clockify services
 */

export {
  ClockifyClient,
  ClockifyRequestError,
  DEFAULT_BASE_URL,
  DEFAULT_PAGE_SIZE,
} from './client.js';
export type {
  ClockifyClientOptions,
  ClockifyWorkspace,
  ClockifyUser,
  ClockifyProject,
  ClockifyTimeEntry,
  FetchLike,
} from './client.js';
export {
  loadTimesheet,
  pickByName,
  toTimeEntry,
  WorkspaceNotFoundError,
  UserNotFoundError,
} from './timesheet.js';
export type { Timesheet, TimesheetOptions } from './timesheet.js';
