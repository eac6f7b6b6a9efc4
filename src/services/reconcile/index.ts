/**
 * Reconciliation services
 */

export { parseDuration, entryElapsedHours } from './duration.js';
export {
  parseMatchRule,
  formatMatchRule,
  matches,
  matchesEntry,
  prioritizeTasks,
  findMatchingTask,
} from './matcher.js';
export {
  reconcile,
  createSprintWindow,
  isInWindow,
  OFF_PLAN_LABEL,
} from './engine.js';
export type { ReconcileInput } from './engine.js';
export {
  MalformedDurationError,
  UnknownRuleKindError,
  UnresolvedProjectError,
} from './errors.js';
