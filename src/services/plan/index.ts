/**
 * Task plan services
 */

export {
  readPlan,
  readPlanSheet,
  parsePlanRows,
  InvalidPlanError,
  SheetNotFoundError,
  DESCRIPTION_COLUMN,
  ESTIMATE_COLUMN,
} from './reader.js';
export type { PlanRow } from './reader.js';
