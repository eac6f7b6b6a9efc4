/**
 * Task plan reader
 *
 * The plan is a worksheet with one row per task:
 *
 * | Description         | Estimated Hours |
 * |---------------------|-----------------|
 * | task:design review  | 4               |
 * | project:Backend     | 20              |
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import * as XLSX from 'xlsx';
import type { PlannedTask } from '../../types/index.js';
import { SprintError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseMatchRule } from '../reconcile/matcher.js';

export const DESCRIPTION_COLUMN = 'Description';
export const ESTIMATE_COLUMN = 'Estimated Hours';

export class InvalidPlanError extends SprintError {
  constructor(public readonly problems: string[]) {
    super(`Invalid task plan:\n${problems.map((p) => `  - ${p}`).join('\n')}`, 'INVALID_PLAN');
    this.name = 'InvalidPlanError';
  }
}

export class SheetNotFoundError extends SprintError {
  constructor(
    public readonly sheetName: string,
    public readonly available: string[]
  ) {
    super(
      `Sheet "${sheetName}" not found (available: ${available.join(', ') || 'none'})`,
      'SHEET_NOT_FOUND'
    );
    this.name = 'SheetNotFoundError';
  }
}

const estimateSchema = z
  .union([z.number(), z.string().trim().min(1).transform((v) => Number(v))])
  .pipe(z.number().finite().nonnegative());

const planRowSchema = z.object({
  [DESCRIPTION_COLUMN]: z.string().trim().min(1),
  [ESTIMATE_COLUMN]: estimateSchema,
});

export type PlanRow = Record<string, unknown>;

// sheet_to_json skips blank rows and tags each object with its 0-based sheet row
function sheetRowNumber(row: PlanRow, index: number): number {
  const rowNum = row.__rowNum__;
  return typeof rowNum === 'number' ? rowNum + 1 : index + 2;
}

/**
 * Validate plan rows and parse their match rules.
 * All invalid rows are reported together. Row numbers are the sheet's own;
 * rows built by hand count the header as 1.
 */
export function parsePlanRows(rows: readonly PlanRow[]): PlannedTask[] {
  const tasks: PlannedTask[] = [];
  const problems: string[] = [];

  rows.forEach((row, index) => {
    const rowNumber = sheetRowNumber(row, index);
    const result = planRowSchema.safeParse(row);
    if (!result.success) {
      for (const issue of result.error.issues) {
        problems.push(`row ${rowNumber}, ${issue.path.join('.')}: ${issue.message}`);
      }
      return;
    }

    const label = result.data[DESCRIPTION_COLUMN];
    tasks.push({
      position: tasks.length,
      label,
      rule: parseMatchRule(label),
      estimatedHours: result.data[ESTIMATE_COLUMN],
    });
  });

  if (problems.length > 0) {
    throw new InvalidPlanError(problems);
  }
  return tasks;
}

/**
 * Read the rows of one sheet from a workbook buffer (xlsx, xls, ods or csv)
 */
export function readPlanSheet(data: Buffer, sheetName: string): PlanRow[] {
  const workbook = XLSX.read(data, { type: 'buffer' });
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new SheetNotFoundError(sheetName, workbook.SheetNames);
  }
  return XLSX.utils.sheet_to_json<PlanRow>(sheet);
}

export async function readPlan(filePath: string, sheetName: string): Promise<PlannedTask[]> {
  const data = await readFile(filePath);
  const tasks = parsePlanRows(readPlanSheet(data, sheetName));
  logger.info(`Loaded ${tasks.length} planned tasks from ${filePath}`, { sheet: sheetName });
  return tasks;
}
