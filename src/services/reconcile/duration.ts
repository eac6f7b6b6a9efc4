/**
 * Elapsed time of a time entry, in fractional hours
 */

import type { TimeEntry } from '../../types/index.js';
import { MalformedDurationError } from './errors.js';

const DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/**
 * Parse a PT#H#M#S encoding into hours.
 * A missing encoding means the timer is still running and counts as zero.
 */
export function parseDuration(encoding: string | null): number {
  if (encoding === null) {
    return 0;
  }

  const match = DURATION_PATTERN.exec(encoding);
  if (!match) {
    throw new MalformedDurationError(encoding);
  }

  const [, hours, minutes, seconds] = match;
  let elapsed = 0;
  if (hours) elapsed += parseInt(hours, 10);
  if (minutes) elapsed += parseInt(minutes, 10) / 60;
  if (seconds) elapsed += parseInt(seconds, 10) / 3600;
  return elapsed;
}

export function entryElapsedHours(entry: TimeEntry): number {
  return parseDuration(entry.interval.state === 'running' ? null : entry.interval.duration);
}
