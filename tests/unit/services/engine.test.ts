/**
 * Tests for the reconciliation engine
 */

import { describe, it, expect } from 'vitest';
import {
  reconcile,
  createSprintWindow,
  isInWindow,
  OFF_PLAN_LABEL,
} from '../../../src/services/reconcile/engine.js';
import { parseMatchRule } from '../../../src/services/reconcile/matcher.js';
import {
  MalformedDurationError,
  UnresolvedProjectError,
} from '../../../src/services/reconcile/errors.js';
import type { PlannedTask, TimeEntry } from '../../../src/types/index.js';

const DAY = 86400;
const window = createSprintWindow(1000, 2);

function task(label: string, position: number, estimatedHours: number): PlannedTask {
  return { position, label, rule: parseMatchRule(label), estimatedHours };
}

function entry(
  id: string,
  start: number,
  duration: string | null,
  description: string,
  projectId: string | null = 'p1'
): TimeEntry {
  return {
    id,
    start,
    interval: duration === null ? { state: 'running' } : { state: 'stopped', duration },
    projectId,
    description,
  };
}

const projects = new Map([
  ['p1', 'Alpha'],
  ['p2', 'Beta'],
]);

describe('createSprintWindow', () => {
  it('derives the end from the length in days', () => {
    expect(window).toEqual({ start: 1000, days: 2, end: 1000 + 2 * DAY });
  });

  it('is half-open', () => {
    expect(isInWindow(1000, window)).toBe(true);
    expect(isInWindow(1000 + 2 * DAY - 1, window)).toBe(true);
    expect(isInWindow(1000 + 2 * DAY, window)).toBe(false);
    expect(isInWindow(999, window)).toBe(false);
  });
});

describe('reconcile', () => {
  it('credits matches, buckets the rest and ignores out-of-window entries', () => {
    const result = reconcile({
      entries: [
        entry('a', 2000, 'PT2H', 'Design review'),
        entry('b', 3000, 'PT1H', 'Standup'),
        entry('c', 1000 + 2 * DAY, 'PT10H', 'Design more'),
      ],
      projects,
      tasks: [task('task:design', 0, 5)],
      window,
      totalBudget: 40,
    });

    expect(result.rows).toEqual([
      { spentHours: 2, estimatedHours: 5, label: 'task:design' },
      { spentHours: 1, estimatedHours: 35, label: OFF_PLAN_LABEL },
    ]);
    expect(result.scheduledHours).toBe(5);
    expect(result.entriesCounted).toBe(2);
    expect(result.entriesSkipped).toBe(1);
  });

  it('credits an entry to one task only', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT1H', 'Refactor parser', 'p1')],
      projects,
      tasks: [task('project:Alpha', 0, 10), task('task:refactor', 1, 3)],
      window,
      totalBudget: 20,
    });

    expect(result.rows.map((r) => r.spentHours)).toEqual([1, 0, 0]);
  });

  it('falls back to the project rule when no task rule matches', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT2H', 'Planning', 'p1')],
      projects,
      tasks: [task('project:Alpha', 0, 10), task('task:refactor', 1, 3)],
      window,
      totalBudget: 20,
    });

    expect(result.rows.map((r) => r.spentHours)).toEqual([0, 2, 0]);
  });

  it('lists rows in priority order with the off-plan row last', () => {
    const result = reconcile({
      entries: [],
      projects,
      tasks: [task('project:Alpha', 0, 10), task('task:b', 1, 2), task('task:z', 2, 1)],
      window,
      totalBudget: 20,
    });

    expect(result.rows.map((r) => r.label)).toEqual([
      'task:z',
      'task:b',
      'project:Alpha',
      OFF_PLAN_LABEL,
    ]);
  });

  it('puts a task rule row ahead of an earlier project rule row', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT1H', 'Design review', 'p1')],
      projects,
      tasks: [task('project:Alpha', 0, 4), task('task:design', 1, 2)],
      window,
      totalBudget: 10,
    });

    expect(result.rows).toEqual([
      { spentHours: 1, estimatedHours: 2, label: 'task:design' },
      { spentHours: 0, estimatedHours: 4, label: 'project:Alpha' },
      { spentHours: 0, estimatedHours: 4, label: OFF_PLAN_LABEL },
    ]);
  });

  it('credits the task whose label sorts first as written', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT1H', 'Design review')],
      projects,
      tasks: [task('task:Review', 0, 2), task('task:design review', 1, 3)],
      window,
      totalBudget: 10,
    });

    expect(result.rows).toEqual([
      { spentHours: 1, estimatedHours: 3, label: 'task:design review' },
      { spentHours: 0, estimatedHours: 2, label: 'task:Review' },
      { spentHours: 0, estimatedHours: 5, label: OFF_PLAN_LABEL },
    ]);
  });

  it('counts repeated entries once', () => {
    const repeated = entry('a', 2000, 'PT1H30M', 'Design review');
    const result = reconcile({
      entries: [repeated, repeated, { ...repeated }],
      projects,
      tasks: [task('task:design', 0, 5)],
      window,
      totalBudget: 40,
    });

    expect(result.rows[0]?.spentHours).toBe(1.5);
    expect(result.entriesCounted).toBe(1);
    expect(result.entriesSkipped).toBe(2);
  });

  it('includes the window start and excludes the window end', () => {
    const result = reconcile({
      entries: [
        entry('start', window.start, 'PT1H', 'Standup'),
        entry('end', window.end, 'PT4H', 'Standup'),
      ],
      projects,
      tasks: [],
      window,
      totalBudget: 10,
    });

    expect(result.rows).toEqual([{ spentHours: 1, estimatedHours: 10, label: OFF_PLAN_LABEL }]);
  });

  it('puts unmatched time entirely off-plan', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT3H', 'Lunch', 'p2')],
      projects,
      tasks: [task('project:Alpha', 0, 4), task('task:design', 1, 2)],
      window,
      totalBudget: 10,
    });

    expect(result.rows.map((r) => r.spentHours)).toEqual([0, 0, 3]);
  });

  it('counts running entries as zero', () => {
    const result = reconcile({
      entries: [entry('a', 2000, null, 'Design review')],
      projects,
      tasks: [task('task:design', 0, 5)],
      window,
      totalBudget: 5,
    });

    expect(result.rows.map((r) => r.spentHours)).toEqual([0, 0]);
    expect(result.entriesCounted).toBe(1);
  });

  it('tolerates a plan larger than the budget', () => {
    const result = reconcile({
      entries: [],
      projects,
      tasks: [task('task:design', 0, 30), task('task:build', 1, 20)],
      window,
      totalBudget: 40,
    });

    expect(result.rows[2]).toEqual({ spentHours: 0, estimatedHours: -10, label: OFF_PLAN_LABEL });
  });

  it('accepts tasks estimated at zero', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT1H', 'Hotfix')],
      projects,
      tasks: [task('task:hotfix', 0, 0)],
      window,
      totalBudget: 8,
    });

    expect(result.rows[0]).toEqual({ spentHours: 1, estimatedHours: 0, label: 'task:hotfix' });
  });

  it('fails when a project rule meets an unknown project', () => {
    expect(() =>
      reconcile({
        entries: [entry('a', 2000, 'PT1H', 'Planning', 'gone')],
        projects,
        tasks: [task('project:Alpha', 0, 4)],
        window,
        totalBudget: 10,
      })
    ).toThrow(UnresolvedProjectError);
  });

  it('does not resolve projects once a task rule has matched', () => {
    const result = reconcile({
      entries: [entry('a', 2000, 'PT1H', 'Deploy prod', 'gone')],
      projects,
      tasks: [task('project:Alpha', 0, 4), task('task:deploy', 1, 1)],
      window,
      totalBudget: 10,
    });

    expect(result.rows.map((r) => r.spentHours)).toEqual([1, 0, 0]);
  });

  it('skips out-of-window entries without parsing them', () => {
    const result = reconcile({
      entries: [entry('a', 0, 'garbage', 'Design')],
      projects,
      tasks: [task('task:design', 0, 5)],
      window,
      totalBudget: 5,
    });

    expect(result.rows[0]?.spentHours).toBe(0);
  });

  it('propagates malformed durations', () => {
    expect(() =>
      reconcile({
        entries: [entry('a', 2000, 'P1D', 'Design')],
        projects,
        tasks: [task('task:design', 0, 5)],
        window,
        totalBudget: 5,
      })
    ).toThrow(MalformedDurationError);
  });
});
