/**
 * Match rules: parsing, evaluation and priority order
 */

import type {
  MatchRule,
  PlannedTask,
  ProjectLookup,
  RuleKind,
  TimeEntry,
} from '../../types/index.js';
import { UnknownRuleKindError, UnresolvedProjectError } from './errors.js';

const RULE_PREFIXES: ReadonlyArray<readonly [RuleKind, string]> = [
  ['project', 'project:'],
  ['task', 'task:'],
];

// Task rules are more specific than project rules and are tried first
const KIND_RANK: Record<RuleKind, number> = {
  task: 0,
  project: 1,
};

/**
 * Parse "project:<name>" or "task:<text>" into a rule.
 * Rules are compared lower-cased, so they are stored lower-cased.
 */
export function parseMatchRule(text: string): MatchRule {
  const normalized = text.trim().toLowerCase();

  for (const [kind, prefix] of RULE_PREFIXES) {
    if (!normalized.startsWith(prefix)) continue;
    const value = normalized.slice(prefix.length).trim();
    return kind === 'project'
      ? { kind: 'project', projectName: value }
      : { kind: 'task', substring: value };
  }

  throw new UnknownRuleKindError(text);
}

export function formatMatchRule(rule: MatchRule): string {
  return rule.kind === 'project' ? `project:${rule.projectName}` : `task:${rule.substring}`;
}

/**
 * Does an entry with this project name and description satisfy the rule?
 */
export function matches(projectName: string, description: string, rule: MatchRule): boolean {
  switch (rule.kind) {
    case 'project':
      return projectName.toLowerCase() === rule.projectName.toLowerCase();
    case 'task':
      return description.toLowerCase().includes(rule.substring.toLowerCase());
    default: {
      // Rules built outside parseMatchRule are not type-checked at runtime
      const unknownRule: unknown = rule;
      throw new UnknownRuleKindError(JSON.stringify(unknownRule));
    }
  }
}

/**
 * Evaluate a rule against an entry, resolving the project name only when
 * the rule needs it
 */
export function matchesEntry(entry: TimeEntry, rule: MatchRule, projects: ProjectLookup): boolean {
  if (rule.kind !== 'project') {
    return matches('', entry.description, rule);
  }

  const projectName = entry.projectId === null ? undefined : projects.get(entry.projectId);
  if (projectName === undefined) {
    throw new UnresolvedProjectError(entry.id, entry.projectId);
  }
  return matches(projectName, entry.description, rule);
}

/**
 * Order in which tasks compete for an entry: task rules before project
 * rules, then the label as written descending (case-sensitive, by code
 * unit), then plan position.
 */
export function prioritizeTasks(tasks: readonly PlannedTask[]): PlannedTask[] {
  return [...tasks].sort((a, b) => {
    const byKind = KIND_RANK[a.rule.kind] - KIND_RANK[b.rule.kind];
    if (byKind !== 0) return byKind;

    if (a.label !== b.label) return a.label < b.label ? 1 : -1;

    return a.position - b.position;
  });
}

/**
 * First task, in priority order, whose rule matches the entry
 */
export function findMatchingTask(
  entry: TimeEntry,
  orderedTasks: readonly PlannedTask[],
  projects: ProjectLookup
): PlannedTask | undefined {
  return orderedTasks.find((task) => matchesEntry(entry, task.rule, projects));
}
