/**
 * Reconciliation errors
 */

import { SprintError } from '../../utils/errors.js';

export class MalformedDurationError extends SprintError {
  constructor(public readonly encoding: string) {
    super(`Malformed duration: "${encoding}"`, 'MALFORMED_DURATION');
    this.name = 'MalformedDurationError';
  }
}

export class UnknownRuleKindError extends SprintError {
  constructor(public readonly rule: string) {
    super(
      `Unknown task description: "${rule}". Expected "project:<name>" or "task:<text>"`,
      'UNKNOWN_RULE_KIND'
    );
    this.name = 'UnknownRuleKindError';
  }
}

export class UnresolvedProjectError extends SprintError {
  constructor(
    public readonly entryId: string,
    public readonly projectId: string | null
  ) {
    super(
      projectId === null
        ? `Time entry ${entryId} has no project`
        : `Time entry ${entryId} references unknown or archived project ${projectId}`,
      'UNRESOLVED_PROJECT'
    );
    this.name = 'UnresolvedProjectError';
  }
}
