/**
 * Error types shared by every stage of a sprint report run
 */

/**
 * Base class for failures that abort a report run.
 * `code` is surfaced unchanged in tool results.
 */
export class SprintError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SprintError';
  }
}

export class ConfigError extends SprintError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * Convert any thrown value into a tool error payload
 */
export function toToolError(
  error: unknown,
  fallbackCode: string
): { success: false; error: string; code: string } {
  if (error instanceof SprintError) {
    return { success: false, error: error.message, code: error.code };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : String(error),
    code: fallbackCode,
  };
}
