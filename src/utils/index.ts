/**
 * Utils module exports
 */

export { logger, isLogLevel } from './logger.js';
export { SprintError, ConfigError, toToolError } from './errors.js';
