/**
 * @fileoverview Utility exports for CLI package.
 * @module @rowcast/cli/utils
 */

export { checkPath, checkPathOrThrow, type PathCheck, type PathPurpose } from './path-validation.js';
export { logger, setLogLevel, getLogLevel, isDebugEnv, type LogLevel } from './logger.js';
