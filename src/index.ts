/**
 * Dual Sink Logger – Package Entry Point
 *
 * PURPOSE:
 *   Re-exports the logger facade, the path resolver and the pieces they are built
 *   from (severity scale, file-name policies, sinks, registry, errors, env config).
 *
 * USAGE:
 *   const log = new DualSinkLogger({ fileName: 'logs/sync', consoleLevel: 'info' });
 *   log.info('Downloaded %d files', 3);
 *   await log.close();
 */

export { DualSinkLogger, DEFAULT_LOGGER_NAME, DEFAULT_MAX_BYTES, DEFAULT_BACKUP_COUNT } from './utils/logger';
export type { DualSinkLoggerOptions } from './utils/logger';
export { resolveLogFilePath, dateToken, DEFAULT_STEM, DEFAULT_EXT } from './utils/logFilePath';
export type { LogFileName, LogFileSpec, ResolveOptions } from './utils/logFilePath';
export { posixFileNamePolicy, windowsFileNamePolicy, policyForPlatform } from './utils/fileNamePolicy';
export type { FileNamePolicy } from './utils/fileNamePolicy';
export { SEVERITY_LEVELS, parseSeverity, moreVerbose, isSeverity } from './utils/levels';
export type { Severity } from './utils/levels';
export { LoggerRegistry, defaultRegistry } from './utils/registry';
export type { SinkCloseOutcome, StepOutcome, AcquireResult } from './utils/registry';
export { createConsoleSink, createFileSink } from './utils/sinks';
export type { Sink, SinkKind, RotationPolicy } from './utils/sinks';
export type { FileMode } from './utils/fsHelpers';
export { renderLine } from './utils/formatters';
export { LoggerSetupError, InvalidNameError, InvalidTypeError, ConfigError } from './utils/errors';
export type { LoggerSetupErrorCode } from './utils/errors';
export { loggerOptionsFromEnv, createLoggerFromEnv, parseSizeToBytes } from './config/env';
