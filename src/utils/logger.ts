/**
 * Dual Sink Logger – Winston Logger Facade
 *
 * PURPOSE:
 *   Sets up a named winston logger that writes every record to two places at once:
 *   the terminal (standard error) and a log file, each with its own threshold.
 *   The file sink can rotate by size.
 *
 * CONTEXT:
 *   - Loggers are looked up by name in a registry (winston's process-wide container
 *     by default). Constructing a second DualSinkLogger with a name that already has
 *     sinks attaches nothing, so repeated construction never duplicates lines.
 *   - The log file path is resolved (date suffix, `.log` default, platform checks)
 *     before anything touches the disk; an invalid name leaves no directory behind.
 *   - `close()` flushes, closes and detaches the sinks, after which the name can be
 *     set up again from scratch.
 *
 * IMPLEMENTATION DETAILS:
 *   - The logger's own level is the more verbose of the two sink levels, so winston
 *     drops a record before formatting when neither sink would take it.
 *   - Interpolation arguments (`%s`, `%d`, `%o`) and metadata objects are passed to
 *     winston untouched.
 */

import winston from 'winston';

import { ConfigError } from './errors';
import { FileMode, ensureDirExists, openLogFile } from './fsHelpers';
import { LogFileName, LogFileSpec, resolveLogFilePath } from './logFilePath';
import { policyForPlatform } from './fileNamePolicy';
import { Severity, moreVerbose, parseSeverity } from './levels';
import { LoggerRegistry, SinkCloseOutcome, defaultRegistry } from './registry';
import { RotationPolicy, Sink, createConsoleSink, createFileSink } from './sinks';

export const DEFAULT_LOGGER_NAME = 'DualSinkLogger';
export const DEFAULT_MAX_BYTES = 100 * 1024 * 1024; // 100MB
export const DEFAULT_BACKUP_COUNT = 10;

export interface DualSinkLoggerOptions {
  /** Requested file name; `undefined` or `null` picks `log.log` / `log_YYYYMMDD.log`. */
  fileName?: LogFileName | null;
  fileMode?: FileMode;
  consoleLevel?: Severity;
  fileLevel?: Severity;
  name?: string;
  addDateSuffix?: boolean;
  useRotation?: boolean;
  maxBytes?: number;
  backupCount?: number;
  registry?: LoggerRegistry;
  /** Console target; standard error when omitted. */
  consoleStream?: NodeJS.WritableStream;
  /** Which file-name rules apply, `process.platform` when omitted. */
  platform?: NodeJS.Platform;
  /** Date used for the file-name suffix. */
  now?: Date;
}

interface Settings {
  name: string;
  fileMode: FileMode;
  consoleLevel: Severity;
  fileLevel: Severity;
  addDateSuffix: boolean;
  rotation?: RotationPolicy;
}

function checkCount(value: number, option: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`'${option}' must be an integer >= ${min} (received ${value}).`, option);
  }
  return value;
}

function settingsFrom(options: DualSinkLoggerOptions): Settings {
  const fileMode = options.fileMode ?? 'append';
  if (fileMode !== 'append' && fileMode !== 'overwrite') {
    throw new ConfigError(`'fileMode' must be 'append' or 'overwrite' (received ${String(fileMode)}).`, 'fileMode');
  }
  const name = options.name ?? DEFAULT_LOGGER_NAME;
  if (!name.trim()) {
    throw new ConfigError("'name' cannot be empty.", 'name');
  }

  const maxBytes = checkCount(options.maxBytes ?? DEFAULT_MAX_BYTES, 'maxBytes', 1);
  const backupCount = checkCount(options.backupCount ?? DEFAULT_BACKUP_COUNT, 'backupCount', 0);

  return {
    name,
    fileMode,
    consoleLevel: parseSeverity(options.consoleLevel ?? 'info', 'consoleLevel'),
    fileLevel: parseSeverity(options.fileLevel ?? 'debug', 'fileLevel'),
    addDateSuffix: options.addDateSuffix ?? true,
    // With no backups to keep, the file never rolls over
    rotation: options.useRotation && backupCount > 0 ? { maxBytes, backupCount } : undefined,
  };
}

export class DualSinkLogger {
  readonly name: string;
  readonly level: Severity;
  /** Where this instance's file sink writes; undefined when the name already had sinks. */
  readonly file?: LogFileSpec;
  /** False when an earlier logger with the same name already owned the sinks. */
  readonly attached: boolean;

  private readonly logger: winston.Logger;
  private readonly registry: LoggerRegistry;
  private closed = false;

  constructor(options: DualSinkLoggerOptions = {}) {
    const settings = settingsFrom(options);
    this.name = settings.name;
    this.level = moreVerbose(settings.consoleLevel, settings.fileLevel);
    this.registry = options.registry ?? defaultRegistry;

    let file: LogFileSpec | undefined;
    const result = this.registry.acquire(this.name, this.level, () => {
      const spec = resolveLogFilePath(options.fileName, settings.addDateSuffix, {
        now: options.now,
        policy: policyForPlatform(options.platform),
      });
      ensureDirExists(spec.directory);
      openLogFile(spec.path, settings.fileMode);
      file = spec;

      return [
        createFileSink({
          loggerName: this.name,
          level: settings.fileLevel,
          filePath: spec.path,
          mode: settings.fileMode,
          rotation: settings.rotation,
        }),
        createConsoleSink({ loggerName: this.name, level: settings.consoleLevel, stream: options.consoleStream }),
      ];
    });

    this.logger = result.logger;
    this.attached = result.attached;
    this.file = file;
  }

  get filePath(): string | undefined {
    return this.file?.path;
  }

  /** Sinks currently attached to this logger's name. */
  get sinks(): readonly Sink[] {
    return this.registry.sinksOf(this.name);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  log(severity: Severity, message: string, ...args: unknown[]): void {
    this.logger.log(severity, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.log('warning', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args);
  }

  critical(message: string, ...args: unknown[]): void {
    this.log('critical', message, ...args);
  }

  /**
   * Flushes, closes and detaches every sink attached to this name. Never throws;
   * per-sink failures are in the returned outcomes. Calling it again resolves to `[]`.
   */
  async close(): Promise<SinkCloseOutcome[]> {
    this.closed = true;
    return this.registry.release(this.name);
  }
}
