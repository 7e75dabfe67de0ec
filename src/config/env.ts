/**
 * Logger options from environment variables.
 *
 *   LOG_FILE           file name (date suffix and .log default still apply)
 *   LOG_FILE_MODE      append | overwrite
 *   LOG_CONSOLE_LEVEL  debug | info | warning | error | critical (or 10..50)
 *   LOG_FILE_LEVEL     same as above
 *   LOG_NAME           logger name
 *   LOG_DATE_SUFFIX    true | false
 *   LOG_ROTATE         true | false
 *   LOG_MAX_SIZE       "100MB", "512kb", or plain bytes
 *   LOG_BACKUP_COUNT   rotated files to keep
 *
 * Unset or empty variables fall back to the logger's own defaults.
 */

import dotenv from 'dotenv';

import { ConfigError } from '../utils/errors';
import { parseSeverity } from '../utils/levels';
import { DualSinkLogger, DualSinkLoggerOptions } from '../utils/logger';

export type Env = Record<string, string | undefined>;

const SIZE_FACTORS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 * 1024,
  gb: 1024 * 1024 * 1024,
};

/** Parses "10MB", "1.5gb", "4096" into bytes. */
export function parseSizeToBytes(value: string, option = 'LOG_MAX_SIZE'): number {
  const m = value.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!m) {
    throw new ConfigError(`${option} must be a size such as 10MB or 4096 (received ${value}).`, option);
  }
  const unit = (m[2] ?? 'b').toLowerCase();
  return Math.floor(Number(m[1]) * SIZE_FACTORS[unit]);
}

function parseBoolean(value: string, option: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigError(`${option} must be true or false (received ${value}).`, option);
  }
}

function parseCount(value: string, option: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${option} must be a non-negative integer (received ${value}).`, option);
  }
  return Number(value.trim());
}

function read(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loggerOptionsFromEnv(env: Env = process.env): DualSinkLoggerOptions {
  const options: DualSinkLoggerOptions = {};

  const fileName = read(env, 'LOG_FILE');
  if (fileName !== undefined) options.fileName = fileName;

  const fileMode = read(env, 'LOG_FILE_MODE');
  if (fileMode !== undefined) {
    const mode = fileMode.trim().toLowerCase();
    if (mode !== 'append' && mode !== 'overwrite') {
      throw new ConfigError(`LOG_FILE_MODE must be append or overwrite (received ${fileMode}).`, 'LOG_FILE_MODE');
    }
    options.fileMode = mode === 'append' ? 'append' : 'overwrite';
  }

  const consoleLevel = read(env, 'LOG_CONSOLE_LEVEL');
  if (consoleLevel !== undefined) options.consoleLevel = parseSeverity(consoleLevel, 'LOG_CONSOLE_LEVEL');

  const fileLevel = read(env, 'LOG_FILE_LEVEL');
  if (fileLevel !== undefined) options.fileLevel = parseSeverity(fileLevel, 'LOG_FILE_LEVEL');

  const name = read(env, 'LOG_NAME');
  if (name !== undefined) options.name = name.trim();

  const dateSuffix = read(env, 'LOG_DATE_SUFFIX');
  if (dateSuffix !== undefined) options.addDateSuffix = parseBoolean(dateSuffix, 'LOG_DATE_SUFFIX');

  const rotate = read(env, 'LOG_ROTATE');
  if (rotate !== undefined) options.useRotation = parseBoolean(rotate, 'LOG_ROTATE');

  const maxSize = read(env, 'LOG_MAX_SIZE');
  if (maxSize !== undefined) options.maxBytes = parseSizeToBytes(maxSize);

  const backupCount = read(env, 'LOG_BACKUP_COUNT');
  if (backupCount !== undefined) options.backupCount = parseCount(backupCount, 'LOG_BACKUP_COUNT');

  return options;
}

/**
 * Loads `.env` (when present) into process.env and builds a logger from it.
 * `overrides` win over the environment.
 */
export function createLoggerFromEnv(overrides: DualSinkLoggerOptions = {}, envFile?: string): DualSinkLogger {
  dotenv.config(envFile ? { path: envFile } : undefined);
  return new DualSinkLogger({ ...loggerOptionsFromEnv(process.env), ...overrides });
}
