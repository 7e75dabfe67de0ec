/**
 * Log File Path Resolver
 *
 * PURPOSE:
 *   Turns the (optional) file name a caller asks for into the path the file sink
 *   will write to: validated for the platform, given a `.log` extension when it
 *   has none, and suffixed with today's date (`app.log` → `app_20240102.log`).
 *
 * CONTEXT:
 *   - Called once per logger construction, before any directory is created.
 *   - Pure apart from reading the clock; pass `now` to pin the date.
 *   - The parent directory is kept exactly as given; nothing is made absolute.
 */

import path from 'path';
import { fileURLToPath } from 'url';

import { InvalidNameError, InvalidTypeError, describeType } from './errors';
import { FileNamePolicy, policyForPlatform } from './fileNamePolicy';

export const DEFAULT_STEM = 'log';
export const DEFAULT_EXT = '.log';

export type LogFileName = string | URL;

export interface LogFileSpec {
  /** Name as the caller passed it, `undefined` when none was given. */
  readonly requested: LogFileName | undefined;
  /** Parent directory, `.` when the name had none. */
  readonly directory: string;
  readonly stem: string;
  /** Always non-empty, including the leading dot. */
  readonly extension: string;
  readonly dateSuffixed: boolean;
  readonly path: string;
}

export interface ResolveOptions {
  now?: Date;
  policy?: FileNamePolicy;
}

/** Local calendar date as YYYYMMDD. */
export function dateToken(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

function toPathString(fileName: LogFileName): string {
  if (typeof fileName === 'string') return fileName;
  try {
    return fileURLToPath(fileName);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidNameError(`'fileName' URL must use the file: scheme (${reason})`, fileName.href);
  }
}

/** Splits off the extension the way the resolver understands it: a lone trailing dot does not count. */
function splitName(base: string): { stem: string; extension: string } {
  const ext = path.extname(base);
  if (ext === '' || ext === '.') return { stem: base, extension: '' };
  return { stem: base.slice(0, -ext.length), extension: ext };
}

function build(
  requested: LogFileName | undefined,
  { root, dir: directory }: { root: string; dir: string },
  stem: string,
  extension: string,
  dateSuffixed: boolean
): LogFileSpec {
  const base = `${stem}${extension}`;
  return Object.freeze({
    requested,
    directory: directory || '.',
    stem,
    extension,
    dateSuffixed,
    // format, unlike join, leaves `..` and repeated separators in the parent as they were
    path: directory ? path.format({ root, dir: directory, base }) : base,
  });
}

/**
 * Resolves the log file path for `fileName`.
 *
 * @throws InvalidNameError for an empty or whitespace-only name, a null byte, or a name the platform policy rejects
 * @throws InvalidTypeError when `fileName` is not a string, a URL, null or undefined
 */
export function resolveLogFilePath(fileName: unknown, addDateSuffix = true, options: ResolveOptions = {}): LogFileSpec {
  const token = dateToken(options.now);

  if (fileName === undefined || fileName === null) {
    const none = { root: '', dir: '' };
    return addDateSuffix
      ? build(undefined, none, `${DEFAULT_STEM}_${token}`, DEFAULT_EXT, true)
      : build(undefined, none, DEFAULT_STEM, DEFAULT_EXT, false);
  }

  if (typeof fileName !== 'string' && !(fileName instanceof URL)) {
    throw new InvalidTypeError(describeType(fileName));
  }

  const raw = toPathString(fileName);
  if (!raw.trim()) {
    throw new InvalidNameError("'fileName' cannot be empty.", raw);
  }
  if (raw.includes('\0')) {
    throw new InvalidNameError("'fileName' contains null byte.", raw);
  }
  (options.policy ?? policyForPlatform()).validate(raw);

  const parsed = path.parse(raw);
  const { stem, extension } = splitName(parsed.base);

  if (addDateSuffix) {
    return build(fileName, parsed, `${stem}_${token}`, extension || DEFAULT_EXT, true);
  }
  return build(fileName, parsed, stem, extension || DEFAULT_EXT, false);
}
