/**
 * Platform rules for log file names.
 *
 * The resolver runs the common checks (empty name, null byte) itself and then
 * hands the name to one of these policies. Which policy applies is decided once,
 * from the platform, and can be overridden for tests or cross-platform tooling.
 */

import path from 'path';

import { InvalidNameError } from './errors';

export interface FileNamePolicy {
  readonly name: string;
  /** Throws InvalidNameError when `fileName` is not usable on the platform. */
  validate(fileName: string): void;
}

export const posixFileNamePolicy: FileNamePolicy = {
  name: 'posix',
  validate() {
    // NUL is the only byte POSIX forbids, and the resolver already rejects it
  },
};

const WINDOWS_RESERVED_NAMES = new Set([
  'CON',
  'PRN',
  'AUX',
  'NUL',
  ...Array.from({ length: 9 }, (_, i) => `COM${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `LPT${i + 1}`),
]);

const WINDOWS_RESERVED_CHARS = /[<>:"|?*]/;

/** Stem as the device-name check sees it: `aux.log` → `AUX`. */
function segmentStem(segment: string): string {
  const ext = path.win32.extname(segment);
  return (ext ? segment.slice(0, -ext.length) : segment).toUpperCase();
}

/**
 * `/` and `\` separate segments and are never rejected themselves; a drive or
 * UNC root is skipped. Every other segment is checked on its own.
 */
export const windowsFileNamePolicy: FileNamePolicy = {
  name: 'win32',
  validate(fileName) {
    const root = path.win32.parse(fileName).root;
    const segments = fileName
      .slice(root.length)
      .split(/[\\/]+/)
      .filter((segment) => segment !== '');

    for (const segment of segments) {
      if (WINDOWS_RESERVED_CHARS.test(segment)) {
        throw new InvalidNameError(`'fileName' contains invalid characters for Windows paths: ${segment}`, fileName);
      }
      if (WINDOWS_RESERVED_NAMES.has(segmentStem(segment))) {
        throw new InvalidNameError(`'fileName' contains a reserved Windows device name: ${segment}`, fileName);
      }
    }
  },
};

export function policyForPlatform(platform: NodeJS.Platform = process.platform): FileNamePolicy {
  return platform === 'win32' ? windowsFileNamePolicy : posixFileNamePolicy;
}
