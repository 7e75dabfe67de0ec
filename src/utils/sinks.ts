/**
 * Console and file sinks.
 *
 * A sink is a winston transport plus the bits the facade needs to shut it down in
 * order: its kind, its threshold, and async flush/close steps. Rotation is the
 * File transport's own size-based rotation.
 */

import winston from 'winston';
import TransportStream from 'winston-transport';

import { createConsoleFormat, createFileFormat } from './formatters';
import { FILE_MODE_FLAGS, FileMode } from './fsHelpers';
import { SEVERITY_LEVELS, Severity } from './levels';

export type SinkKind = 'console' | 'file';

export interface RotationPolicy {
  /** Rotate once the live file would grow past this many bytes. */
  maxBytes: number;
  /** Rotated files kept next to the live one; the oldest goes first. */
  backupCount: number;
}

export interface Sink {
  readonly kind: SinkKind;
  readonly level: Severity;
  /** `stderr`, `stream`, or the file path. */
  readonly target: string;
  readonly rotation?: RotationPolicy;
  readonly transport: TransportStream;
  /** Resolves once every record already handed to the transport has been processed. */
  flush(): Promise<void>;
  /** Releases whatever the transport holds open. */
  close(): Promise<void>;
}

export interface ConsoleSinkOptions {
  loggerName: string;
  level: Severity;
  /** Defaults to standard error. */
  stream?: NodeJS.WritableStream;
  /** Defaults to whether standard error is a TTY; injected streams are never colored by default. */
  colors?: boolean;
}

export interface FileSinkOptions {
  loggerName: string;
  level: Severity;
  filePath: string;
  mode: FileMode;
  rotation?: RotationPolicy;
}

async function processed(transport: TransportStream): Promise<void> {
  while (transport.writableLength > 0 && !transport.destroyed) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export function createConsoleSink(options: ConsoleSinkOptions): Sink {
  const { loggerName, level, stream } = options;
  const colors = options.colors ?? (stream ? false : Boolean(process.stderr.isTTY));
  const format = createConsoleFormat(loggerName, colors);

  const transport: TransportStream = stream
    ? new winston.transports.Stream({ stream, level, format })
    : new winston.transports.Console({ level, format, stderrLevels: Object.keys(SEVERITY_LEVELS) });

  return {
    kind: 'console',
    level,
    target: stream ? 'stream' : 'stderr',
    transport,
    flush: () => processed(transport),
    // The process streams belong to the process, and injected ones to the caller
    close: async () => undefined,
  };
}

export function createFileSink(options: FileSinkOptions): Sink {
  const { loggerName, level, filePath, mode, rotation } = options;

  const transport = new winston.transports.File({
    filename: filePath,
    level,
    format: createFileFormat(loggerName),
    options: { flags: FILE_MODE_FLAGS[mode] },
    ...(rotation && {
      maxsize: rotation.maxBytes,
      // winston counts the live file too
      maxFiles: rotation.backupCount + 1,
      tailable: true,
    }),
  });

  let closing = false;
  const closed = new Promise<void>((resolve) => transport.once('closed', () => resolve()));
  // Removing the transport from its logger already starts the close
  transport.once('unpipe', () => {
    closing = true;
  });

  return {
    kind: 'file',
    level,
    target: filePath,
    rotation,
    transport,
    flush: () => processed(transport),
    close: () => {
      if (!closing) {
        closing = true;
        transport.close?.();
      }
      return closed;
    },
  };
}
