/**
 * Line formats for the two sinks.
 *
 * Both render `[timestamp] SEVERITY name: message`. Continuation lines of a
 * multi-line message are indented to start under the first line's message, so
 * a stack trace or a pretty-printed object stays readable in the file and in
 * the terminal. The console variant colors the severity label.
 */

import winston from 'winston';

import { SEVERITY_COLORS } from './levels';

const { combine, splat, timestamp, printf, colorize } = winston.format;

export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

// Width of the longest label, "CRITICAL"
const LABEL_WIDTH = 8;

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

winston.addColors(SEVERITY_COLORS);

function visibleLength(text: string): number {
  return text.replace(ANSI_ESCAPE, '').length;
}

/**
 * Renders one record. `label` may already carry color codes; they do not count
 * towards the continuation indent.
 */
export function renderLine(stamp: string, label: string, loggerName: string, message: string): string {
  const head = `[${stamp}] ${label} ${loggerName}: `;
  const indent = ' '.repeat(visibleLength(head));
  return head + message.split(/\r?\n/).join(`\n${indent}`);
}

const severityLabel = winston.format((info) => {
  info.level = info.level.toUpperCase().padEnd(LABEL_WIDTH);
  return info;
});

function lineFormat(loggerName: string) {
  return printf((info) => renderLine(String(info.timestamp), info.level, loggerName, String(info.message)));
}

/** Plain format for the file sink. */
export function createFileFormat(loggerName: string): winston.Logform.Format {
  return combine(splat(), timestamp({ format: TIMESTAMP_FORMAT }), severityLabel(), lineFormat(loggerName));
}

/** Console format; colors the label only when `useColors` is set (the target is a TTY). */
export function createConsoleFormat(loggerName: string, useColors: boolean): winston.Logform.Format {
  const stages = [splat(), timestamp({ format: TIMESTAMP_FORMAT }), severityLabel()];
  if (useColors) stages.push(colorize({ level: true }));
  return combine(...stages, lineFormat(loggerName));
}
