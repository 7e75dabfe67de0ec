/**
 * Named logger registry.
 *
 * winston keeps named loggers in a Container; this class pairs one with the
 * sinks attached to each name. `acquire` is the only place sinks get attached,
 * and it refuses to attach a second set to a logger that already has
 * transports. Node runs `acquire` start to finish without yielding, so the
 * lookup and the insert cannot interleave with another construction.
 */

import winston from 'winston';

import { SEVERITY_LEVELS, Severity } from './levels';
import { Sink, SinkKind } from './sinks';

export type StepOutcome = { ok: true } | { ok: false; error: unknown };

export interface SinkCloseOutcome {
  sink: SinkKind;
  target: string;
  flush: StepOutcome;
  close: StepOutcome;
}

export interface AcquireResult {
  logger: winston.Logger;
  /** Sinks attached to the name, whether just now or earlier. */
  sinks: readonly Sink[];
  /** False when the guard found sinks already in place. */
  attached: boolean;
}

async function attempt(step: () => Promise<void>): Promise<StepOutcome> {
  try {
    await step();
    return { ok: true };
  } catch (error) {
    return { ok: false, error };
  }
}

export class LoggerRegistry {
  private readonly sinks = new Map<string, Sink[]>();

  constructor(private readonly container: winston.Container = new winston.Container()) {}

  has(name: string): boolean {
    return this.container.has(name);
  }

  sinksOf(name: string): readonly Sink[] {
    return this.sinks.get(name) ?? [];
  }

  /** Returns the named logger, creating it with the severity scale on first use. */
  loggerFor(name: string): winston.Logger {
    return this.container.get(name, { levels: SEVERITY_LEVELS, exitOnError: false });
  }

  /**
   * Sets the logger's threshold, then attaches the sinks `createSinks` builds
   * unless the named logger already has transports. `createSinks` is not called
   * in that case, so any file-system work it does is skipped as well.
   */
  acquire(name: string, level: Severity, createSinks: () => Sink[]): AcquireResult {
    const logger = this.loggerFor(name);
    logger.level = level;
    if (logger.transports.length > 0) {
      return { logger, sinks: this.sinksOf(name), attached: false };
    }

    const created = createSinks();
    for (const sink of created) {
      logger.add(sink.transport);
    }
    this.sinks.set(name, created);
    return { logger, sinks: created, attached: true };
  }

  /**
   * Detaches every sink attached to `name`, then flushes and closes them.
   * Failures are recorded per sink and never thrown. Detaching happens before
   * the first await: the name can be set up again straight away, and
   * concurrent calls never release the same sink twice.
   */
  release(name: string): Promise<SinkCloseOutcome[]> {
    const owned = this.sinks.get(name) ?? [];
    this.sinks.delete(name);
    if (this.container.has(name)) {
      const logger = this.loggerFor(name);
      for (const sink of owned) {
        logger.remove(sink.transport);
      }
    }
    return this.shutDown(owned);
  }

  private async shutDown(owned: readonly Sink[]): Promise<SinkCloseOutcome[]> {
    const outcomes: SinkCloseOutcome[] = [];
    for (const sink of owned) {
      const flush = await attempt(() => sink.flush());
      const close = await attempt(() => sink.close());
      outcomes.push({ sink: sink.kind, target: sink.target, flush, close });
    }
    return outcomes;
  }
}

/** Registry over winston's process-wide `winston.loggers` container. */
export const defaultRegistry = new LoggerRegistry(winston.loggers);
