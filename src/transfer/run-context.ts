import { DEFAULT_MAX_EXECUTION_TIME } from '../constants.ts';
import type { Logger } from '../types.ts';

export type StopReason = 'cancelled' | 'time-limit';

export interface RunContextOptions {
  /** Seconds before the run should wind down; non-positive values fall back to the default */
  maxExecutionTime?: number;
  now?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Per-run execution harness: when the run started, how long it may take, and
 * whether it has been asked to stop. Once stopped it stays stopped.
 */
export class RunContext {
  readonly maxExecutionTime: number;
  readonly startedAt: number;
  private readonly now: () => number;
  private readonly logger: Logger | undefined;
  private reason: StopReason | undefined;

  constructor(options: RunContextOptions = {}) {
    const { maxExecutionTime, now = Date.now, signal, logger } = options;
    this.maxExecutionTime = maxExecutionTime && maxExecutionTime > 0 ? maxExecutionTime : DEFAULT_MAX_EXECUTION_TIME;
    this.now = now;
    this.logger = logger;
    this.startedAt = now();

    if (signal?.aborted) {
      this.cancel('abort signal');
    } else {
      signal?.addEventListener('abort', () => this.cancel('abort signal'), { once: true });
    }
  }

  get stopReason(): StopReason | undefined {
    return this.reason;
  }

  elapsedSeconds(): number {
    return (this.now() - this.startedAt) / 1000;
  }

  currentTime(): Date {
    return new Date(this.now());
  }

  cancel(source = 'cancel'): void {
    if (this.reason) return;
    this.reason = 'cancelled';
    this.logger?.info({ source }, 'Stop requested, will exit after completing current row');
  }

  shouldStop(): boolean {
    if (this.reason) return true;

    const elapsed = this.elapsedSeconds();
    if (elapsed >= this.maxExecutionTime) {
      this.reason = 'time-limit';
      this.logger?.warn(`Approaching time limit (${elapsed.toFixed(1)}s/${this.maxExecutionTime}s), will exit after current row`);
      return true;
    }
    return false;
  }

  /**
   * Turn termination signals into a cooperative stop. Returns a function that removes the handlers.
   */
  installSignalHandlers(target: NodeJS.EventEmitter = process, signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT']): () => void {
    const handler = (signal: NodeJS.Signals) => this.cancel(signal);
    for (const signal of signals) target.on(signal, handler);
    return () => {
      for (const signal of signals) target.off(signal, handler);
    };
  }
}
