/**
 * AsyncIntervalManager - Safe async operation execution in intervals
 *
 * Manages setInterval callbacks that perform async operations, ensuring:
 * - At most one operation runs at a time
 * - A tick that fires while an operation is still running is skipped, never overlapped
 * - Errors are logged without stopping the interval
 * - Stop aborts the in-flight operation through its AbortSignal and waits for it
 *
 * @example
 * ```typescript
 * const manager = new AsyncIntervalManager({
 *   operation: async (signal) => {
 *     await pollGateway(signal);
 *   },
 *   intervalMs: 5000,
 *   logger,
 *   name: 'Gateway poll',
 * });
 *
 * manager.start();
 *
 * // Later, cleanup
 * await manager.stop();
 * ```
 */

import type { Logger } from './ErrorTypes';

/**
 * Configuration for async interval manager
 */
export interface AsyncIntervalConfig {
  /** Async operation to execute; abort the work when the signal fires */
  operation: (signal: AbortSignal) => Promise<void>;
  /** Interval in milliseconds */
  intervalMs: number;
  /** Logger for error reporting */
  logger: Logger;
  /** Operation name for logging */
  name?: string;
  /** Run once immediately on start (default true) */
  runOnStart?: boolean;
}

export class AsyncIntervalManager {
  private config: AsyncIntervalConfig;
  private intervalHandle?: NodeJS.Timeout;
  private inFlight?: Promise<void>;
  private abortController?: AbortController;
  private skippedTicks = 0;
  private isRunning = false;

  constructor(config: AsyncIntervalConfig) {
    this.config = config;
  }

  /**
   * Starts the interval timer.
   */
  public start(): void {
    if (this.isRunning) {
      this.config.logger.log(`AsyncIntervalManager already running: ${this.getName()}`);
      return;
    }

    this.isRunning = true;
    this.config.logger.log(
      `Starting AsyncIntervalManager: ${this.getName()} (${this.config.intervalMs}ms)`
    );

    if (this.config.runOnStart !== false) {
      this.tick();
    }

    this.intervalHandle = setInterval(() => {
      this.tick();
    }, this.config.intervalMs);
  }

  /**
   * Stops the interval timer, aborts the in-flight operation and waits for it
   * to settle. No tick fires after this resolves. A run started through
   * `runNow()` is aborted even when the timer was never started.
   */
  public async stop(): Promise<void> {
    const wasRunning = this.isRunning;
    if (wasRunning) {
      this.config.logger.log(`Stopping AsyncIntervalManager: ${this.getName()}`);

      if (this.intervalHandle) {
        clearInterval(this.intervalHandle);
        this.intervalHandle = undefined;
      }
      this.isRunning = false;
    }

    this.abortController?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }

    if (wasRunning) {
      this.config.logger.log(`AsyncIntervalManager stopped: ${this.getName()}`);
    }
  }

  /**
   * Runs the operation now, or joins the one already in flight.
   *
   * @returns Promise that settles when that run completes; never rejects
   */
  public runNow(): Promise<void> {
    return this.inFlight ?? this.execute();
  }

  /**
   * Checks if manager is currently running.
   */
  public isActive(): boolean {
    return this.isRunning;
  }

  /**
   * Number of ticks skipped because an operation was still running.
   */
  public getSkippedTickCount(): number {
    return this.skippedTicks;
  }

  private tick(): void {
    if (this.inFlight) {
      this.skippedTicks++;
      this.config.logger.log(
        `AsyncIntervalManager tick skipped, previous run still in progress: ${this.getName()}`
      );
      return;
    }
    void this.execute();
  }

  private execute(): Promise<void> {
    const controller = new AbortController();
    this.abortController = controller;

    const run = this.invoke(controller.signal).finally(() => {
      this.inFlight = undefined;
      this.abortController = undefined;
    });
    this.inFlight = run;
    return run;
  }

  private async invoke(signal: AbortSignal): Promise<void> {
    try {
      await this.config.operation(signal);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.config.logger.error(`AsyncIntervalManager operation failed: ${this.getName()}`, err);
    }
  }

  private getName(): string {
    return this.config.name || 'unnamed';
  }
}
