/**
 * RetryManager - Exponential backoff retry orchestration
 *
 * Used by the gateway probe, where a gateway that is still booting should get
 * a few chances before setup gives up. The poll loop itself never retries
 * inside a cycle; the next tick is its retry.
 *
 * @example
 * ```typescript
 * const retryManager = new RetryManager(logger);
 * const result = await retryManager.retryWithBackoff(
 *   () => fetchIdentity(),
 *   'Probe gateway',
 *   { maxAttempts: 5, shouldRetry: (error) => !isAuthError(error) }
 * );
 * ```
 */

import { Logger, RetryConfig, RetryResult, DEFAULT_RETRY_CONFIG } from './ErrorTypes';

export class RetryManager {
  private logger: Logger;

  /**
   * @param logger - Logger for retry progress and errors
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Executes an operation with exponential backoff retry logic.
   *
   * Retries up to `maxAttempts` times, doubling (by `backoffMultiplier`) the
   * wait between attempts up to `maxDelayMs`. Stops early when
   * `shouldRetry` returns false for the thrown error or `signal` aborts.
   *
   * @param operation - Async function to retry
   * @param operationName - Human-readable name for logging
   * @param config - Overrides for the default retry configuration
   * @returns RetryResult with success status, value/error, and metadata
   */
  public async retryWithBackoff<T>(
    operation: () => Promise<T>,
    operationName: string,
    config: Partial<RetryConfig> = {}
  ): Promise<RetryResult<T>> {
    const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
    const startTime = Date.now();
    let lastError: Error | undefined;
    let delayMs = finalConfig.initialDelayMs;
    let attempt = 0;

    const { signal } = finalConfig;

    while (attempt < finalConfig.maxAttempts) {
      if (signal?.aborted) {
        this.logger.log(`${operationName} - aborted`);
        lastError = lastError ?? new Error(`${operationName} aborted`);
        break;
      }
      attempt++;
      try {
        this.logger.log(`${operationName} - attempt ${attempt}/${finalConfig.maxAttempts}`);

        const value = await operation();
        const totalDurationMs = Date.now() - startTime;

        this.logger.log(
          `${operationName} succeeded after ${attempt} attempt(s) in ${totalDurationMs}ms`
        );

        return {
          success: true,
          value,
          attempts: attempt,
          totalDurationMs,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        this.logger.error(`${operationName} - attempt ${attempt} failed:`, lastError);

        if (finalConfig.shouldRetry && !finalConfig.shouldRetry(lastError)) {
          this.logger.log(`${operationName} - error is not retryable, giving up`);
          break;
        }

        if (attempt < finalConfig.maxAttempts) {
          this.logger.log(`Retrying in ${delayMs}ms...`);
          await this.sleep(delayMs, signal);

          delayMs = Math.min(delayMs * finalConfig.backoffMultiplier, finalConfig.maxDelayMs);
        }
      }
    }

    const totalDurationMs = Date.now() - startTime;

    this.logger.error(
      `${operationName} failed after ${attempt} attempt(s) in ${totalDurationMs}ms`,
      lastError
    );

    return {
      success: false,
      error: lastError,
      attempts: attempt,
      totalDurationMs,
    };
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  /**
   * Creates a retry configuration with custom values.
   *
   * @param overrides - Partial configuration to override defaults
   * @returns Complete retry configuration
   */
  public static createConfig(overrides: Partial<RetryConfig>): RetryConfig {
    return { ...DEFAULT_RETRY_CONFIG, ...overrides };
  }
}
