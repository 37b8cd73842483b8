/**
 * ErrorTypes - Shared type definitions for error handling utilities
 *
 * Provides the logger contract, retry configuration, severity levels and the
 * classified failure model shared by the transport, decoder and poll driver.
 */

/**
 * Logger interface. `console` satisfies it, as does any host logger with
 * `log` and `error`.
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxAttempts: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: number;
  /** Multiplier for exponential backoff (e.g., 2 = double delay each retry) */
  backoffMultiplier: number;
  /** Returns false to stop retrying after the given error */
  shouldRetry?: (error: Error) => boolean;
  /** Stops retrying once aborted and cuts the current wait short */
  signal?: AbortSignal;
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result value if successful */
  value?: T;
  /** The error if unsuccessful */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent retrying in milliseconds */
  totalDurationMs: number;
}

/**
 * Severity level for error reporting
 */
export enum ErrorSeverity {
  /** Critical error requiring immediate attention */
  CRITICAL = 'critical',
  /** High severity error affecting functionality */
  HIGH = 'high',
  /** Medium severity error with workarounds available */
  MEDIUM = 'medium',
  /** Low severity error or warning */
  LOW = 'low',
  /** Informational message */
  INFO = 'info',
}

/**
 * Error context for structured logging
 */
export interface ErrorContext {
  /** Error ID for tracking and filtering */
  errorId: string;
  /** Severity level */
  severity: ErrorSeverity;
  /** User-friendly error message */
  userMessage: string;
  /** Technical error message for logs */
  technicalMessage?: string;
  /** Additional context data */
  context?: Record<string, unknown>;
}

/**
 * Failure kinds surfaced to the host
 */
export enum GatewayErrorKind {
  /** Gateway rejected the credentials (HTTP 401) */
  INVALID_AUTH = 'InvalidAuth',
  /** Gateway unreachable, timed out, answered badly or sent non-JSON */
  CANNOT_CONNECT = 'CannotConnect',
  /** Well-formed JSON that does not match the history schema */
  DECODE_ERROR = 'DecodeError',
}

/**
 * A classified failure. Returned, never thrown, by the pipeline stages.
 */
export interface GatewayFailure {
  kind: GatewayErrorKind;
  /** Human-readable message for display */
  message: string;
  /** Error ID from constants/errorIds */
  errorId: string;
  /** HTTP status when the gateway answered */
  status?: number;
  /** Underlying exception, if any */
  cause?: Error;
}

/**
 * Discriminated result of a pipeline stage
 */
export type GatewayResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: GatewayFailure };

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};
