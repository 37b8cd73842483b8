/**
 * Gateway failure helpers
 *
 * The pipeline returns `GatewayResult` values instead of throwing. This module
 * builds those values and provides `GatewayError` for the few call sites that
 * have to cross a throwing boundary (retry orchestration, `unwrapResult`).
 */

import { GatewayErrorKind, GatewayFailure, GatewayResult } from './ErrorTypes';

/**
 * Error carrying a classified gateway failure.
 */
export class GatewayError extends Error {
  public readonly failure: GatewayFailure;
  public readonly errorId: string;

  constructor(failure: GatewayFailure) {
    super(failure.message);
    this.name = 'GatewayError';
    this.failure = failure;
    this.errorId = failure.errorId;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GatewayError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GatewayError);
    }
  }

  public get kind(): GatewayErrorKind {
    return this.failure.kind;
  }
}

export function success<T>(value: T): GatewayResult<T> {
  return { ok: true, value };
}

/**
 * Builds a failed result.
 *
 * @param kind - Failure kind surfaced to the host
 * @param message - Human-readable message
 * @param errorId - Error ID for log correlation
 * @param extra - Optional HTTP status and underlying cause
 */
export function failure<T = never>(
  kind: GatewayErrorKind,
  message: string,
  errorId: string,
  extra: { status?: number; cause?: Error } = {}
): GatewayResult<T> {
  return {
    ok: false,
    failure: { kind, message, errorId, ...extra },
  };
}

/**
 * Returns the value of a successful result or throws its failure as a
 * `GatewayError`.
 */
export function unwrapResult<T>(result: GatewayResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new GatewayError(result.failure);
}

/**
 * Checks whether an unknown thrown value is a `GatewayError`.
 */
export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
