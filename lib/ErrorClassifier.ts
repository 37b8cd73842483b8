/**
 * ErrorClassifier - Turns transport outcomes into classified gateway failures
 *
 * Maps HTTP statuses and request exceptions to `GatewayFailure` values
 * (InvalidAuth / CannotConnect), and classifies any failure into a recovery
 * category with a reason code and a user-facing message.
 *
 * @example
 * ```typescript
 * const classifier = new ErrorClassifier(logger);
 * const statusFailure = classifier.classifyStatus(response.status);
 * if (statusFailure) {
 *   return { ok: false, failure: statusFailure };
 * }
 *
 * const classification = classifier.classifyFailure(failure);
 * logger.log(classifier.getUserMessage(classification));
 * ```
 */

import axios from 'axios';
import { GatewayClientErrorId } from '../constants/errorIds';
import { ErrorSeverity, GatewayErrorKind, GatewayFailure, Logger } from './ErrorTypes';

/**
 * Error categories for recovery strategy selection
 */
export enum ErrorCategory {
  /** Error is permanent, retrying won't help */
  PERMANENT = 'PERMANENT',
  /** Error is transient, retrying may succeed */
  TRANSIENT = 'TRANSIENT',
  /** Operation timed out */
  TIMEOUT = 'TIMEOUT',
  /** Unknown error type */
  UNKNOWN = 'UNKNOWN',
}

/**
 * Specific error reason codes for detailed tracking
 */
export enum ErrorReasonCode {
  /** Gateway rejected the bearer token */
  UNAUTHORIZED = 'UNAUTHORIZED',
  /** Request cancelled by the caller */
  CANCELLED = 'CANCELLED',

  /** Gateway answered with an unexpected HTTP status */
  UNEXPECTED_STATUS = 'UNEXPECTED_STATUS',
  /** Network request failed */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Body was not JSON */
  INVALID_JSON = 'INVALID_JSON',
  /** JSON did not match the history schema */
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',

  /** Operation exceeded timeout */
  OPERATION_TIMEOUT = 'OPERATION_TIMEOUT',

  /** Unclassified error */
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Error classification result
 */
export interface ErrorClassification {
  /** Error category */
  category: ErrorCategory;
  /** Specific reason code */
  reasonCode: ErrorReasonCode;
}

export const FailureMessages = {
  INVALID_AUTH: 'Gateway rejected the bearer token',
  TIMEOUT: 'Timeout communicating with gateway',
  CONNECTION: 'Error communicating with gateway',
  CANCELLED: 'Request to gateway was cancelled',
  INVALID_JSON: 'Invalid response from gateway',
} as const;

/**
 * ErrorClassifier - Analyzes transport outcomes and failures
 */
export class ErrorClassifier {
  private logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Classifies an HTTP status.
   *
   * @param status - HTTP status returned by the gateway
   * @returns Failure for anything but 200, otherwise undefined
   */
  public classifyStatus(status: number): GatewayFailure | undefined {
    if (status === 200) {
      return undefined;
    }

    if (status === 401) {
      return {
        kind: GatewayErrorKind.INVALID_AUTH,
        message: FailureMessages.INVALID_AUTH,
        errorId: GatewayClientErrorId.INVALID_AUTH,
        status,
      };
    }

    return {
      kind: GatewayErrorKind.CANNOT_CONNECT,
      message: `Unexpected response from gateway: HTTP ${status}`,
      errorId: GatewayClientErrorId.UNEXPECTED_STATUS,
      status,
    };
  }

  /**
   * Classifies an exception raised while performing the request.
   *
   * Every request exception is a CannotConnect failure; the error ID tells
   * cancellation, timeout and connection failures apart.
   *
   * @param error - Value thrown by the HTTP client
   */
  public classifyRequestError(error: unknown): GatewayFailure {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (axios.isCancel(error)) {
      return this.connectFailure(FailureMessages.CANCELLED, GatewayClientErrorId.REQUEST_CANCELLED, cause);
    }

    if (this.isTimeoutError(error)) {
      return this.connectFailure(FailureMessages.TIMEOUT, GatewayClientErrorId.REQUEST_TIMEOUT, cause);
    }

    if (!axios.isAxiosError(error)) {
      this.logger?.log(`Unknown request error, treating as connection failure: ${cause.message}`);
    }

    return this.connectFailure(FailureMessages.CONNECTION, GatewayClientErrorId.CONNECTION_FAILED, cause);
  }

  /**
   * Builds the failure for a request the caller's timer aborted.
   *
   * @param error - Value thrown by the HTTP client once aborted
   */
  public classifyTimeout(error: unknown): GatewayFailure {
    const cause = error instanceof Error ? error : new Error(String(error));
    return this.connectFailure(FailureMessages.TIMEOUT, GatewayClientErrorId.REQUEST_TIMEOUT, cause);
  }

  /**
   * Classifies a failure into category and reason code.
   *
   * @param failure - Failure produced by any pipeline stage
   */
  public classifyFailure(failure: GatewayFailure): ErrorClassification {
    switch (failure.kind) {
      case GatewayErrorKind.INVALID_AUTH:
        return {
          category: ErrorCategory.PERMANENT,
          reasonCode: ErrorReasonCode.UNAUTHORIZED,
        };
      case GatewayErrorKind.DECODE_ERROR:
        return {
          category: ErrorCategory.TRANSIENT,
          reasonCode: ErrorReasonCode.INVALID_PAYLOAD,
        };
      case GatewayErrorKind.CANNOT_CONNECT:
        return this.classifyConnectFailure(failure);
    }
  }

  /**
   * Gets severity used when reporting a failure.
   */
  public getSeverity(failure: GatewayFailure): ErrorSeverity {
    return failure.kind === GatewayErrorKind.INVALID_AUTH
      ? ErrorSeverity.HIGH
      : ErrorSeverity.MEDIUM;
  }

  /**
   * Gets user-friendly message for error classification.
   */
  public getUserMessage(classification: ErrorClassification): string {
    switch (classification.reasonCode) {
      case ErrorReasonCode.UNAUTHORIZED:
        return 'Authentication failed. Check the gateway bearer token.';
      case ErrorReasonCode.CANCELLED:
        return 'Request cancelled.';
      case ErrorReasonCode.UNEXPECTED_STATUS:
        return 'Gateway returned an unexpected response. Will retry.';
      case ErrorReasonCode.NETWORK_ERROR:
        return 'Cannot reach the gateway. Check the host address and network.';
      case ErrorReasonCode.INVALID_JSON:
        return 'Gateway sent an unreadable response. Will retry.';
      case ErrorReasonCode.INVALID_PAYLOAD:
        return 'Gateway sent incomplete beacon data. Will retry.';
      case ErrorReasonCode.OPERATION_TIMEOUT:
        return 'Gateway did not answer in time. Will retry.';
      default:
        return 'Unexpected error occurred. Will retry.';
    }
  }

  /**
   * Gets technical message for error classification.
   */
  public getTechnicalMessage(
    classification: ErrorClassification,
    failure: GatewayFailure
  ): string {
    const causeStr = failure.cause ? ` (${failure.cause.message})` : '';
    return `[${classification.category}:${classification.reasonCode}] ${failure.message}${causeStr}`;
  }

  private classifyConnectFailure(failure: GatewayFailure): ErrorClassification {
    switch (failure.errorId) {
      case GatewayClientErrorId.REQUEST_TIMEOUT:
        return {
          category: ErrorCategory.TIMEOUT,
          reasonCode: ErrorReasonCode.OPERATION_TIMEOUT,
        };
      case GatewayClientErrorId.REQUEST_CANCELLED:
        return {
          category: ErrorCategory.PERMANENT,
          reasonCode: ErrorReasonCode.CANCELLED,
        };
      case GatewayClientErrorId.UNEXPECTED_STATUS:
        return {
          category: ErrorCategory.TRANSIENT,
          reasonCode: ErrorReasonCode.UNEXPECTED_STATUS,
        };
      case GatewayClientErrorId.INVALID_JSON:
        return {
          category: ErrorCategory.TRANSIENT,
          reasonCode: ErrorReasonCode.INVALID_JSON,
        };
      case GatewayClientErrorId.CONNECTION_FAILED:
        return {
          category: ErrorCategory.TRANSIENT,
          reasonCode: ErrorReasonCode.NETWORK_ERROR,
        };
      default:
        return {
          category: ErrorCategory.UNKNOWN,
          reasonCode: ErrorReasonCode.UNKNOWN_ERROR,
        };
    }
  }

  private connectFailure(message: string, errorId: GatewayClientErrorId, cause: Error): GatewayFailure {
    return {
      kind: GatewayErrorKind.CANNOT_CONNECT,
      message,
      errorId,
      cause,
    };
  }

  private isTimeoutError(error: unknown): boolean {
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
      return true;
    }
    const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
    const timeoutPatterns = ['timeout', 'timed out', 'time out', 'deadline exceeded'];
    return timeoutPatterns.some((pattern) => message.includes(pattern));
  }
}
