/**
 * ErrorReporter - Structured logging with user-friendly messages
 *
 * Provides centralized error reporting that separates user-facing messages
 * from technical logging. Ensures consistent error ID usage and severity tracking.
 *
 * @example
 * ```typescript
 * const errorReporter = new ErrorReporter(logger);
 *
 * errorReporter.reportError({
 *   errorId: 'POLLER_001',
 *   severity: ErrorSeverity.MEDIUM,
 *   userMessage: 'Change listener failed',
 *   technicalMessage: 'onChanges threw: Cannot read properties of undefined',
 *   context: { host: '192.168.1.20' }
 * });
 * ```
 */

import { Logger, ErrorContext, ErrorSeverity, GatewayFailure } from './ErrorTypes';

export class ErrorReporter {
  private logger: Logger;

  /**
   * @param logger - Logger for error reporting
   */
  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Reports an error with structured context.
   *
   * Logs `[<errorId>] [<SEVERITY>] <message>` with the technical message
   * when present, followed by the JSON context.
   *
   * @param errorContext - Error context with ID, severity, and messages
   */
  public reportError(errorContext: ErrorContext): void {
    const {
      errorId,
      severity,
      userMessage,
      technicalMessage,
      context,
    } = errorContext;

    const logMessage = technicalMessage || userMessage;
    const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';

    this.logger.error(
      `[${errorId}] [${severity.toUpperCase()}] ${logMessage}${contextStr}`
    );
  }

  /**
   * Reports a classified gateway failure under its own error ID.
   *
   * @param failure - Failure returned by a pipeline stage
   * @param severity - Severity level
   * @param technicalMessage - Optional detail; defaults to the failure kind and message
   * @param context - Optional additional context data
   */
  public reportFailure(
    failure: GatewayFailure,
    severity: ErrorSeverity,
    technicalMessage?: string,
    context?: Record<string, unknown>
  ): void {
    this.reportError({
      errorId: failure.errorId,
      severity,
      userMessage: failure.message,
      technicalMessage: technicalMessage ?? `${failure.kind}: ${failure.message}`,
      context,
    });
  }

  /**
   * Creates an error context object.
   *
   * @param errorId - Error ID
   * @param severity - Error severity level
   * @param userMessage - User-friendly message
   * @param technicalMessage - Optional technical details
   * @param context - Optional additional context data
   * @returns Complete error context
   */
  public static createContext(
    errorId: string,
    severity: ErrorSeverity,
    userMessage: string,
    technicalMessage?: string,
    context?: Record<string, unknown>
  ): ErrorContext {
    return {
      errorId,
      severity,
      userMessage,
      technicalMessage,
      context,
    };
  }
}
