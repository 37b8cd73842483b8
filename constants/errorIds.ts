/**
 * Error ID constants for tracking gateway transport failures.
 *
 * These IDs enable error aggregation, filtering, and analysis in logs.
 * Each failure carries its ID so a log line can be traced to the exact
 * classification branch that produced it.
 *
 * @example
 * ```typescript
 * this.logger.error(
 *   `[${GatewayClientErrorId.REQUEST_TIMEOUT}] Timeout communicating with gateway`
 * );
 * ```
 */
export enum GatewayClientErrorId {
  /** Gateway answered HTTP 401 */
  INVALID_AUTH = 'GATEWAY_CLIENT_001',

  /** Gateway answered with a status other than 200 or 401 */
  UNEXPECTED_STATUS = 'GATEWAY_CLIENT_002',

  /** Request did not complete within the configured timeout */
  REQUEST_TIMEOUT = 'GATEWAY_CLIENT_003',

  /** Connection could not be established or was dropped */
  CONNECTION_FAILED = 'GATEWAY_CLIENT_004',

  /** Response body was not valid JSON */
  INVALID_JSON = 'GATEWAY_CLIENT_005',

  /** Request was aborted by the caller */
  REQUEST_CANCELLED = 'GATEWAY_CLIENT_006',
}

/**
 * Error ID constants for history payload decoding failures.
 */
export enum HistoryDecoderErrorId {
  /** Top-level envelope or gateway fields missing or mistyped */
  INVALID_ENVELOPE = 'HISTORY_DECODER_001',

  /** A tag entry is missing a field or has a mistyped one */
  INVALID_TAG = 'HISTORY_DECODER_002',

  /** A tag's advertisement payload is not valid hex */
  INVALID_PAYLOAD_HEX = 'HISTORY_DECODER_003',

  /** Two tag keys normalize to the same identifier */
  DUPLICATE_IDENTIFIER = 'HISTORY_DECODER_004',
}

/**
 * Error ID constants for the poll driver.
 *
 * @example
 * ```typescript
 * this.errorReporter.reportError({
 *   errorId: PollerErrorId.LISTENER_FAILED,
 *   severity: ErrorSeverity.MEDIUM,
 *   userMessage: 'Change listener failed',
 * });
 * ```
 */
export enum PollerErrorId {
  /** Host listener threw while handling changes or a failure */
  LISTENER_FAILED = 'POLLER_001',
}

/**
 * Error ID constants for the one-off gateway probe.
 */
export enum ProbeErrorId {
  /** Probe gave up after exhausting its attempts */
  PROBE_FAILED = 'PROBE_001',
  /** Probe abandoned because shutdown was requested */
  PROBE_CANCELLED = 'PROBE_002',
}

/**
 * Error ID constants for settings validation.
 */
export enum SettingsErrorId {
  /** Settings rejected during validation */
  INVALID_SETTINGS = 'SETTINGS_001',
}
