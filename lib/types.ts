/**
 * Type definitions for the beacon gateway poller
 *
 * Core domain records produced by the history decoder, plus the settings the
 * transport and poll driver consume.
 */

/**
 * One beacon sighting reported by the gateway.
 *
 * @interface BeaconRecord
 * @property {string} identifier - Hardware address, trimmed and upper-cased
 * @property {number} signalStrength - RSSI in dBm
 * @property {number} timestamp - Seconds since epoch, as reported by the gateway
 * @property {Uint8Array} payload - Raw advertisement bytes, never empty
 * @property {number} [ageSeconds] - Response timestamp minus record timestamp; absent when the gateway clock is unset
 */
export interface BeaconRecord {
  identifier: string;
  signalStrength: number;
  timestamp: number;
  payload: Uint8Array;
  ageSeconds?: number;
}

/**
 * Decoded `/history` response.
 *
 * Records keep the order of the gateway's `tags` mapping.
 */
export interface HistoryResponse {
  timestamp: number;
  gatewayIdentifier: string;
  records: BeaconRecord[];
  coordinates: string;
}

/**
 * Validated gateway settings.
 *
 * @interface GatewaySettings
 * @property {string} host - Host name or address, optionally with `:port`
 * @property {string} [bearerToken] - Sent as `Authorization: Bearer` when present
 * @property {number} pollIntervalMs - Period between poll ticks
 * @property {number} [requestTimeoutMs] - Bound on one request; unbounded when absent
 */
export interface GatewaySettings {
  host: string;
  bearerToken?: string;
  pollIntervalMs: number;
  requestTimeoutMs?: number;
}

/**
 * Default values and limits for gateway settings
 */
export const GatewayDefaults = {
  POLL_INTERVAL_MS: 5000,
  MIN_POLL_INTERVAL_MS: 1000,
  MAX_POLL_INTERVAL_MS: 3600000,
  MIN_REQUEST_TIMEOUT_MS: 100,
  MAX_REQUEST_TIMEOUT_MS: 600000,
  HISTORY_PATH: '/history',
} as const;

/**
 * Converts a gateway timestamp (seconds since epoch) to a Date.
 */
export function toDate(timestampSeconds: number): Date {
  return new Date(timestampSeconds * 1000);
}
