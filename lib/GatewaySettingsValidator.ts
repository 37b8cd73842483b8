/**
 * GatewaySettingsValidator - Validation for gateway connection settings
 *
 * Host is the only required field and is validated strictly; numeric settings
 * are forgiving (invalid values fall back to defaults, out-of-range values are
 * clamped) so a typo in an interval never prevents polling.
 *
 * @module GatewaySettingsValidator
 */

import { SettingsErrorId } from '../constants/errorIds';
import type { Logger } from './ErrorTypes';
import { GatewayDefaults, GatewaySettings } from './types';

/**
 * Raw settings as entered by a user or read from the environment
 */
export interface GatewaySettingsInput {
  host?: unknown;
  token?: unknown;
  pollIntervalMs?: unknown;
  requestTimeoutMs?: unknown;
}

export type GatewaySettingsValidation =
  | { valid: true; settings: GatewaySettings }
  | { valid: false; errors: Record<string, string> };

/**
 * Host name, IPv4 address or bracketed IPv6 address, with an optional port.
 */
const HOST_PATTERN = /^(?:\[[0-9a-fA-F:.]+\]|[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?)(?::(\d{1,5}))?$/;

/**
 * Trims a bearer token; empty-after-trim and non-string values are absent.
 *
 * @example
 * ```typescript
 * normalizeBearerToken('  test-secret '); // 'test-secret'
 * normalizeBearerToken('   ');            // undefined
 * ```
 */
export function normalizeBearerToken(token: unknown): string | undefined {
  if (typeof token !== 'string') {
    return undefined;
  }
  const trimmed = token.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Validates gateway settings.
 *
 * **Validation Rules:**
 * - `host`: required, trimmed, host name / IPv4 / `[IPv6]` with optional `:port` (1-65535)
 * - `token`: trimmed; blank means no token
 * - `pollIntervalMs`: default 5000, clamped to [1000, 3600000]
 * - `requestTimeoutMs`: absent or non-numeric means unbounded, otherwise clamped to [100, 600000]
 *
 * @param input - Raw settings object
 * @param logger - Optional logger for rejected settings
 * @returns Typed settings, or field errors keyed by field name
 */
export function validateGatewaySettings(input: unknown, logger?: Logger): GatewaySettingsValidation {
  if (!input || typeof input !== 'object') {
    return reject({ base: 'Settings must be an object' }, logger);
  }

  const raw: GatewaySettingsInput = input;
  const errors: Record<string, string> = {};

  const host = typeof raw.host === 'string' ? raw.host.trim() : '';
  if (host === '') {
    errors.host = 'Host is required';
  } else if (!isValidHost(host)) {
    errors.host = 'Host must be a host name or address with an optional port';
  }

  if (Object.keys(errors).length > 0) {
    return reject(errors, logger);
  }

  const settings: GatewaySettings = {
    host,
    pollIntervalMs: validateNumber(
      raw.pollIntervalMs,
      GatewayDefaults.POLL_INTERVAL_MS,
      GatewayDefaults.MIN_POLL_INTERVAL_MS,
      GatewayDefaults.MAX_POLL_INTERVAL_MS
    ),
  };

  const bearerToken = normalizeBearerToken(raw.token);
  if (bearerToken !== undefined) {
    settings.bearerToken = bearerToken;
  }

  const requestTimeoutMs = validateOptionalNumber(
    raw.requestTimeoutMs,
    GatewayDefaults.MIN_REQUEST_TIMEOUT_MS,
    GatewayDefaults.MAX_REQUEST_TIMEOUT_MS
  );
  if (requestTimeoutMs !== undefined) {
    settings.requestTimeoutMs = requestTimeoutMs;
  }

  return { valid: true, settings };
}

/**
 * Reads settings from `GATEWAY_HOST`, `GATEWAY_TOKEN`,
 * `GATEWAY_POLL_INTERVAL_MS` and `GATEWAY_REQUEST_TIMEOUT_MS`.
 * Blank variables count as absent.
 */
export function readGatewaySettingsFromEnv(env: NodeJS.ProcessEnv): GatewaySettingsInput {
  return {
    host: blankToUndefined(env.GATEWAY_HOST),
    token: blankToUndefined(env.GATEWAY_TOKEN),
    pollIntervalMs: toNumber(env.GATEWAY_POLL_INTERVAL_MS),
    requestTimeoutMs: toNumber(env.GATEWAY_REQUEST_TIMEOUT_MS),
  };
}

/**
 * Validates a numeric setting value against min/max constraints.
 *
 * **Validation Rules:**
 * - Non-numeric values return default
 * - NaN values return default
 * - Values < min are clamped to min
 * - Values > max are clamped to max
 *
 * @example
 * ```typescript
 * validateNumber(42, 10, 0, 100);  // Returns: 42
 * validateNumber(150, 10, 0, 100); // Returns: 100 (clamped to max)
 * validateNumber('abc', 10, 0, 100); // Returns: 10 (invalid type, use default)
 * ```
 */
export function validateNumber(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return defaultValue;
  }

  if (value < min) {
    return min;
  }

  if (value > max) {
    return max;
  }

  return value;
}

/**
 * Like `validateNumber`, but an invalid value means "not set".
 */
function validateOptionalNumber(value: unknown, min: number, max: number): number | undefined {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return undefined;
  }
  return validateNumber(value, min, min, max);
}

function isValidHost(host: string): boolean {
  const match = HOST_PATTERN.exec(host);
  if (!match) {
    return false;
  }
  if (match[1] === undefined) {
    return true;
  }
  const port = Number(match[1]);
  return port >= 1 && port <= 65535;
}

function reject(errors: Record<string, string>, logger?: Logger): GatewaySettingsValidation {
  logger?.error(`[${SettingsErrorId.INVALID_SETTINGS}] Invalid gateway settings:`, errors);
  return { valid: false, errors };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function toNumber(value: string | undefined): number | undefined {
  const present = blankToUndefined(value);
  return present === undefined ? undefined : Number(present);
}
