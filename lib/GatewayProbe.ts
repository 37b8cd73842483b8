/**
 * GatewayProbe - One-off reachability and credentials check
 *
 * Fetches the history once before polling starts and derives the gateway's
 * identity from it. CannotConnect failures are retried with backoff (a gateway
 * that is still booting gets a few chances); InvalidAuth and DecodeError are
 * returned on the first attempt. Aborting `signal` cancels the request in
 * flight and any pending retry.
 */

import { ProbeErrorId } from '../constants/errorIds';
import { GatewayErrorKind, GatewayResult, Logger, RetryConfig } from './ErrorTypes';
import type { GatewayClient } from './GatewayClient';
import { GatewayError, failure, isGatewayError, success, unwrapResult } from './GatewayErrors';
import { buildGatewayTitle, formatMac, getGatewayIdentifierSuffix } from './MacAddress';
import { RetryManager } from './RetryManager';
import type { GatewaySettings, HistoryResponse } from './types';

/**
 * Identity of a reachable gateway
 */
export interface GatewayIdentity {
  /** Normalized gateway MAC, lower-case and colon separated */
  uniqueId: string;
  /** Display title, e.g. `Beacon Gateway EE:FF` */
  title: string;
  gatewayIdentifierSuffix: string;
  /** The response fetched while probing */
  response: HistoryResponse;
}

export interface ProbeOptions {
  logger: Logger;
  /** Overrides for the retry schedule */
  retry?: Partial<RetryConfig>;
  /** Abandons the probe, including any wait between attempts */
  signal?: AbortSignal;
}

export const PROBE_RETRY_CONFIG = RetryManager.createConfig({
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
});

/**
 * Probes the gateway described by `settings`.
 *
 * @returns Identity on success, otherwise the last classified failure
 */
export async function probeGateway(
  client: Pick<GatewayClient, 'fetchGatewayHistory'>,
  settings: GatewaySettings,
  options: ProbeOptions
): Promise<GatewayResult<GatewayIdentity>> {
  const retryManager = new RetryManager(options.logger);

  const result = await retryManager.retryWithBackoff(
    async () =>
      unwrapResult(
        await client.fetchGatewayHistory({
          host: settings.host,
          bearerToken: settings.bearerToken,
          timeoutMs: settings.requestTimeoutMs,
          signal: options.signal,
        })
      ),
    `Probe gateway ${settings.host}`,
    {
      ...PROBE_RETRY_CONFIG,
      ...options.retry,
      shouldRetry: (error) => isGatewayError(error) && error.kind === GatewayErrorKind.CANNOT_CONNECT,
      signal: options.signal,
    }
  );

  if (options.signal?.aborted) {
    return failure(
      GatewayErrorKind.CANNOT_CONNECT,
      `Probe of ${settings.host} was cancelled`,
      ProbeErrorId.PROBE_CANCELLED
    );
  }

  if (result.success && result.value) {
    const response = result.value;
    return success({
      uniqueId: formatMac(response.gatewayIdentifier),
      title: buildGatewayTitle(response.gatewayIdentifier),
      gatewayIdentifierSuffix: getGatewayIdentifierSuffix(response.gatewayIdentifier),
      response,
    });
  }

  if (result.error instanceof GatewayError) {
    return { ok: false, failure: result.error.failure };
  }

  return failure(
    GatewayErrorKind.CANNOT_CONNECT,
    `Probe of ${settings.host} failed: ${result.error?.message ?? 'unknown error'}`,
    ProbeErrorId.PROBE_FAILED,
    { cause: result.error }
  );
}
