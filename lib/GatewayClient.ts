/**
 * GatewayClient - HTTP transport for the gateway `/history` endpoint
 *
 * Issues one GET per call and returns a `GatewayResult` instead of throwing:
 * - 401 → InvalidAuth
 * - any other non-200 status → CannotConnect (status in the message)
 * - timeout, connection failure or cancellation → CannotConnect
 *
 * The timeout runs from the moment the request is issued until the whole
 * body has arrived, so a gateway that trickles bytes is still cut off.
 * - body that is not JSON → CannotConnect
 *
 * The body is parsed as JSON whatever content type the gateway declares,
 * since some firmware labels it `text/plain`.
 *
 * @example
 * ```typescript
 * const client = new GatewayClient({ logger });
 * const result = await client.fetchGatewayHistory({
 *   host: '192.168.1.20',
 *   bearerToken: 'test-secret',
 *   timeoutMs: 3000,
 * });
 * if (result.ok) {
 *   console.log(result.value.records.length);
 * }
 * ```
 */

import axios, { AxiosInstance, RawAxiosRequestHeaders } from 'axios';
import { GatewayClientErrorId } from '../constants/errorIds';
import { ErrorClassifier, FailureMessages } from './ErrorClassifier';
import { GatewayErrorKind, GatewayResult, Logger } from './ErrorTypes';
import { failure, success } from './GatewayErrors';
import { normalizeBearerToken } from './GatewaySettingsValidator';
import { decodeHistory } from './HistoryDecoder';
import { GatewayDefaults, HistoryResponse } from './types';

/**
 * Options for a single history request
 */
export interface FetchHistoryOptions {
  /** Gateway host, optionally with `:port` */
  host: string;
  /** Bearer token; blank values send no Authorization header */
  bearerToken?: string;
  /** Bound on the whole request/response cycle; unbounded when absent */
  timeoutMs?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * Source of raw history bodies. Implemented by `GatewayClient`; tests
 * substitute their own.
 */
export interface HistoryTransport {
  fetchHistory(options: FetchHistoryOptions): Promise<GatewayResult<unknown>>;
}

export interface GatewayClientOptions {
  /** HTTP client; a shared instance reuses connections across cycles */
  http?: AxiosInstance;
  logger?: Logger;
  classifier?: ErrorClassifier;
}

export function buildHistoryUrl(host: string): string {
  return `http://${host}${GatewayDefaults.HISTORY_PATH}`;
}

export class GatewayClient implements HistoryTransport {
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;
  private readonly classifier: ErrorClassifier;

  constructor(options: GatewayClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger;
    this.classifier = options.classifier ?? new ErrorClassifier(options.logger);
  }

  /**
   * Fetches the raw history body.
   *
   * @returns Parsed JSON value, or an InvalidAuth / CannotConnect failure
   */
  public async fetchHistory(options: FetchHistoryOptions): Promise<GatewayResult<unknown>> {
    const url = buildHistoryUrl(options.host);
    const headers: RawAxiosRequestHeaders = {};
    const token = normalizeBearerToken(options.bearerToken);
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const controller = new AbortController();
    const abortFromCaller = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener('abort', abortFromCaller, { once: true });

    let timedOut = false;
    const timer =
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, options.timeoutMs)
        : undefined;

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        headers,
        signal: controller.signal,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      const requestFailure = timedOut
        ? this.classifier.classifyTimeout(error)
        : this.classifier.classifyRequestError(error);
      this.logger?.log(`GET ${url} failed: ${requestFailure.message}`);
      return { ok: false, failure: requestFailure };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', abortFromCaller);
    }

    const statusFailure = this.classifier.classifyStatus(status);
    if (statusFailure) {
      return { ok: false, failure: statusFailure };
    }

    return this.parseBody(body);
  }

  /**
   * Fetches and decodes the history in one call.
   *
   * @returns Decoded response, or any of the three failure kinds
   */
  public async fetchGatewayHistory(options: FetchHistoryOptions): Promise<GatewayResult<HistoryResponse>> {
    const raw = await this.fetchHistory(options);
    if (!raw.ok) {
      return raw;
    }
    return decodeHistory(raw.value);
  }

  private parseBody(body: unknown): GatewayResult<unknown> {
    const text = typeof body === 'string' ? body : Buffer.isBuffer(body) ? body.toString('utf8') : undefined;
    if (text === undefined) {
      return failure(GatewayErrorKind.CANNOT_CONNECT, FailureMessages.INVALID_JSON, GatewayClientErrorId.INVALID_JSON);
    }

    try {
      return success<unknown>(JSON.parse(text));
    } catch (error) {
      return failure(GatewayErrorKind.CANNOT_CONNECT, FailureMessages.INVALID_JSON, GatewayClientErrorId.INVALID_JSON, {
        cause: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}
