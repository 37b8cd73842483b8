/**
 * GatewayPoller - Poll driver for a beacon gateway
 *
 * Owns the schedule and the change cache. Each cycle runs
 * `IDLE → FETCHING → DECODING → DIFFING → IDLE`:
 * 1. Fetch the raw history through the transport
 * 2. Decode it into typed records
 * 3. Diff against the cache, commit the new state, emit the changed records
 *
 * Any classified failure (InvalidAuth, CannotConnect, DecodeError) ends the
 * cycle at its stage, leaves the cache untouched and is surfaced to the
 * listener. The next tick runs independently; there is no backoff.
 *
 * Cycles never overlap: the interval manager skips a tick that fires while
 * a cycle is in flight. Stopping aborts the in-flight request; a cycle
 * aborted that way commits nothing and reports nothing.
 *
 * @example
 * ```typescript
 * const poller = new GatewayPoller({
 *   transport: new GatewayClient({ logger }),
 *   settings,
 *   logger,
 *   listener: {
 *     onChanges: (changed) => updateSensors(changed),
 *     onFailure: (failure) => markUnavailable(failure.message),
 *   },
 * });
 * poller.start();
 * ```
 */

import { PollerErrorId } from '../constants/errorIds';
import { AsyncIntervalManager } from './AsyncIntervalManager';
import { ChangeCacheState, createChangeCacheState, diffHistory } from './ChangeCache';
import { ErrorClassifier } from './ErrorClassifier';
import { ErrorReporter } from './ErrorReporter';
import { ErrorSeverity, GatewayFailure, GatewayResult, Logger } from './ErrorTypes';
import type { HistoryTransport } from './GatewayClient';
import { decodeHistory } from './HistoryDecoder';
import type { BeaconRecord, GatewaySettings, HistoryResponse } from './types';

/**
 * Stage of the current cycle
 */
export enum PollPhase {
  IDLE = 'idle',
  FETCHING = 'fetching',
  DECODING = 'decoding',
  DIFFING = 'diffing',
}

/**
 * Outcome of one cycle
 */
export type CycleOutcome =
  | { kind: 'changes'; changed: BeaconRecord[]; response: HistoryResponse }
  | { kind: 'failure'; failure: GatewayFailure }
  | { kind: 'cancelled' };

/**
 * Host callbacks. `onChanges` fires after every successful cycle, with an
 * empty list when nothing changed.
 */
export interface GatewayPollerListener {
  onChanges(changed: BeaconRecord[], response: HistoryResponse): void | Promise<void>;
  onFailure?(failure: GatewayFailure): void | Promise<void>;
}

export interface GatewayPollerConfig {
  transport: HistoryTransport;
  settings: GatewaySettings;
  listener: GatewayPollerListener;
  logger: Logger;
  /** Name used in logs; defaults to `Gateway <host>` */
  name?: string;
}

/**
 * Snapshot of the poller for status displays
 */
export interface PollerStatus {
  phase: PollPhase;
  /** Whether the last completed cycle succeeded */
  lastUpdateSuccess: boolean;
  lastFailure?: GatewayFailure;
  consecutiveFailures: number;
  lastSuccessAt?: Date;
  /** Cycles that ran to success or failure (cancelled ones excluded) */
  completedCycles: number;
  skippedTicks: number;
  /** Number of identifiers held in the change cache */
  cachedBeacons: number;
}

export class GatewayPoller {
  private readonly transport: HistoryTransport;
  private readonly settings: GatewaySettings;
  private readonly listener: GatewayPollerListener;
  private readonly logger: Logger;
  private readonly name: string;
  private readonly classifier: ErrorClassifier;
  private readonly errorReporter: ErrorReporter;
  private readonly interval: AsyncIntervalManager;

  private cacheState: ChangeCacheState = createChangeCacheState();
  private phase: PollPhase = PollPhase.IDLE;
  private lastOutcome?: CycleOutcome;
  private lastUpdateSuccess = false;
  private lastFailure?: GatewayFailure;
  private consecutiveFailures = 0;
  private lastSuccessAt?: Date;
  private completedCycles = 0;
  private reportedUnavailable = false;
  private stopped = false;

  constructor(config: GatewayPollerConfig) {
    this.transport = config.transport;
    this.settings = config.settings;
    this.listener = config.listener;
    this.logger = config.logger;
    this.name = config.name ?? `Gateway ${config.settings.host}`;
    this.classifier = new ErrorClassifier(config.logger);
    this.errorReporter = new ErrorReporter(config.logger);
    this.interval = new AsyncIntervalManager({
      operation: async (signal) => {
        await this.runCycle(signal);
      },
      intervalMs: config.settings.pollIntervalMs,
      logger: config.logger,
      name: this.name,
    });
  }

  /**
   * Starts polling. The first cycle runs immediately.
   */
  public start(): void {
    this.stopped = false;
    this.interval.start();
  }

  /**
   * Stops polling. Aborts the in-flight request and resolves once that
   * cycle has settled; no further cycle starts afterwards.
   */
  public async stop(): Promise<void> {
    this.stopped = true;
    await this.interval.stop();
  }

  /**
   * Runs a cycle now, or joins the one in flight, and returns its outcome.
   */
  public async refresh(): Promise<CycleOutcome> {
    if (this.stopped) {
      return { kind: 'cancelled' };
    }
    await this.interval.runNow();
    return this.lastOutcome ?? { kind: 'cancelled' };
  }

  public isRunning(): boolean {
    return this.interval.isActive();
  }

  public getPhase(): PollPhase {
    return this.phase;
  }

  public getStatus(): PollerStatus {
    return {
      phase: this.phase,
      lastUpdateSuccess: this.lastUpdateSuccess,
      lastFailure: this.lastFailure,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      completedCycles: this.completedCycles,
      skippedTicks: this.interval.getSkippedTickCount(),
      cachedBeacons: this.cacheState.size,
    };
  }

  private async runCycle(signal: AbortSignal): Promise<void> {
    try {
      this.lastOutcome = await this.executeCycle(signal);
    } finally {
      this.phase = PollPhase.IDLE;
    }
  }

  private async executeCycle(signal: AbortSignal): Promise<CycleOutcome> {
    this.phase = PollPhase.FETCHING;
    let fetched: GatewayResult<unknown>;
    try {
      fetched = await this.transport.fetchHistory({
        host: this.settings.host,
        bearerToken: this.settings.bearerToken,
        timeoutMs: this.settings.requestTimeoutMs,
        signal,
      });
    } catch (error) {
      fetched = { ok: false, failure: this.classifier.classifyRequestError(error) };
    }

    if (signal.aborted) {
      this.logger.log(`${this.name}: cycle cancelled`);
      return { kind: 'cancelled' };
    }
    if (!fetched.ok) {
      return this.handleFailure(fetched.failure);
    }

    this.phase = PollPhase.DECODING;
    const decoded = decodeHistory(fetched.value);
    if (!decoded.ok) {
      return this.handleFailure(decoded.failure);
    }

    this.phase = PollPhase.DIFFING;
    const { changed, state } = diffHistory(this.cacheState, decoded.value);
    this.cacheState = state;

    return this.handleSuccess(changed, decoded.value);
  }

  private async handleSuccess(changed: BeaconRecord[], response: HistoryResponse): Promise<CycleOutcome> {
    if (this.reportedUnavailable) {
      this.logger.log(`${this.name} is back online`);
      this.reportedUnavailable = false;
    }

    this.lastUpdateSuccess = true;
    this.lastFailure = undefined;
    this.consecutiveFailures = 0;
    this.lastSuccessAt = new Date();
    this.completedCycles++;

    if (changed.length > 0) {
      this.logger.log(`${this.name}: ${changed.length} of ${response.records.length} beacon(s) changed`);
    }

    try {
      await this.listener.onChanges(changed, response);
    } catch (error) {
      this.reportListenerError('onChanges', error);
    }

    return { kind: 'changes', changed, response };
  }

  private async handleFailure(failure: GatewayFailure): Promise<CycleOutcome> {
    this.lastUpdateSuccess = false;
    this.lastFailure = failure;
    this.consecutiveFailures++;
    this.completedCycles++;

    if (!this.reportedUnavailable) {
      const classification = this.classifier.classifyFailure(failure);
      this.errorReporter.reportFailure(
        failure,
        this.classifier.getSeverity(failure),
        this.classifier.getTechnicalMessage(classification, failure),
        { gateway: this.name, phase: this.phase }
      );
      this.reportedUnavailable = true;
    } else {
      this.logger.log(
        `${this.name} still unavailable (${this.consecutiveFailures} consecutive failures): ${failure.message}`
      );
    }

    if (this.listener.onFailure) {
      try {
        await this.listener.onFailure(failure);
      } catch (error) {
        this.reportListenerError('onFailure', error);
      }
    }

    return { kind: 'failure', failure };
  }

  private reportListenerError(callback: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.errorReporter.reportError(
      ErrorReporter.createContext(
        PollerErrorId.LISTENER_FAILED,
        ErrorSeverity.MEDIUM,
        'Gateway listener failed',
        `${callback} threw: ${err.message}`,
        { gateway: this.name }
      )
    );
  }
}
