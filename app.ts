#!/usr/bin/env node
import { executeAsyncWithLog } from './lib/AsyncHelpers';
import {
  AdvertisementDecoder,
  GapAdvertisementDecoder,
  parseAdvertisement,
  summarizeAdvertisement,
} from './lib/AdvertisementDecoder';
import { ErrorClassifier, ErrorReasonCode } from './lib/ErrorClassifier';
import { GatewayFailure, Logger, RetryConfig } from './lib/ErrorTypes';
import { GatewayClient } from './lib/GatewayClient';
import { GatewayError } from './lib/GatewayErrors';
import { GatewayPoller } from './lib/GatewayPoller';
import { GatewayIdentity, probeGateway } from './lib/GatewayProbe';
import { readGatewaySettingsFromEnv, validateGatewaySettings } from './lib/GatewaySettingsValidator';
import { BeaconRecord, toDate } from './lib/types';

export interface GatewayMonitorAppOptions {
  /** Environment to read `GATEWAY_*` settings from */
  env: NodeJS.ProcessEnv;
  logger: Logger;
  client?: GatewayClient;
  decoder?: AdvertisementDecoder;
  /** Overrides for the startup probe's retry schedule */
  probeRetry?: Partial<RetryConfig>;
}

/**
 * Host adapter that turns the poller into a runnable process.
 *
 * Responsibilities:
 * - Reading and validating settings from the environment
 * - Probing the gateway once (with retries) to learn its identity
 * - Starting the poller and logging every changed beacon with a decoded
 *   advertisement summary
 * - Logging a plain-language status line whenever the failure reason changes
 * - Cancelling the probe or stopping the poller on shutdown
 */
export class GatewayMonitorApp {
  private readonly options: GatewayMonitorAppOptions;
  private readonly logger: Logger;
  private readonly decoder: AdvertisementDecoder;
  private readonly classifier: ErrorClassifier;
  private readonly probeController = new AbortController();
  private poller?: GatewayPoller;
  private identity?: GatewayIdentity;
  private uninitRequested = false;
  private lastFailureReason?: ErrorReasonCode;

  constructor(options: GatewayMonitorAppOptions) {
    this.options = options;
    this.logger = options.logger;
    this.decoder = options.decoder ?? new GapAdvertisementDecoder();
    this.classifier = new ErrorClassifier(options.logger);
  }

  /**
   * Validates settings, probes the gateway and starts polling. Resolves
   * without polling when `onUninit` was called first.
   *
   * @throws Error if settings are invalid
   * @throws GatewayError if the probe fails
   */
  async onInit(): Promise<void> {
    this.logger.log('Beacon gateway monitor initializing...');

    const validation = validateGatewaySettings(readGatewaySettingsFromEnv(this.options.env), this.logger);
    if (!validation.valid) {
      throw new Error(`Invalid gateway settings: ${Object.values(validation.errors).join('; ')}`);
    }
    const settings = validation.settings;
    const client = this.options.client ?? new GatewayClient({ logger: this.logger });

    const probe = await probeGateway(client, settings, {
      logger: this.logger,
      retry: this.options.probeRetry,
      signal: this.probeController.signal,
    });
    if (this.uninitRequested) {
      this.logger.log('Shutdown requested during startup, not polling');
      return;
    }
    if (!probe.ok) {
      throw new GatewayError(probe.failure);
    }
    const identity = probe.value;
    this.identity = identity;

    this.poller = new GatewayPoller({
      transport: client,
      settings,
      logger: this.logger,
      name: identity.title,
      listener: {
        onChanges: (changed) => this.logChanges(changed),
        onFailure: (failure) => this.logFailure(failure),
      },
    });
    this.poller.start();

    this.logger.log(
      `${identity.title} (${identity.uniqueId}) polled every ${settings.pollIntervalMs}ms`
    );
  }

  /**
   * Cancels a probe still in progress, or stops polling and waits for the
   * in-flight cycle to settle.
   */
  async onUninit(): Promise<void> {
    this.uninitRequested = true;
    this.probeController.abort();
    if (this.poller) {
      await this.poller.stop();
    }
    this.logger.log('Beacon gateway monitor stopped');
  }

  getPoller(): GatewayPoller | undefined {
    return this.poller;
  }

  getIdentity(): GatewayIdentity | undefined {
    return this.identity;
  }

  private logChanges(changed: BeaconRecord[]): void {
    if (this.lastFailureReason !== undefined) {
      this.lastFailureReason = undefined;
      this.logger.log('Gateway data is up to date again.');
    }
    for (const record of changed) {
      const decoded = parseAdvertisement(record, this.decoder);
      const summary = decoded.ok
        ? summarizeAdvertisement(decoded.advertisement)
        : `undecodable (${decoded.message})`;
      const age = record.ageSeconds !== undefined ? `${record.ageSeconds}s ago` : 'age unknown';
      const seenAt = toDate(record.timestamp).toISOString();
      this.logger.log(`${record.identifier} rssi=${record.signalStrength}dBm ${age} at ${seenAt} ${summary}`);
    }
  }

  private logFailure(failure: GatewayFailure): void {
    const classification = this.classifier.classifyFailure(failure);
    if (classification.reasonCode === this.lastFailureReason) {
      return;
    }
    this.lastFailureReason = classification.reasonCode;
    this.logger.log(this.classifier.getUserMessage(classification));
  }
}

if (require.main === module) {
  const logger: Logger = console;
  const app = new GatewayMonitorApp({ env: process.env, logger });

  const shutdown = (): void => {
    executeAsyncWithLog(() => app.onUninit(), logger, 'Stop beacon gateway monitor');
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  app.onInit().catch((error: unknown) => {
    logger.error('Beacon gateway monitor failed to start:', error);
    process.exitCode = 1;
  });
}
