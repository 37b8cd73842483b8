/**
 * Unit tests for GatewayProbe module
 *
 * Tests cover:
 * - Identity derived from the gateway MAC
 * - CannotConnect retried, InvalidAuth and DecodeError returned at once
 * - Unexpected exceptions folded into a CannotConnect failure
 * - Cancellation through the abort signal
 */

import { GatewayClientErrorId, HistoryDecoderErrorId, ProbeErrorId } from '../../constants/errorIds';
import { GatewayErrorKind, GatewayFailure, GatewayResult } from '../../lib/ErrorTypes';
import { FetchHistoryOptions } from '../../lib/GatewayClient';
import { failure, success } from '../../lib/GatewayErrors';
import { GatewayIdentity, probeGateway } from '../../lib/GatewayProbe';
import { GatewaySettings, HistoryResponse } from '../../lib/types';
import { MockLogger, createMockLogger } from '../setup';

const settings: GatewaySettings = {
  host: 'gw.test',
  bearerToken: 'test-secret',
  pollIntervalMs: 5000,
  requestTimeoutMs: 3000,
};

const response: HistoryResponse = {
  timestamp: 100,
  gatewayIdentifier: 'AA:BB:CC:DD:EE:FF',
  records: [],
  coordinates: '',
};

const connectFailure = failure<HistoryResponse>(
  GatewayErrorKind.CANNOT_CONNECT,
  'Error communicating with gateway',
  GatewayClientErrorId.CONNECTION_FAILED
);

function expectIdentity(result: GatewayResult<GatewayIdentity>): GatewayIdentity {
  if (!result.ok) {
    throw new Error(`Expected an identity, got ${result.failure.message}`);
  }
  return result.value;
}

function expectFailure(result: GatewayResult<GatewayIdentity>): GatewayFailure {
  if (result.ok) {
    throw new Error('Expected the probe to fail');
  }
  return result.failure;
}

describe('probeGateway', () => {
  let logger: MockLogger;
  let client: { fetchGatewayHistory: jest.Mock<Promise<GatewayResult<HistoryResponse>>, [FetchHistoryOptions]> };

  beforeEach(() => {
    logger = createMockLogger();
    client = { fetchGatewayHistory: jest.fn<Promise<GatewayResult<HistoryResponse>>, [FetchHistoryOptions]>() };
  });

  it('should derive the identity from the gateway MAC', async () => {
    // Arrange
    client.fetchGatewayHistory.mockResolvedValue(success(response));

    // Act
    const identity = expectIdentity(await probeGateway(client, settings, { logger }));

    // Assert
    expect(identity).toEqual({
      uniqueId: 'aa:bb:cc:dd:ee:ff',
      title: 'Beacon Gateway EE:FF',
      gatewayIdentifierSuffix: 'EE:FF',
      response,
    });
    expect(client.fetchGatewayHistory).toHaveBeenCalledWith({
      host: 'gw.test',
      bearerToken: 'test-secret',
      timeoutMs: 3000,
    });
  });

  it('should retry CannotConnect until the gateway answers', async () => {
    // Arrange
    client.fetchGatewayHistory.mockResolvedValueOnce(connectFailure).mockResolvedValue(success(response));

    // Act
    const result = await probeGateway(client, settings, { logger, retry: { initialDelayMs: 0 } });

    // Assert
    expect(result.ok).toBe(true);
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(2);
    expect(logger.log).toHaveBeenCalledWith('Probe gateway gw.test - attempt 2/3');
  });

  it('should return the last CannotConnect after three attempts', async () => {
    // Arrange
    client.fetchGatewayHistory.mockResolvedValue(connectFailure);

    // Act
    const result = await probeGateway(client, settings, { logger, retry: { initialDelayMs: 0 } });

    // Assert
    expect(expectFailure(result)).toEqual({
      kind: GatewayErrorKind.CANNOT_CONNECT,
      message: 'Error communicating with gateway',
      errorId: GatewayClientErrorId.CONNECTION_FAILED,
    });
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(3);
  });

  it('should not retry InvalidAuth', async () => {
    // Arrange
    client.fetchGatewayHistory.mockResolvedValue(
      failure(GatewayErrorKind.INVALID_AUTH, 'Gateway rejected the bearer token', GatewayClientErrorId.INVALID_AUTH, {
        status: 401,
      })
    );

    // Act
    const result = await probeGateway(client, settings, { logger, retry: { initialDelayMs: 0 } });

    // Assert
    expect(expectFailure(result).kind).toBe(GatewayErrorKind.INVALID_AUTH);
    expect(expectFailure(result).status).toBe(401);
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(1);
  });

  it('should not retry DecodeError', async () => {
    // Arrange
    client.fetchGatewayHistory.mockResolvedValue(
      failure(
        GatewayErrorKind.DECODE_ERROR,
        'Invalid history payload at data.gw_mac: Required',
        HistoryDecoderErrorId.INVALID_ENVELOPE
      )
    );

    // Act
    const result = await probeGateway(client, settings, { logger, retry: { initialDelayMs: 0 } });

    // Assert
    expect(expectFailure(result).kind).toBe(GatewayErrorKind.DECODE_ERROR);
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(1);
  });

  it('should fold an unexpected exception into CannotConnect', async () => {
    // Arrange
    const error = new Error('boom');
    client.fetchGatewayHistory.mockRejectedValue(error);

    // Act
    const result = await probeGateway(client, settings, { logger, retry: { initialDelayMs: 0 } });

    // Assert
    expect(expectFailure(result)).toEqual({
      kind: GatewayErrorKind.CANNOT_CONNECT,
      message: 'Probe of gw.test failed: boom',
      errorId: ProbeErrorId.PROBE_FAILED,
      cause: error,
    });
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(1);
  });

  it('should not contact the gateway once the signal is aborted', async () => {
    // Arrange
    const controller = new AbortController();
    controller.abort();

    // Act
    const result = await probeGateway(client, settings, { logger, signal: controller.signal });

    // Assert
    expect(expectFailure(result)).toEqual({
      kind: GatewayErrorKind.CANNOT_CONNECT,
      message: 'Probe of gw.test was cancelled',
      errorId: ProbeErrorId.PROBE_CANCELLED,
    });
    expect(client.fetchGatewayHistory).not.toHaveBeenCalled();
  });

  it('should pass the signal to the request and skip the retry wait once aborted', async () => {
    // Arrange
    const controller = new AbortController();
    client.fetchGatewayHistory.mockImplementation(async () => {
      controller.abort();
      return connectFailure;
    });

    // Act
    const result = await probeGateway(client, settings, { logger, signal: controller.signal });

    // Assert
    expect(expectFailure(result).errorId).toBe(ProbeErrorId.PROBE_CANCELLED);
    expect(client.fetchGatewayHistory).toHaveBeenCalledTimes(1);
    expect(client.fetchGatewayHistory.mock.calls[0][0].signal).toBe(controller.signal);
  });
});
