import { GatewayClientErrorId } from '../constants/errorIds';
import { GatewayErrorKind } from '../lib/ErrorTypes';
import { GatewayError, isGatewayError } from '../lib/GatewayErrors';
import { RetryManager } from '../lib/RetryManager';
import { MockLogger, createMockLogger } from './setup';

const authError = new GatewayError({
  kind: GatewayErrorKind.INVALID_AUTH,
  message: 'Gateway rejected the bearer token',
  errorId: GatewayClientErrorId.INVALID_AUTH,
});

const connectError = new GatewayError({
  kind: GatewayErrorKind.CANNOT_CONNECT,
  message: 'Error communicating with gateway',
  errorId: GatewayClientErrorId.CONNECTION_FAILED,
});

describe('RetryManager', () => {
  let mockLogger: MockLogger;
  let retryManager: RetryManager;

  beforeEach(() => {
    mockLogger = createMockLogger();
    retryManager = new RetryManager(mockLogger);
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('retryWithBackoff', () => {
    describe('successful operations', () => {
      it('should return success on first attempt', async () => {
        // Arrange
        const operation = jest.fn().mockResolvedValue('identity');

        // Act
        const result = await retryManager.retryWithBackoff(operation, 'Probe gateway');

        // Assert
        expect(result.success).toBe(true);
        expect(result.value).toBe('identity');
        expect(result.attempts).toBe(1);
        expect(result.error).toBeUndefined();
        expect(mockLogger.log).toHaveBeenCalledWith('Probe gateway - attempt 1/3');
      });

      it('should retry and succeed after initial failures', async () => {
        // Arrange
        const operation = jest
          .fn()
          .mockRejectedValueOnce(connectError)
          .mockRejectedValueOnce(connectError)
          .mockResolvedValue('identity');

        // Act
        const promise = retryManager.retryWithBackoff(operation, 'Probe gateway', {
          maxAttempts: 5,
          initialDelayMs: 100,
        });
        await jest.advanceTimersByTimeAsync(100);
        await jest.advanceTimersByTimeAsync(200);
        const result = await promise;

        // Assert
        expect(result.success).toBe(true);
        expect(result.attempts).toBe(3);
        expect(operation).toHaveBeenCalledTimes(3);
        expect(mockLogger.log).toHaveBeenCalledWith('Retrying in 100ms...');
        expect(mockLogger.log).toHaveBeenCalledWith('Retrying in 200ms...');
      });
    });

    describe('max attempts exhausted', () => {
      it('should return failure after max attempts', async () => {
        // Arrange
        const operation = jest.fn().mockRejectedValue(connectError);

        // Act
        const promise = retryManager.retryWithBackoff(operation, 'Probe gateway', {
          maxAttempts: 3,
          initialDelayMs: 100,
        });
        await jest.advanceTimersByTimeAsync(100);
        await jest.advanceTimersByTimeAsync(200);
        const result = await promise;

        // Assert
        expect(result.success).toBe(false);
        expect(result.value).toBeUndefined();
        expect(result.attempts).toBe(3);
        expect(result.error).toBe(connectError);
        expect(mockLogger.error).toHaveBeenCalledWith('Probe gateway - attempt 1 failed:', connectError);
        expect(mockLogger.error).toHaveBeenCalledWith('Probe gateway - attempt 3 failed:', connectError);
      });
    });

    describe('shouldRetry', () => {
      it('should stop on the first error that is not retryable', async () => {
        // Arrange
        const operation = jest.fn().mockRejectedValueOnce(connectError).mockRejectedValue(authError);
        const shouldRetry = (error: Error): boolean =>
          isGatewayError(error) && error.kind === GatewayErrorKind.CANNOT_CONNECT;

        // Act
        const promise = retryManager.retryWithBackoff(operation, 'Probe gateway', {
          maxAttempts: 5,
          initialDelayMs: 100,
          shouldRetry,
        });
        await jest.advanceTimersByTimeAsync(100);
        const result = await promise;

        // Assert
        expect(result.success).toBe(false);
        expect(result.attempts).toBe(2);
        expect(result.error).toBe(authError);
        expect(operation).toHaveBeenCalledTimes(2);
        expect(mockLogger.log).toHaveBeenCalledWith('Probe gateway - error is not retryable, giving up');
      });
    });

    describe('signal', () => {
      it('should stop waiting and give up once aborted', async () => {
        // Arrange
        const controller = new AbortController();
        const operation = jest.fn().mockImplementation(async () => {
          controller.abort();
          throw connectError;
        });

        // Act
        const result = await retryManager.retryWithBackoff(operation, 'Probe gateway', {
          maxAttempts: 5,
          initialDelayMs: 60000,
          signal: controller.signal,
        });

        // Assert
        expect(result.success).toBe(false);
        expect(result.attempts).toBe(1);
        expect(result.error).toBe(connectError);
        expect(mockLogger.log).toHaveBeenCalledWith('Probe gateway - aborted');
      });
    });
  });
});
