/**
 * Unit tests for GatewaySettingsValidator module
 *
 * Tests cover:
 * - Host validation (required, host name / IPv4 / bracketed IPv6, port range)
 * - Bearer token trimming
 * - Poll interval and request timeout defaults and clamping
 * - Reading settings from GATEWAY_* environment variables
 */

import {
  GatewaySettingsValidation,
  normalizeBearerToken,
  readGatewaySettingsFromEnv,
  validateGatewaySettings,
  validateNumber,
} from '../../lib/GatewaySettingsValidator';
import { GatewaySettings } from '../../lib/types';
import { createMockLogger } from '../setup';

function expectValid(result: GatewaySettingsValidation): GatewaySettings {
  if (!result.valid) {
    throw new Error(`Expected valid settings, got ${JSON.stringify(result.errors)}`);
  }
  return result.settings;
}

function expectErrors(result: GatewaySettingsValidation): Record<string, string> {
  if (result.valid) {
    throw new Error('Expected validation errors');
  }
  return result.errors;
}

describe('validateGatewaySettings', () => {
  describe('host', () => {
    it('should accept a bare address and apply defaults', () => {
      expect(expectValid(validateGatewaySettings({ host: '192.168.1.20' }))).toEqual({
        host: '192.168.1.20',
        pollIntervalMs: 5000,
      });
    });

    it.each(['gateway.local', ' gateway.local:8080 ', '[fe80::1]:80', 'gw-01'])('should accept %p', (host) => {
      expect(expectValid(validateGatewaySettings({ host })).host).toBe(host.trim());
    });

    it.each(['http://gateway.local', 'gw:70000', 'gw:0', 'gw/history', '-gw'])('should reject %p', (host) => {
      expect(expectErrors(validateGatewaySettings({ host }))).toEqual({
        host: 'Host must be a host name or address with an optional port',
      });
    });

    it('should require a host', () => {
      expect(expectErrors(validateGatewaySettings({}))).toEqual({ host: 'Host is required' });
      expect(expectErrors(validateGatewaySettings({ host: '   ' }))).toEqual({ host: 'Host is required' });
      expect(expectErrors(validateGatewaySettings({ host: 42 }))).toEqual({ host: 'Host is required' });
    });

    it('should reject input that is not an object', () => {
      expect(expectErrors(validateGatewaySettings(null))).toEqual({ base: 'Settings must be an object' });
      expect(expectErrors(validateGatewaySettings('gw'))).toEqual({ base: 'Settings must be an object' });
    });

    it('should log rejected settings', () => {
      // Arrange
      const logger = createMockLogger();

      // Act
      validateGatewaySettings({}, logger);

      // Assert
      expect(logger.error).toHaveBeenCalledWith('[SETTINGS_001] Invalid gateway settings:', {
        host: 'Host is required',
      });
    });
  });

  describe('token', () => {
    it('should trim the token', () => {
      expect(expectValid(validateGatewaySettings({ host: 'gw', token: '  test-secret ' })).bearerToken).toBe(
        'test-secret'
      );
    });

    it('should drop a blank token', () => {
      const settings = expectValid(validateGatewaySettings({ host: 'gw', token: '   ' }));
      expect(settings).toEqual({ host: 'gw', pollIntervalMs: 5000 });
      expect('bearerToken' in settings).toBe(false);
    });
  });

  describe('pollIntervalMs', () => {
    it.each([
      [2000, 2000],
      [500, 1000],
      [7200000, 3600000],
      ['fast', 5000],
      [Number.NaN, 5000],
    ])('should turn %p into %p', (pollIntervalMs, expected) => {
      expect(expectValid(validateGatewaySettings({ host: 'gw', pollIntervalMs })).pollIntervalMs).toBe(expected);
    });
  });

  describe('requestTimeoutMs', () => {
    it('should clamp a numeric timeout', () => {
      expect(expectValid(validateGatewaySettings({ host: 'gw', requestTimeoutMs: 3000 })).requestTimeoutMs).toBe(3000);
      expect(expectValid(validateGatewaySettings({ host: 'gw', requestTimeoutMs: 10 })).requestTimeoutMs).toBe(100);
      expect(expectValid(validateGatewaySettings({ host: 'gw', requestTimeoutMs: 900000 })).requestTimeoutMs).toBe(
        600000
      );
    });

    it('should leave the timeout unset when it is not a number', () => {
      const settings = expectValid(validateGatewaySettings({ host: 'gw', requestTimeoutMs: 'soon' }));
      expect('requestTimeoutMs' in settings).toBe(false);
    });
  });
});

describe('normalizeBearerToken', () => {
  it('should trim strings and drop blank or non-string values', () => {
    expect(normalizeBearerToken(' test-secret ')).toBe('test-secret');
    expect(normalizeBearerToken('')).toBeUndefined();
    expect(normalizeBearerToken('\t\n')).toBeUndefined();
    expect(normalizeBearerToken(undefined)).toBeUndefined();
    expect(normalizeBearerToken(123)).toBeUndefined();
  });
});

describe('validateNumber', () => {
  it('should return valid numbers and clamp out-of-range values', () => {
    expect(validateNumber(42, 10, 0, 100)).toBe(42);
    expect(validateNumber(150, 10, 0, 100)).toBe(100);
    expect(validateNumber(-5, 10, 0, 100)).toBe(0);
    expect(validateNumber('abc', 10, 0, 100)).toBe(10);
  });
});

describe('readGatewaySettingsFromEnv', () => {
  it('should read every GATEWAY_* variable', () => {
    expect(
      readGatewaySettingsFromEnv({
        GATEWAY_HOST: 'gw.local',
        GATEWAY_TOKEN: 'test-secret',
        GATEWAY_POLL_INTERVAL_MS: '2000',
        GATEWAY_REQUEST_TIMEOUT_MS: '3000',
      })
    ).toEqual({
      host: 'gw.local',
      token: 'test-secret',
      pollIntervalMs: 2000,
      requestTimeoutMs: 3000,
    });
  });

  it('should treat blank variables as absent', () => {
    expect(
      readGatewaySettingsFromEnv({
        GATEWAY_HOST: 'gw.local',
        GATEWAY_TOKEN: '  ',
        GATEWAY_POLL_INTERVAL_MS: '',
      })
    ).toEqual({
      host: 'gw.local',
      token: undefined,
      pollIntervalMs: undefined,
      requestTimeoutMs: undefined,
    });
  });

  it('should fall back to the default interval when the variable is not numeric', () => {
    // Arrange
    const input = readGatewaySettingsFromEnv({ GATEWAY_HOST: 'gw.local', GATEWAY_POLL_INTERVAL_MS: 'often' });

    // Act
    const settings = expectValid(validateGatewaySettings(input));

    // Assert
    expect(settings.pollIntervalMs).toBe(5000);
  });

  it('should leave the request unbounded when the timeout variable is not numeric', () => {
    // Arrange
    const input = readGatewaySettingsFromEnv({ GATEWAY_HOST: 'gw.local', GATEWAY_REQUEST_TIMEOUT_MS: 'soon' });

    // Act
    const settings = expectValid(validateGatewaySettings(input));

    // Assert
    expect(settings.requestTimeoutMs).toBeUndefined();
  });

  it('should clamp a timeout variable below the minimum', () => {
    // Arrange
    const input = readGatewaySettingsFromEnv({ GATEWAY_HOST: 'gw.local', GATEWAY_REQUEST_TIMEOUT_MS: '5' });

    // Act
    const settings = expectValid(validateGatewaySettings(input));

    // Assert
    expect(settings.requestTimeoutMs).toBe(100);
  });
});
