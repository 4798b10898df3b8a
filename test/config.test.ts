import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LIVE_BASE_URL, SANDBOX_BASE_URL, ValidationError, createConfig } from '../src/core/index.js';
import { loadConfigFromEnv, validateConfig } from '../src/config.js';

const credentials = {
  PESAPAL_CONSUMER_KEY: 'test-key',
  PESAPAL_CONSUMER_SECRET: 'test-secret'
};

describe('loadConfigFromEnv', () => {
  it('should read credentials and default to the sandbox', () => {
    const config = loadConfigFromEnv(credentials);

    expect(config.consumerKey).toBe('test-key');
    expect(config.consumerSecret).toBe('test-secret');
    expect(config.apiBaseUrl).toBe(SANDBOX_BASE_URL);
    expect(config.verbose).toBe(false);
  });

  it('should select the live URL for the live environment', () => {
    expect(loadConfigFromEnv({ ...credentials, PESAPAL_ENVIRONMENT: 'live' }).apiBaseUrl).toBe(LIVE_BASE_URL);
    expect(loadConfigFromEnv({ ...credentials, PESAPAL_ENVIRONMENT: 'Production' }).apiBaseUrl).toBe(LIVE_BASE_URL);
  });

  it('should prefer an explicit base URL', () => {
    const config = loadConfigFromEnv({
      ...credentials,
      PESAPAL_ENVIRONMENT: 'live',
      PESAPAL_API_BASE_URL: 'https://gateway.example.com/v3/api/'
    });

    expect(config.apiBaseUrl).toBe('https://gateway.example.com/v3/api');
  });

  it('should read timeouts, verbosity and support details', () => {
    const config = loadConfigFromEnv({
      ...credentials,
      PESAPAL_TIMEOUT_MS: '45000',
      PESAPAL_CONNECT_TIMEOUT_MS: '5000',
      PESAPAL_VERBOSE: 'true',
      PESAPAL_SUPPORT_EMAIL: 'payments@example.com',
      PESAPAL_MERCHANT_PHONE: '+254700000000'
    });

    expect(config.timeoutMs).toBe(45000);
    expect(config.connectTimeoutMs).toBe(5000);
    expect(config.verbose).toBe(true);
    expect(config.support).toEqual({ supportEmail: 'payments@example.com', merchantPhone: '+254700000000' });
  });

  it('should accept a request timeout below the default connect timeout', () => {
    const config = loadConfigFromEnv({ ...credentials, PESAPAL_TIMEOUT_MS: '5000' });

    expect(config.timeoutMs).toBe(5000);
    expect(config.connectTimeoutMs).toBe(5000);
  });

  it('should still reject an explicit connect timeout above the request timeout', () => {
    expect(() => loadConfigFromEnv({
      ...credentials,
      PESAPAL_TIMEOUT_MS: '5000',
      PESAPAL_CONNECT_TIMEOUT_MS: '8000'
    })).toThrow('Connect timeout cannot exceed the request timeout');
  });

  it('should explain how to supply missing credentials', () => {
    let error: unknown;
    try {
      loadConfigFromEnv({ PESAPAL_CONSUMER_KEY: 'test-key' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'PESAPAL_CONSUMER_SECRET' });
    expect(error instanceof Error ? error.message : '').toMatch(/^Pesapal credentials are required/);
  });

  it('should reject malformed values', () => {
    expect(() => loadConfigFromEnv({ ...credentials, PESAPAL_TIMEOUT_MS: 'abc' }))
      .toThrow('Invalid PESAPAL_TIMEOUT_MS value: abc');
    expect(() => loadConfigFromEnv({ ...credentials, PESAPAL_ENVIRONMENT: 'staging' }))
      .toThrow('Invalid PESAPAL_ENVIRONMENT "staging": expected sandbox or live');
  });

  describe('with a .env file', () => {
    let dir: string | undefined;

    afterEach(() => {
      delete process.env.PESAPAL_CONSUMER_KEY;
      delete process.env.PESAPAL_CONSUMER_SECRET;
      delete process.env.PESAPAL_ENVIRONMENT;
      if (dir) {
        rmSync(dir, { recursive: true, force: true });
        dir = undefined;
      }
    });

    it('should load credentials from the file into process.env', () => {
      dir = mkdtempSync(join(tmpdir(), 'pesapal-config-'));
      const path = join(dir, '.env');
      writeFileSync(path, 'PESAPAL_CONSUMER_KEY=file-key\nPESAPAL_CONSUMER_SECRET=file-secret\nPESAPAL_ENVIRONMENT=live\n');

      const config = loadConfigFromEnv(process.env, { dotenvPath: path });

      expect(config.consumerKey).toBe('file-key');
      expect(config.consumerSecret).toBe('file-secret');
      expect(config.apiBaseUrl).toBe(LIVE_BASE_URL);
    });
  });
});

describe('validateConfig', () => {
  it('should list every problem at once', () => {
    const config = createConfig({
      consumerKey: 'test-key',
      consumerSecret: 'test-secret',
      apiBaseUrl: 'ftp://gateway.example.com',
      timeoutMs: 1000,
      connectTimeoutMs: 2000
    });

    expect(() => validateConfig(config)).toThrow(
      'Configuration validation failed:\n' +
      '  - API base URL must start with http:// or https:// (got "ftp://gateway.example.com")\n' +
      '  - Connect timeout cannot exceed the request timeout'
    );
  });

  it('should warn about plain HTTP', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = createConfig({
      consumerKey: 'test-key',
      consumerSecret: 'test-secret',
      apiBaseUrl: 'http://gateway.example.com'
    });

    validateConfig(config);

    expect(warn).toHaveBeenCalledWith('Warning: API base URL "http://gateway.example.com" is not using HTTPS');
  });
});
