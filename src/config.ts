import { config as dotenvConfig } from 'dotenv';
import {
  LIVE_BASE_URL,
  PesapalConfig,
  PesapalConfigInput,
  SANDBOX_BASE_URL,
  ValidationError,
  createConfig
} from './core/index.js';

export type PesapalEnvironment = 'sandbox' | 'live';

export type Env = Record<string, string | undefined>;

const BASE_URLS: Record<PesapalEnvironment, string> = {
  sandbox: SANDBOX_BASE_URL,
  live: LIVE_BASE_URL
};

export interface LoadConfigOptions {
  /** Load a `.env` file into `process.env` first (default: true when reading `process.env`) */
  loadDotenv?: boolean;
  /** Path of the `.env` file (default: `.env` in the working directory) */
  dotenvPath?: string;
}

function parseEnvironment(value: string | undefined): PesapalEnvironment {
  const normalised = (value || 'sandbox').trim().toLowerCase();
  if (normalised === 'sandbox' || normalised === 'live') {
    return normalised;
  }
  if (normalised === 'production') {
    return 'live';
  }
  throw new ValidationError(
    `Invalid PESAPAL_ENVIRONMENT "${value}": expected sandbox or live`,
    'PESAPAL_ENVIRONMENT'
  );
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ValidationError(`Invalid ${name} value: ${value}`, name);
  }
  return parsed;
}

/**
 * Build the client configuration from environment variables
 *
 * Environment Variables:
 *   PESAPAL_CONSUMER_KEY         Consumer key (required)
 *   PESAPAL_CONSUMER_SECRET      Consumer secret (required)
 *   PESAPAL_API_BASE_URL         Base URL; overrides PESAPAL_ENVIRONMENT
 *   PESAPAL_ENVIRONMENT          sandbox (default) or live
 *   PESAPAL_TIMEOUT_MS           Request timeout in milliseconds (default: 30000)
 *   PESAPAL_CONNECT_TIMEOUT_MS   Connect timeout in milliseconds (default: 10000)
 *   PESAPAL_VERBOSE              "true" to log requests and responses
 *   PESAPAL_SUPPORT_EMAIL        Support email printed on advisories
 *   PESAPAL_MERCHANT_PHONE       Merchant phone printed on advisories
 */
export function loadConfigFromEnv(env: Env = process.env, options: LoadConfigOptions = {}): PesapalConfig {
  const loadDotenv = options.loadDotenv ?? env === process.env;
  if (loadDotenv) {
    dotenvConfig(options.dotenvPath ? { path: options.dotenvPath } : undefined);
  }

  const consumerKey = env.PESAPAL_CONSUMER_KEY;
  const consumerSecret = env.PESAPAL_CONSUMER_SECRET;

  if (!consumerKey || !consumerSecret) {
    throw new ValidationError(
      'Pesapal credentials are required. Provide them via:\n' +
      '  - Environment variables: PESAPAL_CONSUMER_KEY and PESAPAL_CONSUMER_SECRET\n' +
      '  - .env file: PESAPAL_CONSUMER_KEY=<key> and PESAPAL_CONSUMER_SECRET=<secret>',
      !consumerKey ? 'PESAPAL_CONSUMER_KEY' : 'PESAPAL_CONSUMER_SECRET'
    );
  }

  const environment = parseEnvironment(env.PESAPAL_ENVIRONMENT);

  const input: PesapalConfigInput = {
    consumerKey,
    consumerSecret,
    apiBaseUrl: env.PESAPAL_API_BASE_URL || BASE_URLS[environment],
    timeoutMs: parsePositiveInt(env.PESAPAL_TIMEOUT_MS, 'PESAPAL_TIMEOUT_MS'),
    connectTimeoutMs: parsePositiveInt(env.PESAPAL_CONNECT_TIMEOUT_MS, 'PESAPAL_CONNECT_TIMEOUT_MS'),
    verbose: env.PESAPAL_VERBOSE === 'true',
    support: {
      supportEmail: env.PESAPAL_SUPPORT_EMAIL,
      merchantPhone: env.PESAPAL_MERCHANT_PHONE
    }
  };

  const config = createConfig(input);
  validateConfig(config);
  return config;
}

/**
 * Report every configuration problem at once
 */
export function validateConfig(config: PesapalConfig): void {
  const errors: string[] = [];

  if (!config.consumerKey || config.consumerKey.trim() === '') {
    errors.push('Consumer key cannot be empty');
  }

  if (!config.consumerSecret || config.consumerSecret.trim() === '') {
    errors.push('Consumer secret cannot be empty');
  }

  if (!/^https?:\/\//i.test(config.apiBaseUrl)) {
    errors.push(`API base URL must start with http:// or https:// (got "${config.apiBaseUrl}")`);
  }

  if (config.connectTimeoutMs > config.timeoutMs) {
    errors.push('Connect timeout cannot exceed the request timeout');
  }

  if (config.apiBaseUrl.startsWith('http://')) {
    console.warn(`Warning: API base URL "${config.apiBaseUrl}" is not using HTTPS`);
  }

  if (errors.length > 0) {
    throw new ValidationError(`Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}
