import { ValidationError } from './errors.js';
import {
  BillingAddress,
  IpnNotificationType,
  IpnRegistration,
  IpnRegistrationInput,
  OrderRequest,
  OrderRequestInput,
  PesapalConfig,
  PesapalConfigInput,
  SupportDetails
} from './types.js';

export const SANDBOX_BASE_URL = 'https://cybqa.pesapal.com/pesapalv3/api';
export const LIVE_BASE_URL = 'https://pay.pesapal.com/v3/api';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const DEFAULT_USER_AGENT = 'pesapal-v3-client/1.0.0';

export const DEFAULT_SUPPORT_DETAILS: SupportDetails = {
  supportEmail: 'support@pesapal.com',
  merchantPhone: 'Not configured'
};

const IPN_NOTIFICATION_TYPES: readonly IpnNotificationType[] = ['GET', 'POST'];

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function requireField(value: unknown, field: string): void {
  if (isBlank(value)) {
    throw new ValidationError(`${field} is required`, field);
  }
}

function requirePositiveTimeout(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive number`, field);
  }
}

export function createConfig(input: PesapalConfigInput): PesapalConfig {
  requireField(input.consumerKey, 'consumerKey');
  requireField(input.consumerSecret, 'consumerSecret');

  const apiBaseUrl = (input.apiBaseUrl ?? SANDBOX_BASE_URL).trim().replace(/\/+$/, '');
  if (apiBaseUrl === '') {
    throw new ValidationError('apiBaseUrl is required', 'apiBaseUrl');
  }

  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  // An unset connect timeout never exceeds the request timeout
  const connectTimeoutMs = input.connectTimeoutMs ?? Math.min(DEFAULT_CONNECT_TIMEOUT_MS, timeoutMs);
  requirePositiveTimeout(timeoutMs, 'timeoutMs');
  requirePositiveTimeout(connectTimeoutMs, 'connectTimeoutMs');

  return Object.freeze({
    consumerKey: input.consumerKey,
    consumerSecret: input.consumerSecret,
    apiBaseUrl,
    timeoutMs,
    connectTimeoutMs,
    verbose: input.verbose ?? false,
    userAgent: input.userAgent || DEFAULT_USER_AGENT,
    support: Object.freeze({
      supportEmail: input.support?.supportEmail || DEFAULT_SUPPORT_DETAILS.supportEmail,
      merchantPhone: input.support?.merchantPhone || DEFAULT_SUPPORT_DETAILS.merchantPhone
    })
  });
}

export function createBillingAddress(input: BillingAddress): BillingAddress {
  requireField(input.emailAddress, 'emailAddress');
  requireField(input.phoneNumber, 'phoneNumber');
  requireField(input.firstName, 'firstName');
  requireField(input.lastName, 'lastName');

  return Object.freeze({ ...input });
}

export function createIpnRegistration(input: IpnRegistrationInput): IpnRegistration {
  requireField(input.url, 'url');

  const type = input.ipnNotificationType ?? 'POST';
  const ipnNotificationType = IPN_NOTIFICATION_TYPES.find(t => t === type);
  if (!ipnNotificationType) {
    throw new ValidationError(
      `ipnNotificationType must be one of ${IPN_NOTIFICATION_TYPES.join(', ')}`,
      'ipnNotificationType'
    );
  }

  return Object.freeze({ url: input.url, ipnNotificationType });
}

export function createOrderRequest(input: OrderRequestInput): OrderRequest {
  requireField(input.id, 'id');
  requireField(input.currency, 'currency');
  if (typeof input.amount !== 'number' || !Number.isFinite(input.amount) || input.amount <= 0) {
    throw new ValidationError('amount must be a positive number', 'amount');
  }
  requireField(input.description, 'description');
  requireField(input.callbackUrl, 'callbackUrl');
  requireField(input.notificationId, 'notificationId');
  if (!input.billingAddress) {
    throw new ValidationError('billingAddress is required', 'billingAddress');
  }

  return Object.freeze({
    ...input,
    billingAddress: createBillingAddress(input.billingAddress)
  });
}

/**
 * Returns the trimmed tracking id, or throws when it is empty
 */
export function requireTrackingId(orderTrackingId: string): string {
  requireField(orderTrackingId, 'orderTrackingId');
  return orderTrackingId.trim();
}
