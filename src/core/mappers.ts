/**
 * Request payload builders and best-effort response projections
 *
 * The gateway speaks snake_case JSON. Responses are mapped leniently: a
 * missing or mistyped field becomes `''` (primary identifiers) or
 * `undefined`, never an error.
 */

import {
  AuthResponse,
  BillingAddress,
  GatewayError,
  IpnRegistration,
  IpnRegistrationResponse,
  OrderRequest,
  OrderResponse,
  RegisteredIpn,
  TransactionStatusResponse
} from './types.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

function optionalString(data: JsonRecord, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function requiredString(data: JsonRecord, key: string): string {
  return optionalString(data, key) ?? '';
}

function optionalNumber(data: JsonRecord, key: string): number | undefined {
  const value = data[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Successful replies carry `error: null` or an error object whose fields are
 * all null; only an error with some content counts
 */
export function hasGatewayError(value: unknown): boolean {
  if (isRecord(value)) {
    return Object.values(value).some(v => v !== null && v !== undefined && v !== '');
  }
  return Boolean(value);
}

function gatewayError(data: JsonRecord): GatewayError | undefined {
  const value = data.error;
  if (!hasGatewayError(value)) {
    return undefined;
  }
  if (isRecord(value)) {
    return {
      errorType: optionalString(value, 'error_type'),
      code: optionalString(value, 'code'),
      message: optionalString(value, 'message')
    };
  }
  if (typeof value === 'string' && value !== '') {
    return { message: value };
  }
  return undefined;
}

export function toBillingAddressPayload(address: BillingAddress): JsonRecord {
  const payload: JsonRecord = {
    email_address: address.emailAddress,
    phone_number: address.phoneNumber,
    first_name: address.firstName,
    last_name: address.lastName
  };

  const optional: Array<[string, string | undefined]> = [
    ['middle_name', address.middleName],
    ['country_code', address.countryCode],
    ['line_1', address.line1],
    ['line_2', address.line2],
    ['city', address.city],
    ['state', address.state],
    ['postal_code', address.postalCode],
    ['zip_code', address.zipCode]
  ];

  for (const [key, value] of optional) {
    if (value !== undefined) {
      payload[key] = value;
    }
  }

  return payload;
}

export function toIpnRegistrationPayload(registration: IpnRegistration): JsonRecord {
  return {
    url: registration.url,
    ipn_notification_type: registration.ipnNotificationType
  };
}

export function toOrderPayload(order: OrderRequest): JsonRecord {
  return {
    id: order.id,
    currency: order.currency,
    amount: order.amount,
    description: order.description,
    callback_url: order.callbackUrl,
    notification_id: order.notificationId,
    billing_address: toBillingAddressPayload(order.billingAddress),
    ...(order.cancellationUrl !== undefined && { cancellation_url: order.cancellationUrl }),
    ...(order.redirectMode !== undefined && { redirect_mode: order.redirectMode }),
    ...(order.branch !== undefined && { branch: order.branch })
  };
}

export function toAuthResponse(body: unknown): AuthResponse {
  const data = asRecord(body);
  const expiry = data.expiryDate;

  return {
    token: requiredString(data, 'token'),
    expiryDate: typeof expiry === 'string' || typeof expiry === 'number' ? expiry : undefined,
    status: optionalString(data, 'status'),
    message: optionalString(data, 'message')
  };
}

export function toIpnRegistrationResponse(body: unknown): IpnRegistrationResponse {
  const data = asRecord(body);

  return {
    ipnId: requiredString(data, 'ipn_id'),
    url: requiredString(data, 'url'),
    createdDate: optionalString(data, 'created_date'),
    ipnNotificationType: optionalString(data, 'ipn_notification_type_description')
      ?? optionalString(data, 'ipn_notification_type'),
    ipnStatus: optionalNumber(data, 'ipn_status'),
    status: optionalString(data, 'status')
  };
}

export function toRegisteredIpns(body: unknown): RegisteredIpn[] {
  if (!Array.isArray(body)) {
    return [];
  }

  return body.filter(isRecord).map(data => ({
    ipnId: requiredString(data, 'ipn_id'),
    url: requiredString(data, 'url'),
    createdDate: optionalString(data, 'created_date'),
    ipnNotificationType: optionalString(data, 'ipn_notification_type_description')
      ?? optionalString(data, 'ipn_notification_type'),
    ipnStatus: optionalNumber(data, 'ipn_status')
  }));
}

export function toOrderResponse(body: unknown): OrderResponse {
  const data = asRecord(body);

  return {
    orderTrackingId: requiredString(data, 'order_tracking_id'),
    merchantReference: requiredString(data, 'merchant_reference'),
    redirectUrl: requiredString(data, 'redirect_url'),
    error: gatewayError(data),
    status: optionalString(data, 'status')
  };
}

export function toTransactionStatusResponse(body: unknown): TransactionStatusResponse {
  const data = asRecord(body);

  return {
    paymentMethod: optionalString(data, 'payment_method'),
    amount: optionalNumber(data, 'amount'),
    createdDate: optionalString(data, 'created_date'),
    confirmationCode: optionalString(data, 'confirmation_code'),
    paymentStatusDescription: optionalString(data, 'payment_status_description'),
    description: optionalString(data, 'description'),
    message: optionalString(data, 'message'),
    paymentAccount: optionalString(data, 'payment_account'),
    callBackUrl: optionalString(data, 'call_back_url'),
    statusCode: optionalNumber(data, 'status_code'),
    merchantReference: optionalString(data, 'merchant_reference'),
    paymentStatusCode: optionalString(data, 'payment_status_code'),
    currency: optionalString(data, 'currency'),
    error: gatewayError(data),
    status: optionalString(data, 'status')
  };
}
