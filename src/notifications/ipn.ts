import { IpnAcknowledgement, IpnNotification, ValidationError, isRecord } from '../core/index.js';

/** Notification type the gateway sends when a transaction changes state */
export const IPN_CHANGE = 'IPNCHANGE';

function readParam(payload: Record<string, unknown>, key: string): string | undefined {
  const value = payload[key];
  // Query parsers hand back arrays for repeated keys
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' && first.trim() !== '' ? first.trim() : undefined;
}

/**
 * Read an IPN callback from a parsed query string (GET) or JSON body (POST)
 *
 * @throws {ValidationError} If `OrderTrackingId` is missing
 */
export function parseIpnNotification(payload: unknown): IpnNotification {
  if (!isRecord(payload)) {
    throw new ValidationError('IPN payload must be an object', 'payload');
  }

  const orderTrackingId = readParam(payload, 'OrderTrackingId');
  if (!orderTrackingId) {
    throw new ValidationError('OrderTrackingId is required', 'OrderTrackingId');
  }

  return {
    orderTrackingId,
    orderMerchantReference: readParam(payload, 'OrderMerchantReference'),
    orderNotificationType: readParam(payload, 'OrderNotificationType')
  };
}

/**
 * Body the IPN endpoint returns so the gateway stops redelivering
 *
 * `status` is 200 when the notification was processed and 500 otherwise.
 */
export function buildIpnAcknowledgement(notification: IpnNotification, status = 200): IpnAcknowledgement {
  return {
    orderNotificationType: notification.orderNotificationType ?? IPN_CHANGE,
    orderTrackingId: notification.orderTrackingId,
    orderMerchantReference: notification.orderMerchantReference ?? '',
    status
  };
}
