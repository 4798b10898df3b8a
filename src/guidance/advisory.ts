/**
 * Refund and cancellation guidance
 *
 * The gateway exposes no refund or cancel endpoint. These builders check a
 * fetched transaction status against a fixed policy and return the steps the
 * merchant has to take by hand. Nothing here talks to the network.
 */

import {
  CancellationAdvisory,
  CancellationRequest,
  PesapalApiError,
  RefundAdvisory,
  RefundRequest,
  SupportDetails,
  TransactionStatusResponse
} from '../core/index.js';

const REFUNDABLE_STATUSES = new Set(['completed']);
const CANCELLABLE_STATUSES = new Set(['pending', 'processing']);

const REFUND_INSTRUCTIONS: readonly string[] = [
  'Log in to the merchant dashboard and open the transaction using its order tracking ID',
  'Submit the refund from the transaction details page with the amount and reason above',
  'Keep the order tracking ID and confirmation code for your records',
  'Refunds are settled back to the original payment method once approved'
];

const CANCELLATION_INSTRUCTIONS: readonly string[] = [
  'Do not fulfil the order while the cancellation is being processed',
  'Contact gateway support with the order tracking ID to stop the pending payment',
  'Watch for a status change through your IPN endpoint before closing the order'
];

export function currentStatusOf(status: TransactionStatusResponse): string {
  return status.paymentStatusDescription?.trim() || 'Unknown';
}

export function isRefundable(status: TransactionStatusResponse): boolean {
  return REFUNDABLE_STATUSES.has(currentStatusOf(status).toLowerCase());
}

export function isCancellable(status: TransactionStatusResponse): boolean {
  return CANCELLABLE_STATUSES.has(currentStatusOf(status).toLowerCase());
}

export function buildRefundAdvisory(
  status: TransactionStatusResponse,
  request: RefundRequest,
  support: SupportDetails,
  now: Date = new Date()
): RefundAdvisory {
  const orderTrackingId = request.orderTrackingId;
  const currentStatus = currentStatusOf(status);

  if (!isRefundable(status)) {
    throw new PesapalApiError(
      `Transaction ${orderTrackingId} cannot be refunded: status is ${currentStatus}. Only Completed transactions are eligible for refunds`,
      status
    );
  }

  const transactionAmount = status.amount;
  if (transactionAmount === undefined) {
    throw new PesapalApiError(
      `Transaction ${orderTrackingId} has no recorded amount to refund against`,
      status
    );
  }

  const refundAmount = request.amount ?? transactionAmount;
  if (refundAmount > transactionAmount) {
    throw new PesapalApiError(
      `Refund amount ${refundAmount} exceeds transaction amount ${transactionAmount}`,
      status
    );
  }

  const requestType = refundAmount === transactionAmount ? 'full_refund' : 'partial_refund';

  return {
    orderTrackingId,
    requestType,
    status: 'pending_manual_review',
    currentStatus,
    reason: request.reason || 'Refund requested by merchant',
    refundAmount,
    transactionAmount,
    currency: status.currency,
    merchantReference: status.merchantReference,
    instructions: REFUND_INSTRUCTIONS,
    supportDetails: support,
    requestedAt: now.toISOString()
  };
}

export function buildCancellationAdvisory(
  status: TransactionStatusResponse,
  request: CancellationRequest,
  support: SupportDetails,
  now: Date = new Date()
): CancellationAdvisory {
  const orderTrackingId = request.orderTrackingId;
  const currentStatus = currentStatusOf(status);

  if (!isCancellable(status)) {
    throw new PesapalApiError(
      `Transaction ${orderTrackingId} cannot be cancelled: status is ${currentStatus}`,
      status
    );
  }

  return {
    orderTrackingId,
    requestType: 'cancellation',
    status: 'pending_manual_review',
    currentStatus,
    reason: request.reason || 'Cancellation requested by merchant',
    currency: status.currency,
    merchantReference: status.merchantReference,
    instructions: CANCELLATION_INSTRUCTIONS,
    supportDetails: support,
    requestedAt: now.toISOString()
  };
}
