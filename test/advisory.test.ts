import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SUPPORT_DETAILS,
  PesapalApiError,
  TransactionStatusResponse,
  buildCancellationAdvisory,
  buildRefundAdvisory,
  isCancellable,
  isRefundable
} from '../src/index.js';

const requestedAt = new Date('2026-03-01T12:00:00Z');

const completed: TransactionStatusResponse = {
  paymentStatusDescription: 'Completed',
  amount: 1000,
  currency: 'KES',
  merchantReference: 'test-order-123'
};

describe('refund policy', () => {
  it('should only treat Completed as refundable', () => {
    expect(isRefundable(completed)).toBe(true);
    expect(isRefundable({ paymentStatusDescription: 'COMPLETED' })).toBe(true);
    expect(isRefundable({ paymentStatusDescription: 'Pending' })).toBe(false);
    expect(isRefundable({})).toBe(false);
  });

  it('should build a full refund record', () => {
    const advisory = buildRefundAdvisory(completed, { orderTrackingId: 'X' }, DEFAULT_SUPPORT_DETAILS, requestedAt);

    expect(advisory).toMatchObject({
      orderTrackingId: 'X',
      requestType: 'full_refund',
      refundAmount: 1000,
      transactionAmount: 1000,
      status: 'pending_manual_review',
      currentStatus: 'Completed',
      currency: 'KES',
      merchantReference: 'test-order-123',
      supportDetails: DEFAULT_SUPPORT_DETAILS,
      requestedAt: '2026-03-01T12:00:00.000Z'
    });
    expect(advisory.instructions.length).toBeGreaterThan(0);
  });

  it('should call a refund of the whole amount a full refund', () => {
    const advisory = buildRefundAdvisory(completed, { orderTrackingId: 'X', amount: 1000 }, DEFAULT_SUPPORT_DETAILS);

    expect(advisory.requestType).toBe('full_refund');
  });

  it('should reject a refund above the transaction amount', () => {
    expect(() => buildRefundAdvisory(completed, { orderTrackingId: 'X', amount: 1000.01 }, DEFAULT_SUPPORT_DETAILS))
      .toThrow(PesapalApiError);
  });

  it('should reject a transaction without a recorded amount', () => {
    expect(() => buildRefundAdvisory(
      { paymentStatusDescription: 'Completed' },
      { orderTrackingId: 'X', amount: 10 },
      DEFAULT_SUPPORT_DETAILS
    )).toThrow('Transaction X has no recorded amount to refund against');
  });
});

describe('cancellation policy', () => {
  it.each([
    ['Pending', true],
    ['processing', true],
    ['Completed', false],
    ['Failed', false],
    ['Reversed', false],
    ['', false]
  ])('should treat %s as cancellable: %s', (description, expected) => {
    expect(isCancellable({ paymentStatusDescription: description })).toBe(expected);
  });

  it('should build a cancellation record', () => {
    const support = { supportEmail: 'payments@example.com', merchantPhone: '+254700000000' };
    const advisory = buildCancellationAdvisory(
      { paymentStatusDescription: 'Pending', currency: 'KES' },
      { orderTrackingId: 'X', reason: 'Duplicate order' },
      support,
      requestedAt
    );

    expect(advisory).toMatchObject({
      orderTrackingId: 'X',
      requestType: 'cancellation',
      currentStatus: 'Pending',
      reason: 'Duplicate order',
      currency: 'KES',
      supportDetails: support,
      requestedAt: '2026-03-01T12:00:00.000Z'
    });
  });

  it('should name an unknown status in the rejection', () => {
    expect(() => buildCancellationAdvisory({}, { orderTrackingId: 'X' }, DEFAULT_SUPPORT_DETAILS))
      .toThrow('Transaction X cannot be cancelled: status is Unknown');
  });
});
