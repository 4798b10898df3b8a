/**
 * Base error class for Pesapal client errors
 */
export class PesapalClientError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'PesapalClientError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Failure reported by, or while talking to, the gateway
 *
 * Covers transport failures, non-2xx replies, malformed JSON, API-reported
 * error objects, authentication failures and refund/cancellation rules.
 */
export class PesapalApiError extends PesapalClientError {
  constructor(
    message: string,
    public readonly responseData?: unknown,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, 'API_ERROR', cause);
    this.name = 'PesapalApiError';
  }
}

/**
 * Input rejected locally, before any network activity
 */
export class ValidationError extends PesapalClientError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}
