import {
  CachedToken,
  CancellationAdvisory,
  CancellationRequest,
  IpnRegistrationInput,
  IpnRegistrationResponse,
  OrderRequestInput,
  OrderResponse,
  PesapalApiError,
  PesapalConfig,
  PesapalConfigInput,
  RefundAdvisory,
  RefundRequest,
  RegisteredIpn,
  TransactionStatusResponse,
  ValidationError,
  createConfig,
  createIpnRegistration,
  createOrderRequest,
  requireTrackingId,
  toAuthResponse,
  toIpnRegistrationPayload,
  toIpnRegistrationResponse,
  toOrderPayload,
  toOrderResponse,
  toRegisteredIpns,
  toTransactionStatusResponse
} from '../core/index.js';
import { buildCancellationAdvisory, buildRefundAdvisory } from '../guidance/advisory.js';
import { GatewayHttpClient, GatewayRequest } from './http-client.js';
import { createCachedToken, isTokenValid } from './token-cache.js';

export const ENDPOINTS = {
  requestToken: 'Auth/RequestToken',
  registerIpn: 'URLSetup/RegisterIPN',
  ipnList: 'URLSetup/GetIpnList',
  submitOrder: 'Transactions/SubmitOrderRequest',
  transactionStatus: 'Transactions/GetTransactionStatus'
} as const;

/**
 * Client for the Pesapal API v3
 *
 * Each instance owns one HTTP session and one cached bearer token. The token
 * is refreshed before an authenticated call once it has expired. Calls are
 * made once and never retried.
 *
 * Not safe for concurrent use: overlapping calls on one instance may each
 * refresh the token. Serialise calls, or use one client per caller.
 *
 * @example
 * const client = new PesapalClient({ consumerKey: 'key', consumerSecret: 'secret' });
 * try {
 *   const ipn = await client.registerIpn({ url: 'https://shop.example/ipn' });
 *   const order = await client.submitOrder({ ...orderFields, notificationId: ipn.ipnId });
 *   console.log(order.redirectUrl);
 * } finally {
 *   client.close();
 * }
 */
export class PesapalClient {
  readonly config: PesapalConfig;
  private http: GatewayHttpClient;
  private cachedToken: CachedToken | null = null;

  constructor(config: PesapalConfig | PesapalConfigInput) {
    this.config = createConfig(config);
    this.http = new GatewayHttpClient(this.config);
  }

  get closed(): boolean {
    return this.http.closed;
  }

  /**
   * Return a usable bearer token, requesting a new one when none is cached,
   * the cached one has expired, or `forceRefresh` is set
   */
  async getToken(forceRefresh = false): Promise<string> {
    if (!forceRefresh && isTokenValid(this.cachedToken)) {
      return this.cachedToken.token;
    }
    return this.refreshToken();
  }

  /**
   * Drop the cached token so the next authenticated call requests a new one
   */
  clearToken(): void {
    this.cachedToken = null;
  }

  async registerIpn(registration: IpnRegistrationInput): Promise<IpnRegistrationResponse> {
    const validated = createIpnRegistration(registration);

    const body = await this.authenticated({
      method: 'POST',
      endpoint: ENDPOINTS.registerIpn,
      data: toIpnRegistrationPayload(validated)
    });

    return toIpnRegistrationResponse(body);
  }

  async getRegisteredIpns(): Promise<RegisteredIpn[]> {
    const body = await this.authenticated({
      method: 'GET',
      endpoint: ENDPOINTS.ipnList
    });

    return toRegisteredIpns(body);
  }

  async submitOrder(order: OrderRequestInput): Promise<OrderResponse> {
    const validated = createOrderRequest(order);

    const body = await this.authenticated({
      method: 'POST',
      endpoint: ENDPOINTS.submitOrder,
      data: toOrderPayload(validated)
    });

    return toOrderResponse(body);
  }

  async getTransactionStatus(orderTrackingId: string): Promise<TransactionStatusResponse> {
    const trackingId = requireTrackingId(orderTrackingId);

    const body = await this.authenticated({
      method: 'GET',
      endpoint: ENDPOINTS.transactionStatus,
      params: { orderTrackingId: trackingId }
    });

    return toTransactionStatusResponse(body);
  }

  /**
   * Check that a transaction can be refunded and return manual refund steps
   *
   * No refund is issued at the gateway.
   *
   * @throws {ValidationError} If the tracking id is empty or the amount is not positive
   * @throws {PesapalApiError} If the status lookup fails, the transaction is not
   * Completed, or the amount exceeds the transaction amount
   */
  async requestRefund(request: RefundRequest): Promise<RefundAdvisory> {
    const orderTrackingId = requireTrackingId(request.orderTrackingId);
    if (request.amount !== undefined && (!Number.isFinite(request.amount) || request.amount <= 0)) {
      throw new ValidationError('amount must be a positive number', 'amount');
    }

    const status = await this.getTransactionStatus(orderTrackingId);
    return buildRefundAdvisory(status, { ...request, orderTrackingId }, this.config.support);
  }

  /**
   * Check that a transaction can be cancelled and return manual cancellation steps
   *
   * Only Pending and Processing transactions qualify. Nothing is cancelled at
   * the gateway.
   */
  async requestCancellation(request: CancellationRequest): Promise<CancellationAdvisory> {
    const orderTrackingId = requireTrackingId(request.orderTrackingId);

    const status = await this.getTransactionStatus(orderTrackingId);
    return buildCancellationAdvisory(status, { ...request, orderTrackingId }, this.config.support);
  }

  /**
   * Release the HTTP session. Later calls fail with `PesapalApiError`.
   */
  close(): void {
    this.http.close();
    this.cachedToken = null;
  }

  setVerbose(verbose: boolean): void {
    this.http.setVerbose(verbose);
  }

  private async authenticated(request: Omit<GatewayRequest, 'token'>): Promise<unknown> {
    const token = await this.getToken();
    return this.http.send({ ...request, token });
  }

  private async refreshToken(): Promise<string> {
    if (this.http.verbose) {
      console.log('🔑 Requesting access token...');
    }

    const body = await this.http.send({
      method: 'POST',
      endpoint: ENDPOINTS.requestToken,
      data: {
        consumer_key: this.config.consumerKey,
        consumer_secret: this.config.consumerSecret
      }
    });

    const auth = toAuthResponse(body);
    if (auth.token === '') {
      throw new PesapalApiError('Authentication failed: token missing from response', body);
    }

    this.cachedToken = createCachedToken(auth.token, auth.expiryDate);

    if (this.http.verbose) {
      console.log(`✅ Token cached until ${new Date(this.cachedToken.expiresAt).toISOString()}`);
    }

    return auth.token;
  }
}

/**
 * Run `fn` with a fresh client and close it on every exit path
 *
 * @example
 * const status = await withPesapalClient(loadConfigFromEnv(), client =>
 *   client.getTransactionStatus(trackingId)
 * );
 */
export async function withPesapalClient<T>(
  config: PesapalConfig | PesapalConfigInput,
  fn: (client: PesapalClient) => Promise<T>
): Promise<T> {
  const client = new PesapalClient(config);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
