/**
 * IPN delivery method
 */
export type IpnNotificationType = 'GET' | 'POST';

/**
 * Support contact printed on refund/cancellation advisories
 */
export interface SupportDetails {
  readonly supportEmail: string;
  readonly merchantPhone: string;
}

/**
 * Client configuration
 *
 * Build with `createConfig()`, which validates the credentials and strips
 * trailing slashes from the base URL.
 */
export interface PesapalConfig {
  readonly consumerKey: string;
  readonly consumerSecret: string;
  readonly apiBaseUrl: string;
  /** Overall deadline for one HTTP call, in milliseconds */
  readonly timeoutMs: number;
  /** Deadline for establishing the TCP/TLS connection, in milliseconds */
  readonly connectTimeoutMs: number;
  readonly verbose: boolean;
  readonly userAgent: string;
  readonly support: SupportDetails;
}

export interface PesapalConfigInput {
  consumerKey: string;
  consumerSecret: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  connectTimeoutMs?: number;
  verbose?: boolean;
  userAgent?: string;
  support?: Partial<SupportDetails>;
}

/**
 * Payer contact and address details
 */
export interface BillingAddress {
  readonly emailAddress: string;
  readonly phoneNumber: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly middleName?: string;
  readonly countryCode?: string;        // ISO 3166-1 alpha-2
  readonly line1?: string;
  readonly line2?: string;
  readonly city?: string;
  readonly state?: string;
  readonly postalCode?: string;
  readonly zipCode?: string;
}

export interface IpnRegistration {
  readonly url: string;
  readonly ipnNotificationType: IpnNotificationType;
}

export interface IpnRegistrationInput {
  url: string;
  ipnNotificationType?: string;
}

/**
 * Payment order submitted to the gateway
 */
export interface OrderRequest {
  /** Merchant reference, unique per order */
  readonly id: string;
  readonly currency: string;
  readonly amount: number;
  readonly description: string;
  readonly callbackUrl: string;
  /** `ipnId` returned by IPN registration */
  readonly notificationId: string;
  readonly billingAddress: BillingAddress;
  readonly cancellationUrl?: string;
  /** `TOP_WINDOW` or `PARENT_WINDOW` */
  readonly redirectMode?: string;
  readonly branch?: string;
}

export interface OrderRequestInput {
  id: string;
  currency: string;
  amount: number;
  description: string;
  callbackUrl: string;
  notificationId: string;
  billingAddress: BillingAddress;
  cancellationUrl?: string;
  redirectMode?: string;
  branch?: string;
}

/**
 * Bearer token held by a client between calls
 */
export interface CachedToken {
  readonly token: string;
  /** Epoch milliseconds; the token is stale once `Date.now() >= expiresAt` */
  readonly expiresAt: number;
}

/**
 * Gateway-reported error object
 */
export interface GatewayError {
  readonly errorType?: string;
  readonly code?: string;
  readonly message?: string;
}

export interface AuthResponse {
  readonly token: string;
  readonly expiryDate?: string | number;
  readonly status?: string;
  readonly message?: string;
}

export interface IpnRegistrationResponse {
  readonly ipnId: string;
  readonly url: string;
  readonly createdDate?: string;
  readonly ipnNotificationType?: string;
  readonly ipnStatus?: number;
  readonly status?: string;
}

export interface RegisteredIpn {
  readonly ipnId: string;
  readonly url: string;
  readonly createdDate?: string;
  readonly ipnNotificationType?: string;
  readonly ipnStatus?: number;
}

export interface OrderResponse {
  readonly orderTrackingId: string;
  readonly merchantReference: string;
  readonly redirectUrl: string;
  readonly error?: GatewayError;
  readonly status?: string;
}

export interface TransactionStatusResponse {
  readonly paymentMethod?: string;
  readonly amount?: number;
  readonly createdDate?: string;
  readonly confirmationCode?: string;
  readonly paymentStatusDescription?: string;
  readonly description?: string;
  readonly message?: string;
  readonly paymentAccount?: string;
  readonly callBackUrl?: string;
  readonly statusCode?: number;
  readonly merchantReference?: string;
  readonly paymentStatusCode?: string;
  readonly currency?: string;
  readonly error?: GatewayError;
  readonly status?: string;
}

export interface RefundRequest {
  orderTrackingId: string;
  /** Omit for a full refund */
  amount?: number;
  reason?: string;
}

export interface CancellationRequest {
  orderTrackingId: string;
  reason?: string;
}

export type AdvisoryRequestType = 'full_refund' | 'partial_refund' | 'cancellation';

/**
 * Guidance returned in place of a gateway-side refund or cancellation
 *
 * Nothing is changed at the gateway; the record tells the merchant how to
 * complete the request manually.
 */
export interface Advisory {
  readonly orderTrackingId: string;
  readonly requestType: AdvisoryRequestType;
  readonly status: 'pending_manual_review';
  readonly currentStatus: string;
  readonly reason: string;
  readonly currency?: string;
  readonly merchantReference?: string;
  readonly instructions: readonly string[];
  readonly supportDetails: SupportDetails;
  /** ISO 8601 UTC */
  readonly requestedAt: string;
}

export interface RefundAdvisory extends Advisory {
  readonly requestType: 'full_refund' | 'partial_refund';
  readonly refundAmount: number;
  readonly transactionAmount: number;
}

export interface CancellationAdvisory extends Advisory {
  readonly requestType: 'cancellation';
}

/**
 * Notification the gateway delivers to a registered IPN URL
 */
export interface IpnNotification {
  readonly orderTrackingId: string;
  readonly orderMerchantReference?: string;
  readonly orderNotificationType?: string;
}

export interface IpnAcknowledgement {
  readonly orderNotificationType: string;
  readonly orderTrackingId: string;
  readonly orderMerchantReference: string;
  readonly status: number;
}
