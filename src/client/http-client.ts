import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import { JsonRecord, PesapalApiError, PesapalConfig, hasGatewayError, isRecord } from '../core/index.js';

export type HttpMethod = 'GET' | 'POST';

export interface GatewayRequest {
  method: HttpMethod;
  /** Path relative to the configured base URL, e.g. `Auth/RequestToken` */
  endpoint: string;
  data?: JsonRecord;
  params?: Record<string, string>;
  /** Bearer token; omitted for the token request itself */
  token?: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE'
]);

/**
 * One HTTP session against the gateway
 *
 * Wraps an axios instance bound to keep-alive agents. The agents carry the
 * connect deadline as their socket timeout; once a socket is connected axios
 * replaces it with the per-request `timeoutMs`. Every call is a single
 * attempt and resolves to the parsed JSON body or rejects with
 * `PesapalApiError`.
 */
export class GatewayHttpClient {
  private client: AxiosInstance;
  private httpAgent: HttpAgent;
  private httpsAgent: HttpsAgent;
  private isVerbose: boolean;
  private isClosed = false;

  constructor(config: PesapalConfig) {
    this.isVerbose = config.verbose;
    this.httpAgent = new HttpAgent({ keepAlive: true, timeout: config.connectTimeoutMs });
    this.httpsAgent = new HttpsAgent({ keepAlive: true, timeout: config.connectTimeoutMs });

    this.client = axios.create({
      baseURL: config.apiBaseUrl,
      timeout: config.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Status and JSON handling happen in send()
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      transitional: { clarifyTimeoutError: true },
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'User-Agent': config.userAgent
      }
    });

    // Request interceptor for logging
    this.client.interceptors.request.use(
      (request) => {
        if (this.isVerbose) {
          console.log(`🔄 ${request.method?.toUpperCase()} ${request.baseURL}/${request.url}`);
          if (request.params) {
            console.log('🔎 Query:', JSON.stringify(request.params));
          }
          if (request.data) {
            console.log('📤 Request body:', JSON.stringify(redactBody(request.data), null, 2));
          }
          const authorization = request.headers.get('Authorization');
          if (authorization) {
            console.log('📋 Authorization: [REDACTED]');
          }
        }
        return request;
      },
      (error: unknown) => {
        console.error('❌ Request error:', error instanceof Error ? error.message : String(error));
        return Promise.reject(error);
      }
    );

    // Response interceptor for logging
    this.client.interceptors.response.use(
      (response) => {
        if (this.isVerbose) {
          console.log(`✅ ${response.status} ${response.statusText}`);
          console.log('📥 Response body:', redactResponseBody(response.data));
        }
        return response;
      },
      (error: unknown) => {
        if (this.isVerbose && axios.isAxiosError(error)) {
          console.log(`❌ ${error.code ?? 'ERROR'} ${error.message}`);
        }
        return Promise.reject(error);
      }
    );
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(request: GatewayRequest): Promise<unknown> {
    if (this.isClosed) {
      throw new PesapalApiError('Client is closed');
    }

    const headers: Record<string, string> = {};
    if (request.token !== undefined) {
      headers['Authorization'] = `Bearer ${request.token}`;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method: request.method,
        url: request.endpoint,
        data: request.data,
        params: request.params,
        headers
      });
    } catch (error) {
      throw this.toTransportError(error);
    }

    return this.parseResponse(response);
  }

  /**
   * Release pooled sockets. Safe to call more than once.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  get verbose(): boolean {
    return this.isVerbose;
  }

  setVerbose(verbose: boolean): void {
    this.isVerbose = verbose;
  }

  private parseResponse(response: AxiosResponse<unknown>): unknown {
    const raw = typeof response.data === 'string' ? response.data : '';
    const status = response.status;

    if (status < 200 || status >= 300) {
      const errorData = tryParseJson(raw);
      const detail = isRecord(errorData) ? extractMessage(errorData) : undefined;
      const message = detail ? `HTTP ${status} error: ${detail}` : `HTTP ${status} error`;
      throw new PesapalApiError(message, errorData, status);
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PesapalApiError(`Invalid JSON response: ${reason}`, undefined, status, error);
    }

    if (isRecord(body) && hasGatewayError(body.error)) {
      const detail = extractMessage(body) ?? 'Unknown API error';
      throw new PesapalApiError(`API error: ${detail}`, body, status);
    }

    return body;
  }

  private toTransportError(error: unknown): PesapalApiError {
    if (axios.isAxiosError(error)) {
      const code = error.code ?? '';

      if (TIMEOUT_CODES.has(code)) {
        return new PesapalApiError('Request timed out', undefined, undefined, error);
      }

      if (CONNECTION_CODES.has(code) || causeCode(error) !== undefined) {
        return new PesapalApiError('Connection error - check your internet connection', undefined, undefined, error);
      }

      return new PesapalApiError(`Request failed: ${error.message}`, undefined, undefined, error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    return new PesapalApiError(`Request failed: ${message}`, undefined, undefined, error);
  }
}

function tryParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Pick a human message out of a gateway error body
 */
function extractMessage(body: JsonRecord): string | undefined {
  const error = body.error;
  if (isRecord(error) && typeof error.message === 'string' && error.message !== '') {
    return error.message;
  }
  if (typeof error === 'string' && error !== '') {
    return error;
  }
  if (typeof body.message === 'string' && body.message !== '') {
    return body.message;
  }
  return undefined;
}

/**
 * Connection failures sometimes surface with the errno code only on the cause
 */
function causeCode(error: AxiosError): string | undefined {
  const cause = error.cause;
  if (isRecord(cause) && typeof cause.code === 'string' && CONNECTION_CODES.has(cause.code)) {
    return cause.code;
  }
  return undefined;
}

function redactBody(data: unknown): unknown {
  if (isRecord(data) && 'consumer_secret' in data) {
    return { ...data, consumer_secret: '[REDACTED]' };
  }
  return data;
}

/**
 * The token reply carries the bearer token in its body
 */
function redactResponseBody(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }
  const body = tryParseJson(raw);
  if (isRecord(body) && 'token' in body) {
    return JSON.stringify({ ...body, token: '[REDACTED]' });
  }
  return raw;
}
