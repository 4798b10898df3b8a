export * from './pesapal-client.js';
export * from './token-cache.js';
export { GatewayHttpClient } from './http-client.js';
export type { GatewayRequest, HttpMethod } from './http-client.js';
