// Core types, validation, errors and wire mapping
export * from './core/index.js';

// Client and HTTP session
export * from './client/index.js';

// Refund and cancellation guidance
export * from './guidance/advisory.js';

// IPN callback helpers
export * from './notifications/ipn.js';

// Environment configuration
export * from './config.js';
