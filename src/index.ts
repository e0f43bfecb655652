/**
 * Infoblox WAPI client - TypeScript
 *
 * Typed client for the Infoblox NIOS web API with support for:
 * - Authoritative and delegated zones
 * - Host, A, AAAA, CNAME, MX, PTR and TXT records
 * - TLS 1.2 without SNI, with a PKCS#12 trust store or verification off
 * - Cursor-based paging
 * - Curl-style request logging
 */

// Core exports
export * from './errors/index.js';
export * from './config/index.js';
export * from './types/index.js';
export * from './auth/index.js';
export * from './transport/index.js';
export * from './client/index.js';
export * from './validation/index.js';

// Services
export * from './services/index.js';

// Observability
export * from './observability/logging.js';

// Testing utilities
export * from './mocks/index.js';
export * from './fixtures/index.js';
