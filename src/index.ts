/**
 * oidc-tls-transport
 *
 * Main entry point
 */

export * from './lib/index.js';
