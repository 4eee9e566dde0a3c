/**
 * Debug logging for oidc-tls-transport
 *
 * Output is enabled with the DEBUG environment variable:
 *
 * DEBUG=oidc-tls-transport:* - All debug output
 * DEBUG=oidc-tls-transport:config - Only transport configuration
 * DEBUG=oidc-tls-transport:http - Only HTTP traffic
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'oidc-tls-transport';

const createDebugger = (namespace: string): debug.Debugger => debug(`${ROOT_NAMESPACE}:${namespace}`);

export const debugNaming = createDebugger('naming');
export const debugConfig = createDebugger('config');
export const debugCertificates = createDebugger('certificates');
export const debugTransport = createDebugger('transport');
export const debugHttp = createDebugger('http');
export const debugRetry = createDebugger('retry');
