/**
 * OAuth 2.0 client authentication methods relevant to transport configuration
 * (RFC 6749 section 2.3.1 and RFC 8705 section 2).
 */
export const CLIENT_AUTHENTICATION_METHODS = {
  clientSecretBasic: 'client_secret_basic',
  selfSignedTlsClientAuth: 'self_signed_tls_client_auth',
  tlsClientAuth: 'tls_client_auth',
} as const;

export type ClientAuthenticationMethod =
  (typeof CLIENT_AUTHENTICATION_METHODS)[keyof typeof CLIENT_AUTHENTICATION_METHODS];

/**
 * Methods enabled by default when the transport integration is registered.
 */
export const DEFAULT_CLIENT_AUTHENTICATION_METHODS: readonly ClientAuthenticationMethod[] = [
  CLIENT_AUTHENTICATION_METHODS.clientSecretBasic,
  CLIENT_AUTHENTICATION_METHODS.selfSignedTlsClientAuth,
  CLIENT_AUTHENTICATION_METHODS.tlsClientAuth,
];
