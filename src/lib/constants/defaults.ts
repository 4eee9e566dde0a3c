/**
 * Default configuration constants for oidc-tls-transport
 *
 * Centralized defaults for transport naming, response limits and retry behaviour.
 * These values are used as fallbacks when no explicit configuration is provided.
 */

// Transport naming
export const TRANSPORT_NAME_PREFIX = 'oidc-tls-transport';
export const ENTRY_SEPARATOR = '\u001f';
export const PAIR_SEPARATOR = '\u001e';

// Recognized transport name properties
export const PROPERTY_REGISTRATION_ID = 'RegistrationId';
export const PROPERTY_ATTACH_TLS_CLIENT_CERTIFICATE = 'AttachTlsClientCertificate';
export const PROPERTY_ATTACH_SELF_SIGNED_TLS_CLIENT_CERTIFICATE =
  'AttachSelfSignedTlsClientCertificate';

// Transport security defaults
export const MAX_RESPONSE_CONTENT_BUFFER_SIZE = 10 * 1024 * 1024; // 10 MiB
export const TRANSPORT_TIMEOUT_MS = 60_000; // 1 minute

// Values applied by the transport itself before any configuration runs
export const UNBOUNDED_RESPONSE_CONTENT_BUFFER_SIZE = Number.MAX_SAFE_INTEGER;
export const FRAMEWORK_TIMEOUT_MS = 100_000; // 100 seconds

// Transport factory defaults
export const HANDLER_LIFETIME_MS = 2 * 60 * 1_000; // 2 minutes
export const RETIRED_HANDLER_GRACE_MS = 10_000; // 10 seconds

// X.509
export const CLIENT_AUTHENTICATION_EKU_OID = '1.3.6.1.5.5.7.3.2';
export const MIN_CERTIFICATE_VERSION = 3;

// Retry policy defaults
export const RETRY_MAX_RETRIES = 3;
export const RETRY_BASE_DELAY_MS = 1_000;
export const RETRY_MAX_DELAY_MS = 30_000;
