/**
 * oidc-tls-transport - Core Exports
 *
 * Per-registration HTTP transport configuration and TLS client certificate selection
 */

// Transport naming
export {
  encodeTransportName,
  decodeTransportName,
  isManagedTransportName,
  readBooleanProperty,
  createTransportName,
  type PropertyBag,
  type PropertyInput,
  type TransportNameOptions,
} from './naming/index.js';

// Certificates
export {
  getCertificateVersion,
  hasClientAuthEku,
  hasDigitalSignatureUsage,
  inspectCertificate,
  isSelfIssued,
  selectSelfSignedTlsClientCertificate,
  selectTlsClientCertificate,
  loadCertificate,
  loadSecurityKey,
  type CertificateInspection,
  type CertificateSelector,
} from './certificates/index.js';

// Certificate generation
export {
  cryptoEngine,
  createClientCertificate,
  exportPrivateKeyPem,
  generateKeyPair,
  toSecurityKey,
  DEFAULT_CERTIFICATE_ALGORITHM,
  type CertificateAlgorithm,
  type CertificateIssuer,
  type CertificateKeyPair,
  type CreateClientCertificateOptions,
  type CreateClientCertificateResult,
  type EcAlgorithm,
  type RsaAlgorithm,
} from './crypto/index.js';

// Registrations
export {
  InMemoryRegistrationStore,
  type ClientCertificate,
  type ClientRegistration,
  type ClientRegistrationResolver,
  type JsonWebSecurityKey,
  type SecurityKey,
  type SigningCredential,
  type SymmetricSecurityKey,
  type X509SecurityKey,
} from './registrations/index.js';

// Transport configuration
export {
  TransportConfiguration,
  TransportOptionsBuilder,
  applyTransportDefaults,
  hardenHandler,
  type ClientAction,
  type ClientOptions,
  type HandlerAction,
  type TransportConfigurationContext,
  type TransportIntegrationOptions,
} from './configuration/index.js';

// Transport layer
export * from './transport/index.js';

// Error handling
export {
  TransportIntegrationError,
  RegistrationNotFoundError,
  UnsupportedHandlerError,
  InvalidTransportNameError,
  ResponseTooLargeError,
  InvalidCertificateError,
  isRegistrationNotFoundError,
  isUnsupportedHandlerError,
  isTransportIntegrationError,
  type TransportIntegrationErrorType,
} from './errors/transport-errors.js';

// Constants
export * from './constants/defaults.js';
export {
  CLIENT_AUTHENTICATION_METHODS,
  DEFAULT_CLIENT_AUTHENTICATION_METHODS,
  type ClientAuthenticationMethod,
} from './constants/client-authentication.js';

// Utils
export { buildUserAgent, getPackageInfo, type PackageInfo } from './utils/user-agent.js';
