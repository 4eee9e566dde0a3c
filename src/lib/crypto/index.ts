export { cryptoEngine } from './provider.js';
export {
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
} from './certificate.js';
