export {
  getCertificateVersion,
  hasClientAuthEku,
  hasDigitalSignatureUsage,
  inspectCertificate,
  isSelfIssued,
  type CertificateInspection,
} from './inspector.js';
export {
  selectSelfSignedTlsClientCertificate,
  selectTlsClientCertificate,
  type CertificateSelector,
} from './selector.js';
export { loadCertificate, loadSecurityKey } from './loader.js';
