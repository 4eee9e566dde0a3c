import { X509Certificate } from '@peculiar/x509';
import { InvalidCertificateError } from '../errors/transport-errors.js';
import type { X509SecurityKey } from '../registrations/types.js';
import '../crypto/provider.js';

/**
 * Parses a PEM (or base64 DER) string, or raw DER bytes, into a certificate.
 */
export function loadCertificate(data: string | BufferSource, source?: string): X509Certificate {
  try {
    return new X509Certificate(data);
  } catch (error) {
    throw InvalidCertificateError.unreadable(
      error instanceof Error ? error.message : String(error),
      source,
    );
  }
}

/**
 * Builds an X.509 security key from PEM material, e.g. read from disk at startup.
 */
export function loadSecurityKey(certificatePem: string, privateKeyPem?: string): X509SecurityKey {
  return { kind: 'x509', certificate: loadCertificate(certificatePem), privateKey: privateKeyPem };
}
