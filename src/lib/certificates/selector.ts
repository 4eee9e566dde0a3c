import type { X509Certificate } from '@peculiar/x509';
import {
  CLIENT_AUTHENTICATION_METHODS,
  type ClientAuthenticationMethod,
} from '../constants/client-authentication.js';
import type { ClientCertificate, ClientRegistration } from '../registrations/types.js';
import { debugCertificates } from '../utils/debug.js';
import { inspectCertificate } from './inspector.js';

/**
 * Picks the certificate to present for one client authentication method.
 */
export type CertificateSelector = (registration: ClientRegistration) => ClientCertificate | undefined;

function selectFirst(
  registration: ClientRegistration,
  method: ClientAuthenticationMethod,
): ClientCertificate | undefined {
  for (const credential of registration.signingCredentials) {
    const key = credential.key;
    if (key.kind !== 'x509') continue;

    if (isEligible(key.certificate, method)) {
      debugCertificates(
        'selected %s for registration %s (%s)',
        key.certificate.subject,
        registration.registrationId,
        method,
      );
      return key;
    }
  }

  debugCertificates(
    'no eligible certificate for registration %s (%s)',
    registration.registrationId,
    method,
  );
  return undefined;
}

// One parse per candidate: version, name polarity, key usage and EKU all come from the report
function isEligible(certificate: X509Certificate, method: ClientAuthenticationMethod): boolean {
  return inspectCertificate(certificate).eligibleMethods.includes(method);
}

/**
 * First X.509 signing certificate of the registration that is self-issued and valid for
 * both digital signature and client authentication (self_signed_tls_client_auth).
 */
export const selectSelfSignedTlsClientCertificate: CertificateSelector = (registration) =>
  selectFirst(registration, CLIENT_AUTHENTICATION_METHODS.selfSignedTlsClientAuth);

/**
 * First X.509 signing certificate of the registration that is not self-issued and is valid
 * for both digital signature and client authentication (tls_client_auth).
 */
export const selectTlsClientCertificate: CertificateSelector = (registration) =>
  selectFirst(registration, CLIENT_AUTHENTICATION_METHODS.tlsClientAuth);
