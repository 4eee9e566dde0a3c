/**
 * Structural checks over a single X.509 certificate
 *
 * Nothing here builds or validates a chain: the predicates only look at the encoded
 * certificate, which is all that is needed to decide whether a credential can be
 * presented for TLS client authentication.
 */

import * as asn1js from 'asn1js';
import {
  ExtendedKeyUsageExtension,
  KeyUsageFlags,
  KeyUsagesExtension,
  type X509Certificate,
} from '@peculiar/x509';
import {
  CLIENT_AUTHENTICATION_METHODS,
  type ClientAuthenticationMethod,
} from '../constants/client-authentication.js';
import { CLIENT_AUTHENTICATION_EKU_OID, MIN_CERTIFICATE_VERSION } from '../constants/defaults.js';
import { InvalidCertificateError } from '../errors/transport-errors.js';

const CONTEXT_SPECIFIC = 3;

/**
 * Fields of the TBSCertificate the predicates need, with the names kept as encoded.
 */
interface TbsFields {
  version: number;
  issuer: Uint8Array;
  subject: Uint8Array;
}

function sequenceItems(block: unknown, what: string): asn1js.AsnType[] {
  if (!(block instanceof asn1js.Sequence)) {
    throw InvalidCertificateError.unreadable(`${what} is not a SEQUENCE`);
  }
  return block.valueBlock.value;
}

function readVersion(field: asn1js.AsnType): number | undefined {
  if (field.idBlock.tagClass !== CONTEXT_SPECIFIC || field.idBlock.tagNumber !== 0) {
    return undefined;
  }
  const inner = field instanceof asn1js.Constructed ? field.valueBlock.value[0] : undefined;
  if (!(inner instanceof asn1js.Integer)) {
    throw InvalidCertificateError.unreadable('malformed version field');
  }
  return inner.valueBlock.valueDec + 1;
}

function readTbsFields(certificate: X509Certificate): TbsFields {
  const { offset, result } = asn1js.fromBER(certificate.rawData);
  if (offset === -1) {
    throw InvalidCertificateError.unreadable(result.error);
  }

  const fields = sequenceItems(sequenceItems(result, 'Certificate')[0], 'TBSCertificate');
  const explicitVersion = fields.length > 0 ? readVersion(fields[0]) : undefined;
  // version [0], serialNumber, signature, issuer, validity, subject
  const first = explicitVersion === undefined ? 0 : 1;
  const issuer = fields[first + 2];
  const subject = fields[first + 4];
  if (!issuer || !subject) {
    throw InvalidCertificateError.unreadable('TBSCertificate is truncated');
  }

  return {
    version: explicitVersion ?? 1,
    issuer: issuer.valueBeforeDecodeView,
    subject: subject.valueBeforeDecodeView,
  };
}

function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left.byteLength !== right.byteLength) return false;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
}

/**
 * X.509 version number (1, 2 or 3). The encoded field is zero-based.
 */
export function getCertificateVersion(certificate: X509Certificate): number {
  return readTbsFields(certificate).version;
}

/**
 * Whether the subject and issuer names are encoded with identical bytes.
 *
 * Self-issued certificates are treated as self-signed: verifying the signature against
 * the certificate's own key would require building a chain, which is not done here.
 */
export function isSelfIssued(certificate: X509Certificate): boolean {
  const { issuer, subject } = readTbsFields(certificate);
  return bytesEqual(subject, issuer);
}

/**
 * Whether a Key Usage extension asserts digitalSignature. A missing extension fails closed.
 */
export function hasDigitalSignatureUsage(certificate: X509Certificate): boolean {
  for (const extension of certificate.extensions) {
    if (
      extension instanceof KeyUsagesExtension &&
      (extension.usages & KeyUsageFlags.digitalSignature) !== 0
    ) {
      return true;
    }
  }
  return false;
}

/**
 * Whether an Extended Key Usage extension lists id-kp-clientAuth.
 */
export function hasClientAuthEku(certificate: X509Certificate): boolean {
  for (const extension of certificate.extensions) {
    if (
      extension instanceof ExtendedKeyUsageExtension &&
      extension.usages.some((usage) => usage === CLIENT_AUTHENTICATION_EKU_OID)
    ) {
      return true;
    }
  }
  return false;
}

export interface CertificateInspection {
  subject: string;
  issuer: string;
  serialNumber: string;
  notBefore: Date;
  notAfter: Date;
  version: number;
  selfIssued: boolean;
  digitalSignature: boolean;
  clientAuthentication: boolean;
  /** Methods this certificate would be selected for, if it came first in a registration */
  eligibleMethods: ClientAuthenticationMethod[];
}

export function inspectCertificate(certificate: X509Certificate): CertificateInspection {
  const { version, issuer, subject } = readTbsFields(certificate);
  const selfIssued = bytesEqual(subject, issuer);
  const digitalSignature = hasDigitalSignatureUsage(certificate);
  const clientAuthentication = hasClientAuthEku(certificate);

  const eligibleMethods: ClientAuthenticationMethod[] = [];
  if (version >= MIN_CERTIFICATE_VERSION && digitalSignature && clientAuthentication) {
    eligibleMethods.push(
      selfIssued
        ? CLIENT_AUTHENTICATION_METHODS.selfSignedTlsClientAuth
        : CLIENT_AUTHENTICATION_METHODS.tlsClientAuth,
    );
  }

  return {
    subject: certificate.subject,
    issuer: certificate.issuer,
    serialNumber: certificate.serialNumber,
    notBefore: certificate.notBefore,
    notAfter: certificate.notAfter,
    version,
    selfIssued,
    digitalSignature,
    clientAuthentication,
    eligibleMethods,
  };
}
