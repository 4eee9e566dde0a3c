import type { CertificateAlgorithm } from '../../index.js';

/** Parse a short algorithm code (e.g. ec-p256) into a certificate algorithm descriptor. */
export function parseAlgorithm(algoStr: string): CertificateAlgorithm {
  switch (algoStr) {
    case 'ec-p256':
      return { kind: 'ec', namedCurve: 'P-256', hash: 'SHA-256' };
    case 'ec-p384':
      return { kind: 'ec', namedCurve: 'P-384', hash: 'SHA-384' };
    case 'ec-p521':
      return { kind: 'ec', namedCurve: 'P-521', hash: 'SHA-512' };
    case 'rsa-2048':
      return { kind: 'rsa', modulusLength: 2048, hash: 'SHA-256' };
    case 'rsa-3072':
      return { kind: 'rsa', modulusLength: 3072, hash: 'SHA-256' };
    case 'rsa-4096':
      return { kind: 'rsa', modulusLength: 4096, hash: 'SHA-384' };
    default:
      throw new Error(`Unknown algorithm: ${algoStr}`);
  }
}
