import { describe, it, expect, beforeAll } from '@jest/globals';
import { KeyUsageFlags } from '@peculiar/x509';
import {
  selectSelfSignedTlsClientCertificate,
  selectTlsClientCertificate,
  type CertificateIssuer,
  type X509SecurityKey,
} from '../../src/index.js';
import {
  createIssuedKey,
  createRegistration,
  createSelfSignedKey,
  createTestIssuer,
  downgradeToV1,
  withLongFormIssuer,
} from '../test-utils.js';

describe('certificate selectors', () => {
  let issuer: CertificateIssuer;
  let selfSigned: X509SecurityKey;
  let issued: X509SecurityKey;

  beforeAll(async () => {
    issuer = await createTestIssuer();
    selfSigned = await createSelfSignedKey('CN=A');
    issued = await createIssuedKey(issuer, 'CN=B');
  });

  it('picks the self-issued certificate for self-signed and the other for standard', () => {
    const registration = createRegistration('reg-1', [selfSigned, issued]);

    expect(selectSelfSignedTlsClientCertificate(registration)).toBe(selfSigned);
    expect(selectTlsClientCertificate(registration)).toBe(issued);
  });

  it('decides the self-issued polarity from the encoded names', () => {
    const reencoded: X509SecurityKey = {
      ...selfSigned,
      certificate: withLongFormIssuer(selfSigned.certificate),
    };
    const registration = createRegistration('reg-1', [reencoded]);

    expect(selectSelfSignedTlsClientCertificate(registration)).toBeUndefined();
    expect(selectTlsClientCertificate(registration)).toBe(reencoded);
  });

  it('never selects a certificate without the digital signature usage', async () => {
    const noSignature = await createSelfSignedKey('CN=no-signature', {
      keyUsages: KeyUsageFlags.keyEncipherment,
    });
    const issuedNoSignature = await createIssuedKey(issuer, 'CN=issued-no-signature', {
      keyUsages: KeyUsageFlags.keyAgreement,
    });
    const registration = createRegistration('reg-1', [noSignature, issuedNoSignature]);

    expect(selectSelfSignedTlsClientCertificate(registration)).toBeUndefined();
    expect(selectTlsClientCertificate(registration)).toBeUndefined();
  });

  it('never selects a certificate without the client authentication usage', async () => {
    const serverOnly = await createIssuedKey(issuer, 'CN=server-only', {
      extendedKeyUsages: ['1.3.6.1.5.5.7.3.1'],
    });

    expect(selectTlsClientCertificate(createRegistration('reg-1', [serverOnly]))).toBeUndefined();
  });

  it('returns the earliest eligible certificate', async () => {
    const second = await createIssuedKey(issuer, 'CN=B2');
    const registration = createRegistration('reg-1', [issued, second]);

    expect(selectTlsClientCertificate(registration)).toBe(issued);
    expect(selectTlsClientCertificate(createRegistration('reg-1', [second, issued]))).toBe(second);
  });

  it('skips keys that are not certificates', () => {
    const registration = createRegistration('reg-1', [
      { kind: 'symmetric', secret: new Uint8Array([1, 2, 3]) },
      { kind: 'jwk', jwk: { kty: 'oct', k: 'dGVzdC1zZWNyZXQ' } },
      selfSigned,
    ]);

    expect(selectSelfSignedTlsClientCertificate(registration)).toBe(selfSigned);
  });

  it('skips certificates older than v3', () => {
    const legacy: X509SecurityKey = {
      kind: 'x509',
      certificate: downgradeToV1(issued.certificate),
    };
    const registration = createRegistration('reg-1', [legacy]);

    expect(selectTlsClientCertificate(registration)).toBeUndefined();
  });

  it('returns undefined for a registration without credentials', () => {
    const registration = createRegistration('reg-1', []);

    expect(selectSelfSignedTlsClientCertificate(registration)).toBeUndefined();
    expect(selectTlsClientCertificate(registration)).toBeUndefined();
  });

  it('reflects rotated credentials on the next call', async () => {
    const rotated = await createIssuedKey(issuer, 'CN=rotated');
    const credentials = [{ key: issued }];
    const registration = { registrationId: 'reg-1', signingCredentials: credentials };

    expect(selectTlsClientCertificate(registration)).toBe(issued);

    credentials.unshift({ key: rotated });
    expect(selectTlsClientCertificate(registration)).toBe(rotated);
  });
});
