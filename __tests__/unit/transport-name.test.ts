import { describe, it, expect } from '@jest/globals';
import {
  createTransportName,
  decodeTransportName,
  InvalidTransportNameError,
  TRANSPORT_NAME_PREFIX,
} from '../../src/index.js';

describe('createTransportName', () => {
  it('flags the CA-issued certificate for tls_client_auth', () => {
    const name = createTransportName({
      registrationId: 'reg-1',
      clientAuthenticationMethod: 'tls_client_auth',
      prefix: 'pfx',
    });

    expect(name).toBe('pfx:RegistrationId\u001ereg-1\u001fAttachTlsClientCertificate\u001etrue');
  });

  it('flags the self-signed certificate for self_signed_tls_client_auth', () => {
    const name = createTransportName({
      registrationId: 'reg-1',
      clientAuthenticationMethod: 'self_signed_tls_client_auth',
      prefix: 'pfx',
    });

    expect(name).toBe(
      'pfx:RegistrationId\u001ereg-1\u001fAttachSelfSignedTlsClientCertificate\u001etrue',
    );
  });

  it('adds no certificate flag for other methods and uses the default prefix', () => {
    const name = createTransportName({
      registrationId: 'reg-1',
      clientAuthenticationMethod: 'client_secret_basic',
    });

    expect(name).toBe(`${TRANSPORT_NAME_PREFIX}:RegistrationId\u001ereg-1`);
  });

  it('appends extra properties without overriding the registration identifier', () => {
    const name = createTransportName({
      registrationId: 'reg-1',
      properties: { RegistrationId: 'other', Tenant: 'blue' },
      prefix: 'pfx',
    });

    expect(Object.fromEntries(decodeTransportName(name, 'pfx'))).toEqual({
      RegistrationId: 'reg-1',
      Tenant: 'blue',
    });
  });

  it('rejects an empty registration identifier', () => {
    expect(() => createTransportName({ registrationId: '' })).toThrow(InvalidTransportNameError);
  });

  it('rejects values containing a separator', () => {
    expect(() =>
      createTransportName({ registrationId: 'reg\u001f1', prefix: 'pfx' }),
    ).toThrow("The 'RegistrationId' property contains a reserved separator character");
  });

  it('rejects empty extra property values', () => {
    expect(() =>
      createTransportName({ registrationId: 'reg-1', properties: { Tenant: '' } }),
    ).toThrow("The 'Tenant' property cannot be empty");
  });
});
