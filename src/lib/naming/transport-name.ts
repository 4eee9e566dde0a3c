import {
  CLIENT_AUTHENTICATION_METHODS,
  type ClientAuthenticationMethod,
} from '../constants/client-authentication.js';
import {
  ENTRY_SEPARATOR,
  PAIR_SEPARATOR,
  PROPERTY_ATTACH_SELF_SIGNED_TLS_CLIENT_CERTIFICATE,
  PROPERTY_ATTACH_TLS_CLIENT_CERTIFICATE,
  PROPERTY_REGISTRATION_ID,
  TRANSPORT_NAME_PREFIX,
} from '../constants/defaults.js';
import { InvalidTransportNameError } from '../errors/transport-errors.js';
import { encodeTransportName } from './name-codec.js';

export interface TransportNameOptions {
  registrationId: string;
  /** Negotiated client authentication method, if any */
  clientAuthenticationMethod?: ClientAuthenticationMethod | string;
  /** Extra properties flowed to custom configurators */
  properties?: Readonly<Record<string, string>>;
  /** Defaults to TRANSPORT_NAME_PREFIX */
  prefix?: string;
}

function assertEncodable(key: string, value: string): void {
  if (key.length === 0) {
    throw InvalidTransportNameError.emptyValue('<key>');
  }
  if (value.length === 0) {
    throw InvalidTransportNameError.emptyValue(key);
  }
  for (const text of [key, value]) {
    if (text.includes(ENTRY_SEPARATOR) || text.includes(PAIR_SEPARATOR)) {
      throw InvalidTransportNameError.reservedCharacter(key);
    }
  }
}

/**
 * Builds the name of the transport used to talk to the server of a client registration.
 *
 * The certificate flags are derived from the negotiated client authentication method so that
 * mTLS and non-mTLS requests of the same registration never share a pooled transport.
 */
export function createTransportName(options: TransportNameOptions): string {
  const properties = new Map<string, string>();
  properties.set(PROPERTY_REGISTRATION_ID, options.registrationId);

  if (options.clientAuthenticationMethod === CLIENT_AUTHENTICATION_METHODS.tlsClientAuth) {
    properties.set(PROPERTY_ATTACH_TLS_CLIENT_CERTIFICATE, 'true');
  } else if (
    options.clientAuthenticationMethod === CLIENT_AUTHENTICATION_METHODS.selfSignedTlsClientAuth
  ) {
    properties.set(PROPERTY_ATTACH_SELF_SIGNED_TLS_CLIENT_CERTIFICATE, 'true');
  }

  for (const [key, value] of Object.entries(options.properties ?? {})) {
    if (!properties.has(key)) properties.set(key, value);
  }

  for (const [key, value] of properties) {
    assertEncodable(key, value);
  }

  return encodeTransportName(options.prefix ?? TRANSPORT_NAME_PREFIX, properties);
}
