import {
  CLIENT_AUTHENTICATION_METHODS,
  createTransportName,
  decodeTransportName,
  ENTRY_SEPARATOR,
  PAIR_SEPARATOR,
  TRANSPORT_NAME_PREFIX,
} from '../../index.js';
import { heading, kv, render } from '../logger.js';

/** Options accepted by the encode-name command. */
export interface EncodeNameOptions {
  registrationId: string;
  tls?: boolean;
  selfSigned?: boolean;
  prefix?: string;
  property?: string[];
}

/** Options accepted by the decode-name command. */
export interface DecodeNameOptions {
  name: string;
  prefix?: string;
}

/**
 * Separators are control characters; print them as \u escapes so names can be copied.
 */
export function escapeName(name: string): string {
  return name.split(ENTRY_SEPARATOR).join('\\u001f').split(PAIR_SEPARATOR).join('\\u001e');
}

export function unescapeName(name: string): string {
  return name.replace(/\\u001f/gi, ENTRY_SEPARATOR).replace(/\\u001e/gi, PAIR_SEPARATOR);
}

function parseProperties(values: string[] = []): Record<string, string> {
  const properties: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid property '${value}', expected key=value`);
    }
    properties[value.slice(0, separator)] = value.slice(separator + 1);
  }
  return properties;
}

/** Print the transport name of a registration. */
export function handleEncodeNameCommand(options: EncodeNameOptions) {
  if (options.tls && options.selfSigned) {
    throw new Error('--tls and --self-signed cannot be combined');
  }

  const name = createTransportName({
    registrationId: options.registrationId,
    clientAuthenticationMethod: options.tls
      ? CLIENT_AUTHENTICATION_METHODS.tlsClientAuth
      : options.selfSigned
        ? CLIENT_AUTHENTICATION_METHODS.selfSignedTlsClientAuth
        : undefined,
    properties: parseProperties(options.property),
    prefix: options.prefix,
  });

  render.line(escapeName(name));
}

/** Print the properties carried by a transport name. */
export function handleDecodeNameCommand(options: DecodeNameOptions) {
  const properties = decodeTransportName(
    unescapeName(options.name),
    options.prefix ?? TRANSPORT_NAME_PREFIX,
  );

  if (properties.size === 0) {
    render.warn('Not a managed transport name');
    return;
  }

  heading('Transport properties');
  for (const [key, value] of properties) {
    kv(key, value);
  }
}
