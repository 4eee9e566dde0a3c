import type { X509Certificate } from '@peculiar/x509';

/**
 * An X.509 certificate usable as a TLS client certificate.
 */
export interface X509SecurityKey {
  kind: 'x509';
  certificate: X509Certificate;
  /** PKCS#8 PEM private key matching the certificate, required to complete a TLS handshake */
  privateKey?: string;
}

export interface JsonWebSecurityKey {
  kind: 'jwk';
  jwk: JsonWebKey;
}

export interface SymmetricSecurityKey {
  kind: 'symmetric';
  secret: Uint8Array;
}

export type SecurityKey = X509SecurityKey | JsonWebSecurityKey | SymmetricSecurityKey;

export interface SigningCredential {
  key: SecurityKey;
  /** JWA algorithm identifier, e.g. ES256 */
  algorithm?: string;
}

/**
 * The certificate (and key) a handler presents during the TLS handshake.
 */
export type ClientCertificate = X509SecurityKey;

/**
 * Configuration describing one OAuth/OIDC client.
 */
export interface ClientRegistration {
  registrationId: string;
  issuer?: string;
  clientId?: string;
  /** Ordered list; earlier credentials are preferred */
  signingCredentials: readonly SigningCredential[];
}

/**
 * Looks up client registrations by identifier.
 *
 * Implementations reject with RegistrationNotFoundError when nothing matches.
 */
export interface ClientRegistrationResolver {
  getClientRegistrationById(registrationId: string): Promise<ClientRegistration>;
}
