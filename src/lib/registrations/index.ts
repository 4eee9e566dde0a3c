export { InMemoryRegistrationStore } from './in-memory-store.js';
export type {
  ClientCertificate,
  ClientRegistration,
  ClientRegistrationResolver,
  JsonWebSecurityKey,
  SecurityKey,
  SigningCredential,
  SymmetricSecurityKey,
  X509SecurityKey,
} from './types.js';
