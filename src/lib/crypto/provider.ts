import { Crypto } from '@peculiar/webcrypto';
import { cryptoProvider } from '@peculiar/x509';

// Use Node's global WebCrypto if available, otherwise fall back to @peculiar/webcrypto
export const cryptoEngine: Crypto =
  globalThis.crypto && 'subtle' in globalThis.crypto ? (globalThis.crypto as Crypto) : new Crypto();

// Bind WebCrypto provider for @peculiar/x509
cryptoProvider.set(cryptoEngine);
