import { beforeAll } from '@jest/globals';

// Jest-specific setup
beforeAll(async () => {
  // Ensure WebCrypto is available in test environment
  if (!globalThis.crypto) {
    const { webcrypto } = await import('crypto');
    Object.defineProperty(globalThis, 'crypto', {
      value: webcrypto,
      writable: false,
      configurable: true,
    });
  }

  process.env.NODE_ENV = 'test';
});
