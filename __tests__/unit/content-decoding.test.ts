import { describe, it, expect } from '@jest/globals';
import { brotliCompressSync, deflateSync, gzipSync } from 'zlib';
import { decodeContent, parseContentEncoding, ResponseTooLargeError } from '../../src/index.js';

const payload = Buffer.from('{"active":true}');
const TOKEN_URL = 'https://op.example.test/token';

describe('parseContentEncoding', () => {
  it('lists codings in header order without identity', () => {
    expect(parseContentEncoding(undefined)).toEqual([]);
    expect(parseContentEncoding('GZIP')).toEqual(['gzip']);
    expect(parseContentEncoding('deflate, identity ,br')).toEqual(['deflate', 'br']);
    expect(parseContentEncoding(['gzip', 'br'])).toEqual(['gzip', 'br']);
  });
});

describe('decodeContent', () => {
  it.each([
    ['gzip', gzipSync(payload)],
    ['x-gzip', gzipSync(payload)],
    ['deflate', deflateSync(payload)],
    ['br', brotliCompressSync(payload)],
  ])('decodes %s', async (encoding, encoded) => {
    const decoded = await decodeContent(encoded, encoding, 1024, TOKEN_URL);

    expect(decoded.toString()).toBe('{"active":true}');
  });

  it('removes stacked codings last applied first', async () => {
    const encoded = brotliCompressSync(gzipSync(payload));

    const decoded = await decodeContent(encoded, 'gzip, br', 1024, TOKEN_URL);

    expect(decoded.toString()).toBe('{"active":true}');
  });

  it('returns unencoded and unknown bodies untouched', async () => {
    expect(await decodeContent(payload, undefined, 1024, TOKEN_URL)).toBe(payload);
    expect(await decodeContent(payload, 'compress', 1024, TOKEN_URL)).toBe(payload);
  });

  it('rejects with ResponseTooLargeError past the output limit', async () => {
    const encoded = gzipSync(Buffer.alloc(1000));

    const error = await decodeContent(encoded, 'gzip', 100, TOKEN_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResponseTooLargeError);
    expect(error).toMatchObject({
      code: 'RESPONSE_TOO_LARGE',
      context: { url: TOKEN_URL, limit: 100 },
    });
  });

  it('applies the limit to every coding in a stack', async () => {
    const encoded = deflateSync(gzipSync(Buffer.alloc(1000)));

    await expect(decodeContent(encoded, 'gzip, deflate', 100, TOKEN_URL)).rejects.toBeInstanceOf(
      ResponseTooLargeError,
    );
  });
});
