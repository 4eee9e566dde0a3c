/**
 * Content-layer decoding of compressed responses
 *
 * Decoding is driven by the Content-Encoding of the response only. It never depends on the
 * request having advertised Accept-Encoding, so servers that compress unconditionally are
 * supported while compression stays off for every other server.
 */

import { constants as bufferConstants } from 'buffer';
import { promisify } from 'util';
import { brotliDecompress, gunzip, inflate } from 'zlib';
import { ResponseTooLargeError } from '../errors/transport-errors.js';
import { debugHttp } from '../utils/debug.js';

interface DecoderOptions {
  maxOutputLength: number;
}

type Decoder = (input: Buffer, options: DecoderOptions) => Promise<Buffer>;

const DECODERS: Partial<Record<string, Decoder>> = {
  gzip: promisify(gunzip),
  'x-gzip': promisify(gunzip),
  deflate: promisify(inflate),
  br: promisify(brotliDecompress),
};

export function parseContentEncoding(header: string | string[] | undefined): string[] {
  if (header === undefined) return [];
  const values = Array.isArray(header) ? header : [header];
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0 && value !== 'identity');
}

/**
 * zlib reports an exceeded `maxOutputLength` with this code. The error class can come from
 * another realm, so the code is checked rather than the prototype.
 */
function isBufferTooLarge(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ERR_BUFFER_TOO_LARGE'
  );
}

/**
 * Reverses the content codings listed in a Content-Encoding header (last applied, first
 * removed). Unknown codings leave the body untouched from that point on.
 *
 * @param maxOutputLength upper bound for the decoded size; exceeding it rejects with a
 * ResponseTooLargeError for `url`
 */
export async function decodeContent(
  body: Buffer,
  contentEncoding: string | string[] | undefined,
  maxOutputLength: number,
  url: string,
): Promise<Buffer> {
  const codings = parseContentEncoding(contentEncoding);
  if (codings.length === 0 || body.length === 0) return body;

  const options: DecoderOptions = {
    maxOutputLength: Math.min(maxOutputLength, bufferConstants.MAX_LENGTH),
  };

  let decoded = body;
  for (const coding of codings.reverse()) {
    const decoder = DECODERS[coding];
    if (!decoder) {
      debugHttp('unsupported content coding %s, leaving body encoded', coding);
      return decoded;
    }
    try {
      decoded = await decoder(decoded, options);
    } catch (error) {
      if (isBufferTooLarge(error)) throw ResponseTooLargeError.exceeded(url, maxOutputLength);
      throw error;
    }
  }
  return decoded;
}
