import { request, type Dispatcher } from 'undici';
import {
  FRAMEWORK_TIMEOUT_MS,
  UNBOUNDED_RESPONSE_CONTENT_BUFFER_SIZE,
} from '../constants/defaults.js';
import { ResponseTooLargeError } from '../errors/transport-errors.js';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';
import { decodeContent } from './content-decoding.js';
import { HttpClientHandler, type PrimaryHandler } from './handlers.js';
import {
  loggingMiddleware,
  MiddlewarePipeline,
  userAgentMiddleware,
  type HttpMethod,
  type Middleware,
  type RequestContext,
  type TransportResponse,
} from './middleware.js';

const ACCEPT_ENCODING = 'gzip, deflate, br';

export interface TransportRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  /** Objects are serialized as JSON */
  body?: unknown;
}

export interface HttpTransportOptions {
  name: string;
  primaryHandler: PrimaryHandler;
  /** Handlers placed between the transport and the primary handler, outermost first */
  additionalHandlers?: Middleware[];
  userAgent?: string;
}

type ResponseHeaders = Record<string, string | string[] | undefined>;

/**
 * Named HTTP transport built by the TransportFactory.
 *
 * Buffers every response in memory, bounded by `maxResponseContentBufferSize`, and aborts
 * requests that take longer than `timeoutMs`, replays included.
 */
export class HttpTransport {
  readonly name: string;
  readonly primaryHandler: PrimaryHandler;

  maxResponseContentBufferSize = UNBOUNDED_RESPONSE_CONTENT_BUFFER_SIZE;
  timeoutMs = FRAMEWORK_TIMEOUT_MS;
  readonly defaultHeaders: Record<string, string> = {};

  private readonly pipeline = new MiddlewarePipeline();

  constructor(options: HttpTransportOptions) {
    this.name = options.name;
    this.primaryHandler = options.primaryHandler;

    this.pipeline.use(userAgentMiddleware(options.userAgent ?? buildUserAgent()));
    for (const handler of options.additionalHandlers ?? []) {
      this.pipeline.use(handler);
    }
    this.pipeline.use(loggingMiddleware());
  }

  get(url: string, headers: Record<string, string> = {}): Promise<TransportResponse> {
    return this.send({ url, method: 'GET', headers });
  }

  post(
    url: string,
    body: unknown,
    headers: Record<string, string> = {},
  ): Promise<TransportResponse> {
    return this.send({ url, method: 'POST', body, headers });
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    const headers = { ...this.defaultHeaders, ...req.headers };
    const body = serializeBody(req.body, headers);
    const context: RequestContext = {
      url: req.url,
      method: req.method ?? 'GET',
      headers,
      body,
      attempt: 0,
      startTime: Date.now(),
      signal: AbortSignal.timeout(this.timeoutMs),
    };

    return this.pipeline.execute(context, (ctx) => this.dispatch(ctx));
  }

  private async dispatch(context: RequestContext): Promise<TransportResponse> {
    context.signal.throwIfAborted();

    const handler = this.primaryHandler;
    const headers: Record<string, string> = { ...context.headers };
    const origin = new URL(context.url).origin;

    if (handler instanceof HttpClientHandler) {
      if (handler.automaticDecompression && !hasHeader(headers, 'accept-encoding')) {
        headers['accept-encoding'] = ACCEPT_ENCODING;
      }
      if (handler.useCookies) {
        const cookie = formatCookies(handler.cookies.get(origin));
        if (cookie) headers['cookie'] = cookie;
      }
    }

    const res = await request(context.url, {
      method: context.method,
      headers,
      body: context.body,
      dispatcher: handler.getDispatcher(),
      signal: context.signal,
    });

    if (handler instanceof HttpClientHandler && handler.useCookies) {
      storeCookies(handler.cookies, origin, res.headers['set-cookie']);
    }

    const raw = await readBounded(res, context.url, this.maxResponseContentBufferSize);

    const decoded = await decodeContent(
      raw,
      res.headers['content-encoding'],
      this.maxResponseContentBufferSize,
      context.url,
    );

    return {
      url: context.url,
      statusCode: res.statusCode,
      headers: res.headers,
      body: parseResponseBody(res.headers, decoded),
    };
  }
}

/**
 * Objects are sent as JSON unless the caller already chose a content-type.
 */
function serializeBody(body: unknown, headers: Record<string, string>): string | Uint8Array | null {
  if (body === undefined || body === null) return null;
  if (typeof body === 'string' || body instanceof Uint8Array) return body;
  if (body instanceof ArrayBuffer) return new Uint8Array(body);
  if (body instanceof URLSearchParams) {
    if (!hasHeader(headers, 'content-type')) {
      headers['content-type'] = 'application/x-www-form-urlencoded';
    }
    return body.toString();
  }

  if (!hasHeader(headers, 'content-type')) {
    headers['content-type'] = 'application/json';
  }
  return JSON.stringify(body);
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  return Object.keys(headers).some((k) => k.toLowerCase() === name);
}

async function readBounded(
  res: Dispatcher.ResponseData,
  url: string,
  limit: number,
): Promise<Buffer> {
  const declared = Number(res.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    res.body.destroy();
    throw ResponseTooLargeError.exceeded(url, limit);
  }

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of res.body) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buffer.length;
    if (total > limit) {
      res.body.destroy();
      throw ResponseTooLargeError.exceeded(url, limit);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks);
}

function parseResponseBody(headers: ResponseHeaders, body: Buffer): unknown {
  const rawCt = headers['content-type'];
  const ct = (Array.isArray(rawCt) ? rawCt[0] : rawCt)?.toLowerCase() ?? '';

  if (body.length === 0) {
    return ct.startsWith('text/') ? '' : null;
  }
  if (ct.includes('application/json') || ct.includes('+json')) {
    try {
      return JSON.parse(body.toString('utf-8'));
    } catch (error) {
      debugHttp('invalid JSON body: %s', error instanceof Error ? error.message : String(error));
      return body.toString('utf-8');
    }
  }
  if (ct.startsWith('text/') || ct.includes('application/x-www-form-urlencoded')) {
    return body.toString('utf-8');
  }
  // Binary fallback
  return body;
}

function formatCookies(cookies: Map<string, string> | undefined): string | undefined {
  if (!cookies || cookies.size === 0) return undefined;
  return [...cookies].map(([name, value]) => `${name}=${value}`).join('; ');
}

function storeCookies(
  jar: Map<string, Map<string, string>>,
  origin: string,
  header: string | string[] | undefined,
): void {
  if (header === undefined) return;

  const cookies = jar.get(origin) ?? new Map<string, string>();
  for (const setCookie of Array.isArray(header) ? header : [header]) {
    const pair = setCookie.split(';', 1)[0];
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
  }
  jar.set(origin, cookies);
}
