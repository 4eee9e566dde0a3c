import { debugHttp } from '../utils/debug.js';
import type { HttpErrorPolicy, ResiliencePipeline } from './retry.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS';

/**
 * Buffered HTTP response
 */
export interface TransportResponse {
  url: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  /** Parsed according to content-type: JSON value, string, or Buffer */
  body: unknown;
}

/**
 * HTTP request context for middleware
 */
export interface RequestContext {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string | Uint8Array | null;
  /** Incremented each time a policy replays the request */
  attempt: number;
  startTime: number;
  /** Shared by every attempt, so replays count against the same timeout */
  signal: AbortSignal;
}

/**
 * Middleware function type. `next` may be called more than once to replay a request.
 */
export type Middleware = (
  context: RequestContext,
  next: () => Promise<TransportResponse>,
) => Promise<TransportResponse>;

/**
 * Middleware that adds request/response logging with timing
 */
export function loggingMiddleware(): Middleware {
  return async (context, next) => {
    const start = Date.now();
    debugHttp('→ %s %s attempt=%d', context.method, context.url, context.attempt);

    try {
      const response = await next();

      debugHttp(
        '← %s %s status=%d durationMs=%d',
        context.method,
        context.url,
        response.statusCode,
        Date.now() - start,
      );

      return response;
    } catch (error) {
      debugHttp(
        '← %s %s failed after %dms: %s',
        context.method,
        context.url,
        Date.now() - start,
        error instanceof Error ? error.message : String(error),
      );

      throw error;
    }
  };
}

/**
 * Middleware that adds User-Agent header if missing
 */
export function userAgentMiddleware(userAgent: string): Middleware {
  return async (context, next) => {
    const hasUA = Object.keys(context.headers).some((k) => k.toLowerCase() === 'user-agent');

    if (!hasUA) {
      context.headers['User-Agent'] = userAgent;
    }

    return next();
  };
}

/**
 * Middleware replaying requests through a legacy-style error policy
 */
export function policyMiddleware(policy: HttpErrorPolicy): Middleware {
  return (context, next) =>
    policy.execute(() => {
      context.attempt++;
      return next();
    });
}

/**
 * Middleware running requests inside a resilience pipeline
 */
export function resilienceMiddleware(pipeline: ResiliencePipeline): Middleware {
  return (context, next) =>
    pipeline.execute(
      () => {
        context.attempt++;
        return next();
      },
      { url: context.url, method: context.method, signal: context.signal },
    );
}

/**
 * Middleware pipeline executor
 */
export class MiddlewarePipeline {
  private middlewares: Middleware[] = [];

  /**
   * Add middleware to the pipeline
   */
  use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  /**
   * Execute the middleware pipeline
   */
  execute(
    context: RequestContext,
    finalHandler: (context: RequestContext) => Promise<TransportResponse>,
  ): Promise<TransportResponse> {
    const dispatch = (index: number): Promise<TransportResponse> => {
      if (index >= this.middlewares.length) {
        return finalHandler(context);
      }

      return this.middlewares[index](context, () => dispatch(index + 1));
    };

    return dispatch(0);
  }

  /**
   * Get the number of middlewares in the pipeline
   */
  get length(): number {
    return this.middlewares.length;
  }
}
