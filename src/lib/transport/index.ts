/**
 * Transport layer
 *
 * Named, pooled HTTP transports built on undici, with a replayable middleware chain,
 * opaque resilience policies and content-layer response decoding.
 */

export {
  TransportFactory,
  type TransportBuilder,
  type TransportBuilderAction,
  type TransportClientAction,
  type TransportConfigurator,
  type TransportFactoryOptions,
  type TransportFactorySettings,
} from './transport-factory.js';

export { HttpTransport, type HttpTransportOptions, type TransportRequest } from './http-transport.js';

export {
  HttpClientHandler,
  PooledConnectionHandler,
  type ClientCertificateOption,
  type PooledConnectionOptions,
  type PrimaryHandler,
} from './handlers.js';

export {
  MiddlewarePipeline,
  loggingMiddleware,
  userAgentMiddleware,
  policyMiddleware,
  resilienceMiddleware,
  type HttpMethod,
  type Middleware,
  type RequestContext,
  type TransportResponse,
} from './middleware.js';

export {
  RetryPolicy,
  isRetryableError,
  isRetryableStatus,
  getRetryAfterMs,
  calculateRetryDelay,
  sleep,
  DEFAULT_RETRY_CONFIG,
  type HttpErrorPolicy,
  type ResilienceContext,
  type ResiliencePipeline,
  type RetryConfig,
} from './retry.js';

export { decodeContent, parseContentEncoding } from './content-decoding.js';
