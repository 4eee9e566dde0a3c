import { Agent, type Dispatcher } from 'undici';
import type { ClientCertificate } from '../registrations/types.js';
import { debugTransport } from '../utils/debug.js';

/**
 * The connection-level handler at the bottom of a transport's handler chain.
 */
export interface PrimaryHandler {
  readonly handlerType: string;
  /** Returns the undici dispatcher, creating it on first use */
  getDispatcher(): Dispatcher;
  close(): Promise<void>;
}

export interface PooledConnectionOptions {
  /** Maximum sockets per origin */
  connections?: number;
  keepAliveTimeoutMs?: number;
}

/**
 * Plain pooled connections. Cannot present client certificates.
 */
export class PooledConnectionHandler implements PrimaryHandler {
  readonly handlerType: string = 'PooledConnectionHandler';
  private dispatcher: Agent | undefined;

  constructor(private readonly options: PooledConnectionOptions = {}) {}

  getDispatcher(): Dispatcher {
    this.dispatcher ??= new Agent({
      connections: this.options.connections,
      keepAliveTimeout: this.options.keepAliveTimeoutMs,
    });
    return this.dispatcher;
  }

  async close(): Promise<void> {
    const dispatcher = this.dispatcher;
    this.dispatcher = undefined;
    await dispatcher?.close();
  }
}

/**
 * 'automatic' leaves the TLS stack to its defaults, 'manual' presents the first entry of
 * `clientCertificates`.
 */
export type ClientCertificateOption = 'automatic' | 'manual';

/**
 * Certificate-capable handler. Its settings are read when the dispatcher is first created,
 * so they must be final by the time the transport sends its first request.
 */
export class HttpClientHandler implements PrimaryHandler {
  readonly handlerType: string = 'HttpClientHandler';

  clientCertificateOptions: ClientCertificateOption = 'automatic';
  readonly clientCertificates: ClientCertificate[] = [];

  readonly supportsAutomaticDecompression: boolean = true;
  /** When enabled the transport advertises gzip, deflate and br in Accept-Encoding */
  automaticDecompression = true;

  useCookies = true;
  /** Cookies received by this handler, keyed by origin then cookie name */
  readonly cookies = new Map<string, Map<string, string>>();

  private dispatcher: Agent | undefined;

  constructor(private readonly options: PooledConnectionOptions = {}) {}

  getDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      const certificate =
        this.clientCertificateOptions === 'manual' ? this.clientCertificates[0] : undefined;

      debugTransport(
        'creating dispatcher (mode=%s, certificate=%s)',
        this.clientCertificateOptions,
        certificate ? certificate.certificate.subject : 'none',
      );

      this.dispatcher = new Agent({
        connections: this.options.connections,
        keepAliveTimeout: this.options.keepAliveTimeoutMs,
        connect: certificate
          ? { cert: certificate.certificate.toString('pem'), key: certificate.privateKey }
          : undefined,
      });
    }
    return this.dispatcher;
  }

  async close(): Promise<void> {
    const dispatcher = this.dispatcher;
    this.dispatcher = undefined;
    await dispatcher?.close();
  }
}
