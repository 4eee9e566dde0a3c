import {
  selectSelfSignedTlsClientCertificate,
  selectTlsClientCertificate,
  type CertificateSelector,
} from '../certificates/selector.js';
import { TRANSPORT_NAME_PREFIX } from '../constants/defaults.js';
import type { ClientRegistration } from '../registrations/types.js';
import type { HttpClientHandler } from '../transport/handlers.js';
import type { HttpTransport } from '../transport/http-transport.js';
import {
  RetryPolicy,
  type HttpErrorPolicy,
  type ResiliencePipeline,
} from '../transport/retry.js';

/**
 * Customizes the transport of a registration after the security defaults were applied.
 */
export type ClientAction = (registration: ClientRegistration, transport: HttpTransport) => void;

/**
 * Customizes the certificate-capable handler of a registration's transport.
 */
export type HandlerAction = (registration: ClientRegistration, handler: HttpClientHandler) => void;

/**
 * Immutable snapshot produced by TransportOptionsBuilder.
 */
export interface TransportIntegrationOptions {
  /** Prefix identifying the transport names managed by this integration */
  readonly prefix: string;
  readonly clientActions: readonly ClientAction[];
  readonly handlerActions: readonly HandlerAction[];
  /** At most one of httpErrorPolicy and resiliencePipeline is set */
  readonly httpErrorPolicy?: HttpErrorPolicy;
  readonly resiliencePipeline?: ResiliencePipeline;
  readonly selfSignedTlsClientCertificateSelector: CertificateSelector;
  readonly tlsClientCertificateSelector: CertificateSelector;
}

type ResilienceChoice =
  | { kind: 'default' }
  | { kind: 'policy'; policy: HttpErrorPolicy }
  | { kind: 'pipeline'; pipeline: ResiliencePipeline }
  | { kind: 'none' };

/**
 * Collects the integration settings and resolves their defaults once, in `build()`.
 *
 * Unless told otherwise the snapshot carries a RetryPolicy with the default configuration
 * and the built-in certificate selectors.
 */
export class TransportOptionsBuilder {
  private prefix = TRANSPORT_NAME_PREFIX;
  private readonly clientActions: ClientAction[] = [];
  private readonly handlerActions: HandlerAction[] = [];
  private resilience: ResilienceChoice = { kind: 'default' };
  private selfSignedSelector: CertificateSelector | undefined;
  private tlsSelector: CertificateSelector | undefined;

  setPrefix(prefix: string): this {
    if (!prefix || prefix.includes(':')) {
      throw new TypeError('The transport name prefix must be non-empty and cannot contain ":"');
    }
    this.prefix = prefix;
    return this;
  }

  addClientAction(action: ClientAction): this {
    this.clientActions.push(action);
    return this;
  }

  addHandlerAction(action: HandlerAction): this {
    this.handlerActions.push(action);
    return this;
  }

  /** Replaces any resilience pipeline previously set */
  setHttpErrorPolicy(policy: HttpErrorPolicy): this {
    this.resilience = { kind: 'policy', policy };
    return this;
  }

  /** Replaces any error policy previously set, including the default one */
  setResiliencePipeline(pipeline: ResiliencePipeline): this {
    this.resilience = { kind: 'pipeline', pipeline };
    return this;
  }

  /** Attaches neither an error policy nor a resilience pipeline */
  disableResilience(): this {
    this.resilience = { kind: 'none' };
    return this;
  }

  setSelfSignedTlsClientCertificateSelector(selector: CertificateSelector): this {
    this.selfSignedSelector = selector;
    return this;
  }

  setTlsClientCertificateSelector(selector: CertificateSelector): this {
    this.tlsSelector = selector;
    return this;
  }

  build(): TransportIntegrationOptions {
    const choice = this.resilience;

    return Object.freeze({
      prefix: this.prefix,
      clientActions: Object.freeze([...this.clientActions]),
      handlerActions: Object.freeze([...this.handlerActions]),
      httpErrorPolicy:
        choice.kind === 'default'
          ? new RetryPolicy()
          : choice.kind === 'policy'
            ? choice.policy
            : undefined,
      resiliencePipeline: choice.kind === 'pipeline' ? choice.pipeline : undefined,
      selfSignedTlsClientCertificateSelector:
        this.selfSignedSelector ?? selectSelfSignedTlsClientCertificate,
      tlsClientCertificateSelector: this.tlsSelector ?? selectTlsClientCertificate,
    });
  }
}
