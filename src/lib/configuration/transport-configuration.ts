import type { CertificateSelector } from '../certificates/selector.js';
import { DEFAULT_CLIENT_AUTHENTICATION_METHODS } from '../constants/client-authentication.js';
import {
  MAX_RESPONSE_CONTENT_BUFFER_SIZE,
  PROPERTY_ATTACH_SELF_SIGNED_TLS_CLIENT_CERTIFICATE,
  PROPERTY_ATTACH_TLS_CLIENT_CERTIFICATE,
  PROPERTY_REGISTRATION_ID,
  TRANSPORT_TIMEOUT_MS,
} from '../constants/defaults.js';
import { UnsupportedHandlerError } from '../errors/transport-errors.js';
import {
  decodeTransportName,
  isManagedTransportName,
  readBooleanProperty,
  type PropertyBag,
} from '../naming/name-codec.js';
import type { ClientRegistration, ClientRegistrationResolver } from '../registrations/types.js';
import { HttpClientHandler, type PrimaryHandler } from '../transport/handlers.js';
import type { HttpTransport } from '../transport/http-transport.js';
import { policyMiddleware, resilienceMiddleware } from '../transport/middleware.js';
import type {
  TransportBuilder,
  TransportConfigurator,
  TransportFactoryOptions,
} from '../transport/transport-factory.js';
import { debugConfig } from '../utils/debug.js';
import type { TransportIntegrationOptions } from './options.js';

/**
 * Everything the configurator needs, passed in explicitly.
 */
export interface TransportConfigurationContext {
  resolver: ClientRegistrationResolver;
  options: TransportIntegrationOptions;
}

/**
 * Client-level options the integration amends when it is registered.
 */
export interface ClientOptions {
  clientAuthenticationMethods: Set<string>;
}

/**
 * Caps applied to every managed transport before user customizations run.
 */
export function applyTransportDefaults(transport: HttpTransport): void {
  transport.maxResponseContentBufferSize = MAX_RESPONSE_CONTENT_BUFFER_SIZE;
  transport.timeoutMs = TRANSPORT_TIMEOUT_MS;
}

/**
 * Turns off automatic decompression and cookies. Safe to call more than once.
 *
 * Automatic decompression always advertises Accept-Encoding, which exposes secrets reflected
 * in compressed responses to compression side channels; encoded responses are still decoded
 * by the content layer. Cookies are disabled because pooled handlers are shared by unrelated
 * callers.
 */
export function hardenHandler(handler: HttpClientHandler): void {
  if (handler.supportsAutomaticDecompression) {
    handler.automaticDecompression = false;
  }
  handler.useCookies = false;
}

function requireHttpClientHandler(handler: PrimaryHandler): HttpClientHandler {
  if (!(handler instanceof HttpClientHandler)) {
    throw UnsupportedHandlerError.requires(HttpClientHandler.name, handler.handlerType);
  }
  return handler;
}

/**
 * Configures the transports whose name was produced by `createTransportName`.
 *
 * Registered on a TransportFactory, it decodes the properties flowed through the transport
 * name, resolves the client registration they point to and amends the transport accordingly.
 * Transports with other names are left untouched.
 */
export class TransportConfiguration implements TransportConfigurator {
  private readonly resolver: ClientRegistrationResolver;
  private readonly options: TransportIntegrationOptions;

  constructor(context: TransportConfigurationContext) {
    this.resolver = context.resolver;
    this.options = context.options;
  }

  /**
   * Enables client_secret_basic, self_signed_tls_client_auth and tls_client_auth.
   */
  configureClientOptions(clientOptions: ClientOptions): void {
    for (const method of DEFAULT_CLIENT_AUTHENTICATION_METHODS) {
      clientOptions.clientAuthenticationMethods.add(method);
    }
  }

  async configure(name: string, factoryOptions: TransportFactoryOptions): Promise<void> {
    const properties = decodeTransportName(name, this.options.prefix);
    const identifier = properties.get(PROPERTY_REGISTRATION_ID);
    if (!identifier) {
      return;
    }

    // Resolved once per build and captured by the actions below; never cached across builds.
    const registration = await this.resolver.getClientRegistrationById(identifier);
    const options = this.options;

    debugConfig('configuring transport for registration %s', identifier);

    factoryOptions.clientActions.push(applyTransportDefaults);

    for (const action of options.clientActions) {
      factoryOptions.clientActions.push((transport) => action(registration, transport));
    }

    factoryOptions.builderActions.push((builder) =>
      this.configureHandler(builder, registration, properties),
    );

    for (const action of options.handlerActions) {
      factoryOptions.builderActions.push((builder) =>
        action(registration, requireHttpClientHandler(builder.primaryHandler)),
      );
    }
  }

  postConfigure(name: string, factoryOptions: TransportFactoryOptions): void {
    if (!isManagedTransportName(name, this.options.prefix)) {
      return;
    }

    factoryOptions.builderActions.unshift((builder) => {
      if (!(builder.primaryHandler instanceof HttpClientHandler)) {
        debugConfig(
          'replacing %s with HttpClientHandler for %j',
          builder.primaryHandler.handlerType,
          builder.name,
        );
        builder.primaryHandler = new HttpClientHandler();
      }
    });

    factoryOptions.builderActions.push((builder) =>
      hardenHandler(requireHttpClientHandler(builder.primaryHandler)),
    );
  }

  private configureHandler(
    builder: TransportBuilder,
    registration: ClientRegistration,
    properties: PropertyBag,
  ): void {
    const { httpErrorPolicy, resiliencePipeline } = this.options;
    if (httpErrorPolicy) {
      builder.additionalHandlers.push(policyMiddleware(httpErrorPolicy));
    } else if (resiliencePipeline) {
      builder.additionalHandlers.push(resilienceMiddleware(resiliencePipeline));
    }

    const handler = requireHttpClientHandler(builder.primaryHandler);
    handler.clientCertificateOptions = 'manual';

    let selector: CertificateSelector | undefined;
    if (readBooleanProperty(properties, PROPERTY_ATTACH_TLS_CLIENT_CERTIFICATE)) {
      selector = this.options.tlsClientCertificateSelector;
    } else if (readBooleanProperty(properties, PROPERTY_ATTACH_SELF_SIGNED_TLS_CLIENT_CERTIFICATE)) {
      selector = this.options.selfSignedTlsClientCertificateSelector;
    }

    const certificate = selector?.(registration);
    if (certificate) {
      handler.clientCertificates.push(certificate);
    }

    debugConfig(
      'handler configured for %s (certificate=%s)',
      registration.registrationId,
      certificate ? certificate.certificate.subject : 'none',
    );
  }
}
