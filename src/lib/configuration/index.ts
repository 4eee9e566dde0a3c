export {
  TransportConfiguration,
  applyTransportDefaults,
  hardenHandler,
  type ClientOptions,
  type TransportConfigurationContext,
} from './transport-configuration.js';
export {
  TransportOptionsBuilder,
  type ClientAction,
  type HandlerAction,
  type TransportIntegrationOptions,
} from './options.js';
