export {
  encodeTransportName,
  decodeTransportName,
  isManagedTransportName,
  readBooleanProperty,
  type PropertyBag,
  type PropertyInput,
} from './name-codec.js';
export { createTransportName, type TransportNameOptions } from './transport-name.js';
