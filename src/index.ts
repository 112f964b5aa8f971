/**
 * sensor-link
 * BLE sensor band to directional control signal bridge.
 */

// Main API
export * from './bluetooth/state-machine';

// Transport
export { NobleTransport, type NobleTransportOptions } from './bluetooth/transport/nobleTransport';
export {
  MemoryTransport,
  type MemoryTransportOptions,
  type TransportCall,
  type TransportMethod,
} from './bluetooth/transport/memoryTransport';
export * from './bluetooth/transport/types';

// Registry
export * from './bluetooth/constants';
export {
  buildServiceCatalog,
  findCharacteristic,
  isSameUuid,
  isSensorCharacteristic,
  lookup,
  normalizeUuid,
} from './bluetooth/attributes';

// Signal
export * from './signal/classifier';
export { SignalPublisher, type SignalListener } from './signal/publisher';

// Ambient
export * from './config';
export * from './exceptions';
export { LinkLogger, linkLogger, type LinkLoggerOptions, type LogLevel } from './logger';
