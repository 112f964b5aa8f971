import type { SensorLinkConfig } from '../../../config';
import type { DirectionState } from '../../../signal/classifier';
import type { SignalPublisher } from '../../../signal/publisher';
import type { SensorTransport, ServiceCatalog } from '../../transport/types';

/**
 * Link machine context - holds all state data
 */
export interface LinkContext {
  transport: SensorTransport;
  publisher: SignalPublisher;
  config: SensorLinkConfig;
  address: string | null;
  deviceName: string | null;
  catalog: ServiceCatalog;
  direction: DirectionState;
  framesReceived: number;
  reconnects: number;
  error: string | null;
}

/**
 * Values supplied when the link actor is created
 */
export interface LinkInput {
  transport: SensorTransport;
  publisher: SignalPublisher;
  config: SensorLinkConfig;
}
