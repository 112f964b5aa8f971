import type { SensorFrame } from '../../../signal/classifier';
import type { DiscoveredService, DiscoveryStatus } from '../../transport/types';

/**
 * Link machine events - all possible events the machine can receive
 */
export type LinkEvent =
  | { type: 'START' }
  | { type: 'CONNECT'; address: string }
  | { type: 'DISCONNECT' }
  | { type: 'SENSOR_FOUND'; address: string; name: string | null }
  | { type: 'SCAN_FAILED'; message: string }
  | { type: 'LINK_ESTABLISHED' }
  | { type: 'LINK_LOST'; reason?: string }
  | { type: 'SERVICES_DISCOVERED'; status: DiscoveryStatus; services: DiscoveredService[] }
  | { type: 'SENSOR_FRAME'; frame: SensorFrame };
