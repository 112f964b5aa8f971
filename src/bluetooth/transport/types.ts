/**
 * Radio transport contract
 * Outbound commands are promises; link lifecycle arrives as events.
 */

export interface CharacteristicDescriptor {
  uuid: string;
  name: string;
  handle: number | null;
}

export interface ServiceDescriptor {
  uuid: string;
  name: string;
  characteristics: CharacteristicDescriptor[];
}

export type ServiceCatalog = ServiceDescriptor[];

export interface AdvertisedPeripheral {
  address: string;
  name: string | null;
  rssi: number;
}

export type DiscoveryStatus = 'success' | 'failure';

export interface DiscoveredService {
  uuid: string;
  characteristics: Array<{ uuid: string; handle: number | null }>;
}

export type TransportEvent =
  | { type: 'linkEstablished'; address: string }
  | { type: 'linkLost'; address: string; reason?: string }
  | { type: 'servicesDiscovered'; status: DiscoveryStatus; services: DiscoveredService[] }
  | { type: 'characteristicNotification'; uuid: string; value: Uint8Array };

export type TransportListener = (event: TransportEvent) => void;

export interface SensorTransport {
  /** Resolves once the local adapter is powered on; AdapterUnavailableError otherwise. */
  initialize(): Promise<void>;
  startScan(onPeripheral: (peripheral: AdvertisedPeripheral) => void): Promise<void>;
  stopScan(): Promise<void>;
  connect(address: string): Promise<void>;
  disconnect(): Promise<void>;
  /** Requests discovery; the outcome arrives as a `servicesDiscovered` event. */
  discoverServices(): Promise<void>;
  enableNotifications(characteristicUuid: string): Promise<void>;
  subscribe(listener: TransportListener): () => void;
}
