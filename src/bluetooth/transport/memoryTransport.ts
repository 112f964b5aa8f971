/**
 * In-process transport that simulates a single sensor band.
 * Every outbound command is recorded; inbound events are raised by the caller.
 */

import { EventEmitter } from 'events';
import { AdapterUnavailableError, ConnectFailureError, WriteFailureError } from '../../exceptions';
import type {
  AdvertisedPeripheral,
  DiscoveredService,
  DiscoveryStatus,
  SensorTransport,
  TransportEvent,
  TransportListener,
} from './types';

export type TransportCall =
  | { method: 'initialize' }
  | { method: 'startScan' }
  | { method: 'stopScan' }
  | { method: 'connect'; address: string }
  | { method: 'disconnect' }
  | { method: 'discoverServices' }
  | { method: 'enableNotifications'; uuid: string };

export type TransportMethod = TransportCall['method'];

export interface MemoryTransportOptions {
  adapterAvailable?: boolean;
  services?: DiscoveredService[];
}

export class MemoryTransport implements SensorTransport {
  readonly calls: TransportCall[] = [];
  adapterAvailable: boolean;
  services: DiscoveredService[];
  connectError: Error | null = null;
  enableError: Error | null = null;
  /** When set, disconnect() never settles. */
  disconnectStalls = false;

  private readonly emitter = new EventEmitter();
  private scanHandler: ((peripheral: AdvertisedPeripheral) => void) | null = null;
  private linkedAddress: string | null = null;
  private pendingAddress: string | null = null;

  constructor(options: MemoryTransportOptions = {}) {
    this.adapterAvailable = options.adapterAvailable ?? true;
    this.services = options.services ?? [];
  }

  get isScanning(): boolean {
    return this.scanHandler !== null;
  }

  get listenerCount(): number {
    return this.emitter.listenerCount('event');
  }

  callsOf<M extends TransportMethod>(method: M): Array<Extract<TransportCall, { method: M }>> {
    return this.calls.filter((call): call is Extract<TransportCall, { method: M }> => call.method === method);
  }

  async initialize(): Promise<void> {
    this.calls.push({ method: 'initialize' });
    if (!this.adapterAvailable) {
      throw new AdapterUnavailableError('No Bluetooth adapter available');
    }
  }

  async startScan(onPeripheral: (peripheral: AdvertisedPeripheral) => void): Promise<void> {
    this.calls.push({ method: 'startScan' });
    this.scanHandler = onPeripheral;
  }

  async stopScan(): Promise<void> {
    this.calls.push({ method: 'stopScan' });
    this.scanHandler = null;
  }

  async connect(address: string): Promise<void> {
    this.calls.push({ method: 'connect', address });
    if (this.connectError) {
      throw this.connectError;
    }
    if (!address) {
      throw new ConnectFailureError('No peripheral address');
    }
    this.pendingAddress = address;
  }

  async disconnect(): Promise<void> {
    this.calls.push({ method: 'disconnect' });
    if (this.disconnectStalls) {
      return new Promise<void>(() => undefined);
    }
    const address = this.linkedAddress;
    this.pendingAddress = null;
    if (address) {
      this.linkedAddress = null;
      this.emit({ type: 'linkLost', address, reason: 'local disconnect' });
    }
  }

  async discoverServices(): Promise<void> {
    this.calls.push({ method: 'discoverServices' });
  }

  async enableNotifications(characteristicUuid: string): Promise<void> {
    this.calls.push({ method: 'enableNotifications', uuid: characteristicUuid });
    if (this.enableError) {
      throw new WriteFailureError(this.enableError.message);
    }
  }

  subscribe(listener: TransportListener): () => void {
    this.emitter.on('event', listener);
    return () => {
      this.emitter.off('event', listener);
    };
  }

  // Simulation controls

  advertise(peripheral: AdvertisedPeripheral): void {
    this.scanHandler?.(peripheral);
  }

  establishLink(): void {
    const address = this.pendingAddress ?? this.linkedAddress;
    if (!address) {
      throw new Error('establishLink() called without a pending connection');
    }
    this.pendingAddress = null;
    this.linkedAddress = address;
    this.emit({ type: 'linkEstablished', address });
  }

  loseLink(reason?: string): void {
    const address = this.linkedAddress ?? this.pendingAddress ?? '';
    this.linkedAddress = null;
    this.pendingAddress = null;
    this.emit({ type: 'linkLost', address, reason });
  }

  completeDiscovery(status: DiscoveryStatus = 'success'): void {
    this.emit({
      type: 'servicesDiscovered',
      status,
      services: status === 'success' ? this.services : [],
    });
  }

  notify(uuid: string, bytes: number[]): void {
    this.emit({ type: 'characteristicNotification', uuid, value: Uint8Array.from(bytes) });
  }

  private emit(event: TransportEvent): void {
    this.emitter.emit('event', event);
  }
}
