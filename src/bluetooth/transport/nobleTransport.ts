/**
 * Noble transport
 * Wraps @abandonware/noble for the local HCI / CoreBluetooth / WinRT adapter.
 *
 * Noble is loaded on first initialize() so that importing this module never
 * touches the radio bindings. A binding can be injected instead.
 */

import { EventEmitter } from 'events';
import { normalizeUuid } from '../attributes';
import {
  AdapterUnavailableError,
  ConnectFailureError,
  WriteFailureError,
  describeError,
} from '../../exceptions';
import { type LinkLogger, linkLogger } from '../../logger';
import type {
  AdvertisedPeripheral,
  DiscoveredService,
  SensorTransport,
  TransportEvent,
  TransportListener,
} from './types';

// The slice of the noble API this transport relies on.

export interface NobleCharacteristic {
  readonly uuid: string;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  removeAllListeners(event: 'data'): unknown;
  subscribeAsync(): Promise<void>;
}

export interface NobleService {
  readonly uuid: string;
  readonly characteristics: NobleCharacteristic[];
}

export interface NoblePeripheral {
  readonly id: string;
  readonly address: string;
  readonly rssi: number;
  readonly state: string;
  readonly advertisement: { localName?: string };
  on(event: 'disconnect', listener: (reason: string) => void): unknown;
  removeListener(event: 'disconnect', listener: (reason: string) => void): unknown;
  connectAsync(): Promise<void>;
  cancelConnect(): void;
  disconnectAsync(): Promise<void>;
  discoverAllServicesAndCharacteristicsAsync(): Promise<{ services: NobleService[] }>;
}

export interface NobleBinding {
  on(event: 'stateChange', listener: (state: string) => void): unknown;
  on(event: 'discover', listener: (peripheral: NoblePeripheral) => void): unknown;
  removeListener(event: 'stateChange', listener: (state: string) => void): unknown;
  removeListener(event: 'discover', listener: (peripheral: NoblePeripheral) => void): unknown;
  startScanningAsync(serviceUuids: string[], allowDuplicates: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
}

const UNAVAILABLE_STATES = new Set(['unsupported', 'unauthorized', 'poweredOff']);

export interface NobleTransportOptions {
  adapterTimeoutMs?: number;
  logger?: LinkLogger;
  noble?: NobleBinding;
}

export class NobleTransport implements SensorTransport {
  private noble: NobleBinding | null = null;
  private adapterState = 'unknown';
  private readonly emitter = new EventEmitter();
  private readonly discovered = new Map<string, NoblePeripheral>();
  private readonly characteristics = new Map<string, NobleCharacteristic>();
  private peripheral: NoblePeripheral | null = null;
  private discoverHandler: ((peripheral: NoblePeripheral) => void) | null = null;
  private disconnectHandler: ((reason: string) => void) | null = null;
  private cancelAddressScan: (() => void) | null = null;
  private attempt = 0;
  private readonly adapterTimeoutMs: number;
  private readonly logger: LinkLogger;
  private readonly injected: NobleBinding | null;

  constructor(options: NobleTransportOptions = {}) {
    this.adapterTimeoutMs = options.adapterTimeoutMs ?? 15_000;
    this.logger = options.logger ?? linkLogger;
    this.injected = options.noble ?? null;
  }

  async initialize(): Promise<void> {
    const noble = this.loadNoble();
    await this.waitForPoweredOn(noble);
    this.logger.info('Adapter powered on', undefined, 'NOBLE');
  }

  async startScan(onPeripheral: (peripheral: AdvertisedPeripheral) => void): Promise<void> {
    const noble = this.requireNoble();
    this.removeDiscoverHandler(noble);

    const handler = (peripheral: NoblePeripheral): void => {
      const address = this.remember(peripheral);
      onPeripheral({
        address,
        name: peripheral.advertisement.localName ?? null,
        rssi: peripheral.rssi,
      });
    };
    this.discoverHandler = handler;
    noble.on('discover', handler);

    this.logger.logTransportEvent('scanStart');
    await noble.startScanningAsync([], false);
  }

  async stopScan(): Promise<void> {
    if (!this.noble) return;
    this.removeDiscoverHandler(this.noble);
    await this.noble.stopScanningAsync();
    this.logger.logTransportEvent('scanStop', { cached: this.discovered.size });
  }

  /**
   * Connects to a peripheral by address. An address no scan has reported yet
   * is looked for with a scan of its own, which stops once it advertises.
   */
  async connect(address: string): Promise<void> {
    this.attempt += 1;
    const attempt = this.attempt;

    const peripheral = this.discovered.get(address.toLowerCase()) ?? (await this.scanForAddress(address));
    if (attempt !== this.attempt) {
      throw new ConnectFailureError(`Connection to ${address} was superseded`);
    }

    this.detachPeripheral();
    this.peripheral = peripheral;

    const onDisconnect = (reason: string): void => {
      this.characteristics.clear();
      this.emit({ type: 'linkLost', address, reason: reason || undefined });
    };
    this.disconnectHandler = onDisconnect;
    peripheral.on('disconnect', onDisconnect);

    this.logger.logConnection(address, 'connectAsync');
    try {
      await peripheral.connectAsync();
    } catch (error) {
      if (attempt !== this.attempt) {
        throw new ConnectFailureError(`Connection to ${address} was cancelled`);
      }
      this.logger.logConnectionError(address, 'connectAsync', error);
      throw new ConnectFailureError(describeError(error, `Connection to ${address} failed`));
    }

    if (attempt !== this.attempt) {
      this.logger.debug(`Dropped link from superseded connect to ${address}`, undefined, 'CONNECTION');
      return;
    }
    this.emit({ type: 'linkEstablished', address });
  }

  /**
   * Tears down the current link. A connect still in flight is cancelled
   * rather than disconnected, since it has no connection handle yet.
   */
  async disconnect(): Promise<void> {
    this.attempt += 1;
    this.cancelAddressScan?.();

    const peripheral = this.peripheral;
    if (!peripheral || peripheral.state === 'disconnected') return;
    if (peripheral.state === 'connecting') {
      this.logger.logTransportEvent('cancelConnect', { address: addressOf(peripheral) });
      peripheral.cancelConnect();
      return;
    }
    await peripheral.disconnectAsync();
  }

  async discoverServices(): Promise<void> {
    const peripheral = this.peripheral;
    if (!peripheral) {
      this.emit({ type: 'servicesDiscovered', status: 'failure', services: [] });
      return;
    }

    try {
      const { services } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
      this.cacheCharacteristics(services);
      this.emit({
        type: 'servicesDiscovered',
        status: 'success',
        services: services.map(toDiscoveredService),
      });
    } catch (error) {
      this.logger.debug('Service discovery failed', { error: describeError(error, 'unknown') }, 'NOBLE');
      this.emit({ type: 'servicesDiscovered', status: 'failure', services: [] });
    }
  }

  async enableNotifications(characteristicUuid: string): Promise<void> {
    const characteristic = this.characteristics.get(normalizeUuid(characteristicUuid));
    if (!characteristic) {
      throw new WriteFailureError(`Characteristic ${characteristicUuid} is not available`);
    }
    try {
      await characteristic.subscribeAsync();
    } catch (error) {
      throw new WriteFailureError(describeError(error, `Subscribe to ${characteristicUuid} failed`));
    }
  }

  subscribe(listener: TransportListener): () => void {
    this.emitter.on('event', listener);
    return () => {
      this.emitter.off('event', listener);
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private emit(event: TransportEvent): void {
    this.logger.logTransportEvent(event.type);
    this.emitter.emit('event', event);
  }

  private loadNoble(): NobleBinding {
    if (this.noble) return this.noble;

    let noble: NobleBinding;
    if (this.injected) {
      noble = this.injected;
    } else {
      try {
        noble = require('@abandonware/noble');
      } catch (error) {
        throw new AdapterUnavailableError(`Bluetooth stack unavailable: ${describeError(error, 'load failed')}`);
      }
    }

    noble.on('stateChange', (state: string) => {
      this.adapterState = state;
      this.logger.logTransportEvent('stateChange', { state });
    });
    this.noble = noble;
    return noble;
  }

  private requireNoble(): NobleBinding {
    if (!this.noble) {
      throw new AdapterUnavailableError('Transport not initialized');
    }
    return this.noble;
  }

  private waitForPoweredOn(noble: NobleBinding): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.adapterState === 'poweredOn') {
        resolve();
        return;
      }

      const finish = (error?: Error): void => {
        clearTimeout(timeout);
        noble.removeListener('stateChange', stateChangeHandler);
        if (error) reject(error);
        else resolve();
      };

      const stateChangeHandler = (state: string): void => {
        if (state === 'poweredOn') {
          finish();
        } else if (UNAVAILABLE_STATES.has(state)) {
          finish(new AdapterUnavailableError(`Bluetooth adapter is ${state}`));
        }
      };

      const timeout = setTimeout(() => {
        finish(new AdapterUnavailableError(`Bluetooth adapter not ready after ${this.adapterTimeoutMs} ms`));
      }, this.adapterTimeoutMs);

      if (UNAVAILABLE_STATES.has(this.adapterState)) {
        finish(new AdapterUnavailableError(`Bluetooth adapter is ${this.adapterState}`));
        return;
      }
      noble.on('stateChange', stateChangeHandler);
    });
  }

  private scanForAddress(address: string): Promise<NoblePeripheral> {
    const noble = this.requireNoble();
    const wanted = address.toLowerCase();
    this.logger.logConnection(address, 'scanForAddress');

    return new Promise((resolve, reject) => {
      const handler = (candidate: NoblePeripheral): void => {
        this.remember(candidate);
        if (candidate.address.toLowerCase() !== wanted && candidate.id.toLowerCase() !== wanted) return;
        finish();
        resolve(candidate);
      };

      const finish = (): void => {
        noble.removeListener('discover', handler);
        this.cancelAddressScan = null;
        noble.stopScanningAsync().catch((error: unknown) => {
          this.logger.warn('Stop scan failed', { error: describeError(error, 'unknown') }, 'NOBLE');
        });
      };

      this.cancelAddressScan = () => {
        finish();
        reject(new ConnectFailureError(`Scan for ${address} was cancelled`));
      };

      noble.on('discover', handler);
      noble.startScanningAsync([], false).catch((error: unknown) => {
        finish();
        reject(new ConnectFailureError(describeError(error, `Scan for ${address} failed`)));
      });
    });
  }

  private remember(peripheral: NoblePeripheral): string {
    const address = addressOf(peripheral);
    this.discovered.set(address.toLowerCase(), peripheral);
    return address;
  }

  private removeDiscoverHandler(noble: NobleBinding): void {
    if (this.discoverHandler) {
      noble.removeListener('discover', this.discoverHandler);
      this.discoverHandler = null;
    }
  }

  private detachPeripheral(): void {
    if (this.peripheral && this.disconnectHandler) {
      this.peripheral.removeListener('disconnect', this.disconnectHandler);
    }
    this.disconnectHandler = null;
    this.characteristics.clear();
  }

  private cacheCharacteristics(services: NobleService[]): void {
    this.characteristics.clear();
    for (const service of services) {
      for (const characteristic of service.characteristics) {
        const uuid = normalizeUuid(characteristic.uuid);
        characteristic.removeAllListeners('data');
        characteristic.on('data', (data: Buffer) => {
          this.emit({ type: 'characteristicNotification', uuid, value: data });
        });
        this.characteristics.set(uuid, characteristic);
      }
    }
  }
}

function addressOf(peripheral: NoblePeripheral): string {
  return peripheral.address || peripheral.id;
}

function toDiscoveredService(service: NobleService): DiscoveredService {
  return {
    uuid: service.uuid,
    characteristics: service.characteristics.map((characteristic) => ({
      uuid: characteristic.uuid,
      handle: null,
    })),
  };
}
