import { EventEmitter } from 'events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SENSOR_CHARACTERISTIC_UUID } from '../constants';
import { AdapterUnavailableError, ConnectFailureError, WriteFailureError } from '../../exceptions';
import { LinkLogger } from '../../logger';
import {
  type NobleBinding,
  type NobleCharacteristic,
  type NoblePeripheral,
  type NobleService,
  NobleTransport,
} from './nobleTransport';
import type { TransportEvent } from './types';

const SENSOR_UUID_RAW = '436802014d741001726b526f64696f6e';
const SENSOR_SERVICE_UUID_RAW = '4368f0004d741001726b526f64696f6e';

class FakeNoble extends EventEmitter implements NobleBinding {
  scanning = false;
  startScanCalls = 0;
  stopScanCalls = 0;
  startScanError: Error | null = null;

  async startScanningAsync(): Promise<void> {
    this.startScanCalls += 1;
    if (this.startScanError) throw this.startScanError;
    this.scanning = true;
  }

  async stopScanningAsync(): Promise<void> {
    this.stopScanCalls += 1;
    this.scanning = false;
  }

  powerState(state: string): void {
    this.emit('stateChange', state);
  }

  advertise(peripheral: NoblePeripheral): void {
    this.emit('discover', peripheral);
  }
}

class FakeCharacteristic extends EventEmitter implements NobleCharacteristic {
  subscribeCalls = 0;
  subscribeError: Error | null = null;

  constructor(readonly uuid: string) {
    super();
  }

  async subscribeAsync(): Promise<void> {
    this.subscribeCalls += 1;
    if (this.subscribeError) throw this.subscribeError;
  }
}

class FakePeripheral extends EventEmitter implements NoblePeripheral {
  state = 'disconnected';
  readonly advertisement: { localName?: string };
  services: NobleService[] = [];
  connectError: Error | null = null;
  discoverError: Error | null = null;
  holdConnect = false;
  cancelIgnored = false;
  cancelConnectCalls = 0;
  disconnectCalls = 0;
  private pending: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(
    readonly id: string,
    readonly address: string,
    localName?: string,
    readonly rssi = -50,
  ) {
    super();
    this.advertisement = localName === undefined ? {} : { localName };
  }

  connectAsync(): Promise<void> {
    if (this.connectError) return Promise.reject(this.connectError);
    this.state = 'connecting';
    if (!this.holdConnect) {
      this.state = 'connected';
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  completeConnect(): void {
    this.state = 'connected';
    this.pending?.resolve();
    this.pending = null;
  }

  cancelConnect(): void {
    this.cancelConnectCalls += 1;
    if (this.cancelIgnored) return;
    this.state = 'disconnected';
    this.pending?.reject(new Error('connection canceled!'));
    this.pending = null;
  }

  async disconnectAsync(): Promise<void> {
    this.disconnectCalls += 1;
    this.drop('');
  }

  drop(reason: string): void {
    this.state = 'disconnected';
    this.emit('disconnect', reason);
  }

  async discoverAllServicesAndCharacteristicsAsync(): Promise<{ services: NobleService[] }> {
    if (this.discoverError) throw this.discoverError;
    return { services: this.services };
  }
}

describe('NobleTransport', () => {
  let noble: FakeNoble;
  let transport: NobleTransport;
  let events: TransportEvent[];
  let band: FakePeripheral;

  beforeEach(() => {
    noble = new FakeNoble();
    transport = new NobleTransport({
      noble,
      adapterTimeoutMs: 1_000,
      logger: new LinkLogger({ level: 'error', write: () => undefined }),
    });
    events = [];
    transport.subscribe((event) => events.push(event));
    band = new FakePeripheral('aabbccddee01', 'aa:bb:cc:dd:ee:01', 'FEST-X 01', -48);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  async function ready(): Promise<void> {
    const init = transport.initialize();
    noble.powerState('poweredOn');
    await init;
  }

  async function scanned(peripheral: FakePeripheral): Promise<void> {
    await ready();
    await transport.startScan(() => undefined);
    noble.advertise(peripheral);
    await transport.stopScan();
  }

  describe('initialize', () => {
    it('resolves once the adapter powers on', async () => {
      await expect(ready()).resolves.toBeUndefined();
    });

    it.each(['unsupported', 'unauthorized', 'poweredOff'])('rejects when the adapter is %s', async (state) => {
      const init = transport.initialize();
      noble.powerState(state);

      await expect(init).rejects.toThrow(AdapterUnavailableError);
      await expect(init).rejects.toThrow(`Bluetooth adapter is ${state}`);
    });

    it('rejects when the adapter never becomes ready', async () => {
      vi.useFakeTimers();
      const init = transport.initialize();
      const outcome = expect(init).rejects.toThrow('Bluetooth adapter not ready after 1000 ms');

      await vi.advanceTimersByTimeAsync(1_000);

      await outcome;
    });
  });

  describe('scanning', () => {
    it('reports advertised peripherals until stopped', async () => {
      await ready();
      const seen: unknown[] = [];

      await transport.startScan((peripheral) => seen.push(peripheral));
      noble.advertise(band);
      noble.advertise(new FakePeripheral('112233445566', '11:22:33:44:55:66'));
      await transport.stopScan();
      noble.advertise(band);

      expect(seen).toEqual([
        { address: 'aa:bb:cc:dd:ee:01', name: 'FEST-X 01', rssi: -48 },
        { address: '11:22:33:44:55:66', name: null, rssi: -50 },
      ]);
      expect(noble.scanning).toBe(false);
    });
  });

  describe('connect', () => {
    it('connects to a scanned peripheral and reports the link', async () => {
      await scanned(band);

      await transport.connect('aa:bb:cc:dd:ee:01');

      expect(events).toEqual([{ type: 'linkEstablished', address: 'aa:bb:cc:dd:ee:01' }]);
      expect(band.state).toBe('connected');
    });

    it('scans for an address it has not seen, then connects once it advertises', async () => {
      await ready();

      const connecting = transport.connect('AA:BB:CC:DD:EE:01');
      expect(noble.startScanCalls).toBe(1);

      noble.advertise(new FakePeripheral('112233445566', '11:22:33:44:55:66', 'Headphones'));
      noble.advertise(band);
      await connecting;

      expect(events).toEqual([{ type: 'linkEstablished', address: 'AA:BB:CC:DD:EE:01' }]);
      expect(noble.stopScanCalls).toBe(1);
      expect(noble.listenerCount('discover')).toBe(0);
    });

    it('fails when the scan for an address cannot start', async () => {
      await ready();
      noble.startScanError = new Error('Scan already in progress');

      await expect(transport.connect('aa:bb:cc:dd:ee:01')).rejects.toThrow(ConnectFailureError);
      expect(noble.listenerCount('discover')).toBe(0);
    });

    it('wraps a rejected connection', async () => {
      await scanned(band);
      band.connectError = new Error('Peripheral refused');

      const connecting = transport.connect('aa:bb:cc:dd:ee:01');

      await expect(connecting).rejects.toThrow(ConnectFailureError);
      await expect(connecting).rejects.toThrow('Peripheral refused');
      expect(events).toEqual([]);
    });

    it('reports a dropped link with its reason', async () => {
      await scanned(band);
      await transport.connect('aa:bb:cc:dd:ee:01');

      band.drop('Connection Timeout');

      expect(events[1]).toEqual({ type: 'linkLost', address: 'aa:bb:cc:dd:ee:01', reason: 'Connection Timeout' });
    });
  });

  describe('disconnect', () => {
    it('cancels a connect that is still pending instead of disconnecting', async () => {
      await scanned(band);
      band.holdConnect = true;

      const connecting = transport.connect('aa:bb:cc:dd:ee:01');
      const outcome = expect(connecting).rejects.toThrow('Connection to aa:bb:cc:dd:ee:01 was cancelled');
      expect(band.state).toBe('connecting');

      await transport.disconnect();

      await outcome;
      expect(band.cancelConnectCalls).toBe(1);
      expect(band.disconnectCalls).toBe(0);
      expect(events).toEqual([]);
    });

    it('drops a link that completes after its attempt was abandoned', async () => {
      await scanned(band);
      band.holdConnect = true;
      band.cancelIgnored = true;

      const connecting = transport.connect('aa:bb:cc:dd:ee:01');
      await transport.disconnect();
      band.completeConnect();
      await connecting;

      expect(events).toEqual([]);
    });

    it('stops a scan for an address', async () => {
      await ready();

      const connecting = transport.connect('aa:bb:cc:dd:ee:01');
      const outcome = expect(connecting).rejects.toThrow('Scan for aa:bb:cc:dd:ee:01 was cancelled');
      await transport.disconnect();

      await outcome;
      expect(noble.listenerCount('discover')).toBe(0);
      expect(noble.stopScanCalls).toBe(1);
    });

    it('disconnects an established link', async () => {
      await scanned(band);
      await transport.connect('aa:bb:cc:dd:ee:01');

      await transport.disconnect();

      expect(band.disconnectCalls).toBe(1);
      expect(events[1]).toEqual({ type: 'linkLost', address: 'aa:bb:cc:dd:ee:01', reason: undefined });
    });
  });

  describe('services and notifications', () => {
    let sensor: FakeCharacteristic;

    beforeEach(async () => {
      sensor = new FakeCharacteristic(SENSOR_UUID_RAW);
      band.services = [{ uuid: SENSOR_SERVICE_UUID_RAW, characteristics: [sensor] }];
      await scanned(band);
      await transport.connect('aa:bb:cc:dd:ee:01');
      events.length = 0;
    });

    it('reports discovered services', async () => {
      await transport.discoverServices();

      expect(events).toEqual([
        {
          type: 'servicesDiscovered',
          status: 'success',
          services: [{ uuid: SENSOR_SERVICE_UUID_RAW, characteristics: [{ uuid: SENSOR_UUID_RAW, handle: null }] }],
        },
      ]);
    });

    it('reports a failed discovery as a status', async () => {
      band.discoverError = new Error('GATT error');

      await transport.discoverServices();

      expect(events).toEqual([{ type: 'servicesDiscovered', status: 'failure', services: [] }]);
    });

    it('forwards characteristic data under the normalized UUID', async () => {
      await transport.discoverServices();
      events.length = 0;

      sensor.emit('data', Buffer.from([150, 50]));

      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event.type).toBe('characteristicNotification');
      if (event.type === 'characteristicNotification') {
        expect(event.uuid).toBe(SENSOR_UUID_RAW);
        expect(Array.from(event.value)).toEqual([150, 50]);
      }
    });

    it('subscribes to a characteristic named in dashed form', async () => {
      await transport.discoverServices();

      await transport.enableNotifications(SENSOR_CHARACTERISTIC_UUID);

      expect(sensor.subscribeCalls).toBe(1);
    });

    it('raises a write failure when the subscription is rejected', async () => {
      await transport.discoverServices();
      sensor.subscribeError = new Error('Write not permitted');

      await expect(transport.enableNotifications(SENSOR_CHARACTERISTIC_UUID)).rejects.toThrow(WriteFailureError);
    });

    it('raises a write failure before discovery', async () => {
      await expect(transport.enableNotifications(SENSOR_CHARACTERISTIC_UUID)).rejects.toThrow(
        `Characteristic ${SENSOR_CHARACTERISTIC_UUID} is not available`,
      );
    });
  });
});
