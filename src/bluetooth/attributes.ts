import {
  CALIBRATION_UUID,
  CLIENT_CHARACTERISTIC_CONFIG_UUID,
  CLOSE_THRESHOLD_UUID,
  DRIVER_VERSION_UUID,
  OPEN_THRESHOLD_UUID,
  ROTATION_GESTURE_UUID,
  SENSOR_CHARACTERISTIC_UUID,
  SENSOR_ENABLED_UUID,
  SENSOR_OPTIONS_UUID,
  SENSOR_VERSION_UUID,
  TELEMETRY_NUMBER_UUID,
  UNKNOWN_CHARACTERISTIC,
  UNKNOWN_SERVICE,
} from './constants';
import type { CharacteristicDescriptor, DiscoveredService, ServiceCatalog } from './transport/types';

/**
 * Lower-case, dash-free form of a UUID. Noble reports UUIDs this way.
 */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, '').toLowerCase();
}

export function isSameUuid(a: string, b: string): boolean {
  return normalizeUuid(a) === normalizeUuid(b);
}

const ATTRIBUTE_NAMES: ReadonlyArray<readonly [string, string]> = [
  // Services
  ['0000180d-0000-1000-8000-00805f9b34fb', 'Heart Rate Service'],
  ['0000180a-0000-1000-8000-00805f9b34fb', 'Device Information Service'],
  ['0000180f-0000-1000-8000-00805f9b34fb', 'Battery Service'],
  // Characteristics
  ['00002a29-0000-1000-8000-00805f9b34fb', 'Manufacturer Name String'],
  ['00002a26-0000-1000-8000-00805f9b34fb', 'Firmware Revision String'],
  ['00002a19-0000-1000-8000-00805f9b34fb', 'Battery Level'],
  [CLIENT_CHARACTERISTIC_CONFIG_UUID, 'Client Characteristic Configuration'],
  [SENSOR_CHARACTERISTIC_UUID, 'Sensor Measurement'],
  [SENSOR_OPTIONS_UUID, 'Sensor Options'],
  [SENSOR_VERSION_UUID, 'Sensor Version'],
  [SENSOR_ENABLED_UUID, 'Sensor Control Enabled'],
  [DRIVER_VERSION_UUID, 'Driver Version'],
  [TELEMETRY_NUMBER_UUID, 'Telemetry Number'],
  [OPEN_THRESHOLD_UUID, 'Open Threshold'],
  [CLOSE_THRESHOLD_UUID, 'Close Threshold'],
  [CALIBRATION_UUID, 'Calibration'],
  [ROTATION_GESTURE_UUID, 'Rotation Gesture'],
];

const attributes = new Map<string, string>(
  ATTRIBUTE_NAMES.map(([uuid, name]) => [normalizeUuid(uuid), name])
);

export function lookup(uuid: string, fallback: string): string {
  return attributes.get(normalizeUuid(uuid)) ?? fallback;
}

export function isSensorCharacteristic(uuid: string, sensorUuid: string = SENSOR_CHARACTERISTIC_UUID): boolean {
  return isSameUuid(uuid, sensorUuid);
}

/**
 * Named catalog of a discovery result, in discovery order.
 */
export function buildServiceCatalog(services: DiscoveredService[]): ServiceCatalog {
  return services.map((service) => ({
    uuid: service.uuid,
    name: lookup(service.uuid, UNKNOWN_SERVICE),
    characteristics: service.characteristics.map((characteristic) => ({
      uuid: characteristic.uuid,
      name: lookup(characteristic.uuid, UNKNOWN_CHARACTERISTIC),
      handle: characteristic.handle,
    })),
  }));
}

export function findCharacteristic(catalog: ServiceCatalog, uuid: string): CharacteristicDescriptor | null {
  for (const service of catalog) {
    const match = service.characteristics.find((characteristic) => isSameUuid(characteristic.uuid, uuid));
    if (match) return match;
  }
  return null;
}
