import { describe, expect, it } from 'vitest';
import {
  buildServiceCatalog,
  findCharacteristic,
  isSameUuid,
  isSensorCharacteristic,
  lookup,
  normalizeUuid,
} from './attributes';
import { SENSOR_CHARACTERISTIC_UUID } from './constants';

describe('attributes', () => {
  it('normalizes UUIDs to lower case without dashes', () => {
    expect(normalizeUuid('43680201-4D74-1001-726B-526F64696F6E')).toBe('436802014d741001726b526f64696f6e');
  });

  it('compares dashed and dash-free UUIDs', () => {
    expect(isSameUuid('0000180A-0000-1000-8000-00805F9B34FB', '0000180a00001000800000805f9b34fb')).toBe(true);
    expect(isSameUuid('0000180a-0000-1000-8000-00805f9b34fb', '0000180d-0000-1000-8000-00805f9b34fb')).toBe(false);
  });

  it('looks up known names in either UUID form', () => {
    expect(lookup('0000180a-0000-1000-8000-00805f9b34fb', 'fallback')).toBe('Device Information Service');
    expect(lookup('436802014d741001726b526f64696f6e', 'fallback')).toBe('Sensor Measurement');
  });

  it('returns the fallback for unknown UUIDs', () => {
    expect(lookup('12345678-0000-1000-8000-00805f9b34fb', 'unknown_service')).toBe('unknown_service');
  });

  it('recognises the sensor characteristic', () => {
    expect(isSensorCharacteristic('436802014d741001726b526f64696f6e')).toBe(true);
    expect(isSensorCharacteristic('43680200-4d74-1001-726b-526f64696f6e')).toBe(false);
  });

  it('builds a named catalog in discovery order', () => {
    const catalog = buildServiceCatalog([
      {
        uuid: '0000180a00001000800000805f9b34fb',
        characteristics: [{ uuid: '00002a2900001000800000805f9b34fb', handle: 3 }],
      },
      {
        uuid: 'a0b1c2d3e4f5',
        characteristics: [
          { uuid: SENSOR_CHARACTERISTIC_UUID, handle: 12 },
          { uuid: 'ffee', handle: null },
        ],
      },
    ]);

    expect(catalog).toEqual([
      {
        uuid: '0000180a00001000800000805f9b34fb',
        name: 'Device Information Service',
        characteristics: [{ uuid: '00002a2900001000800000805f9b34fb', name: 'Manufacturer Name String', handle: 3 }],
      },
      {
        uuid: 'a0b1c2d3e4f5',
        name: 'unknown_service',
        characteristics: [
          { uuid: SENSOR_CHARACTERISTIC_UUID, name: 'Sensor Measurement', handle: 12 },
          { uuid: 'ffee', name: 'unknown_characteristic', handle: null },
        ],
      },
    ]);
  });

  it('finds a characteristic across services', () => {
    const catalog = buildServiceCatalog([
      { uuid: 'aa', characteristics: [{ uuid: 'bb', handle: 1 }] },
      { uuid: 'cc', characteristics: [{ uuid: '436802014d741001726b526f64696f6e', handle: 9 }] },
    ]);

    expect(findCharacteristic(catalog, SENSOR_CHARACTERISTIC_UUID)).toEqual({
      uuid: '436802014d741001726b526f64696f6e',
      name: 'Sensor Measurement',
      handle: 9,
    });
    expect(findCharacteristic(catalog, 'dd')).toBeNull();
  });
});
