// GATT identifiers of the sensor band.
// Only SENSOR_CHARACTERISTIC_UUID carries behaviour; the rest feed log output.

// Two-byte muscle sensor stream (read, notify)
export const SENSOR_CHARACTERISTIC_UUID = '43680201-4d74-1001-726b-526f64696f6e';

export const SENSOR_OPTIONS_UUID = '43680200-4d74-1001-726b-526f64696f6e';
export const SENSOR_VERSION_UUID = '43680202-4d74-1001-726b-526f64696f6e';
export const SENSOR_ENABLED_UUID = '43680203-4d74-1001-726b-526f64696f6e';
export const DRIVER_VERSION_UUID = '43680590-4d74-1001-726b-526f64696f6e';
export const TELEMETRY_NUMBER_UUID = '43680300-4d74-1001-726b-526f64696f6e';
export const OPEN_THRESHOLD_UUID = '43680000-4d74-1001-726b-526f64696f6e';
export const CLOSE_THRESHOLD_UUID = '43680001-4d74-1001-726b-526f64696f6e';
export const CALIBRATION_UUID = '43680008-4d74-1001-726b-526f64696f6e';
export const ROTATION_GESTURE_UUID = '43680400-4d74-1001-726b-526f64696f6e';

export const CLIENT_CHARACTERISTIC_CONFIG_UUID = '00002902-0000-1000-8000-00805f9b34fb';

export const DEFAULT_NAME_FILTER = 'FEST-X';

export const UNKNOWN_SERVICE = 'unknown_service';
export const UNKNOWN_CHARACTERISTIC = 'unknown_characteristic';
