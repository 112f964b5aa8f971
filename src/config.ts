import { z } from 'zod';
import { DEFAULT_NAME_FILTER, SENSOR_CHARACTERISTIC_UUID } from './bluetooth/constants';
import { ConfigError } from './exceptions';
import { DEFAULT_THRESHOLD } from './signal/classifier';

export const SensorLinkConfigSchema = z.object({
  nameFilter: z.string().min(1).default(DEFAULT_NAME_FILTER),
  sensorCharacteristic: z.string().min(1).default(SENSOR_CHARACTERISTIC_UUID),
  threshold: z.coerce.number().int().min(0).max(255).default(DEFAULT_THRESHOLD),
  subscribeIntervalMs: z.coerce.number().int().positive().default(500),
  connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
  disconnectTimeoutMs: z.coerce.number().int().positive().default(5_000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type SensorLinkConfig = z.infer<typeof SensorLinkConfigSchema>;
export type SensorLinkConfigInput = z.input<typeof SensorLinkConfigSchema>;

const ENV_KEYS: Record<keyof SensorLinkConfig, string> = {
  nameFilter: 'SENSOR_NAME_FILTER',
  sensorCharacteristic: 'SENSOR_CHARACTERISTIC',
  threshold: 'SENSOR_THRESHOLD',
  subscribeIntervalMs: 'SENSOR_SUBSCRIBE_INTERVAL_MS',
  connectTimeoutMs: 'SENSOR_CONNECT_TIMEOUT_MS',
  disconnectTimeoutMs: 'SENSOR_DISCONNECT_TIMEOUT_MS',
  logLevel: 'SENSOR_LOG_LEVEL',
};

export function parseConfig(input: unknown = {}): SensorLinkConfig {
  const result = SensorLinkConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid sensor link configuration - ${details}`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SensorLinkConfig {
  const raw: Record<string, string> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }
  return parseConfig(raw);
}
