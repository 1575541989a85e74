import { ConfigError } from './errors';
import { DEFAULT_MAX_RECONNECT_ATTEMPTS, DEFAULT_SCAN_DURATION_MS } from './lamp';
import { NobleTransport } from './ble-transport';
import { NodeBleTransport } from './ble-transport-nodeble';
import { BleTransport } from './transport';
import { LampConfig } from './types';

export type TransportKind = 'noble' | 'node-ble';

export interface Config {
  lamps: LampConfig[];
  ble: {
    transport: TransportKind;
    scanDurationMs: number;
    maxReconnectAttempts: number;
  };
  mqtt: {
    brokerUrl: string;
    username?: string;
    password?: string;
    baseTopic: string;
  };
}

type Env = Record<string, string | undefined>;

export function lampIdFromName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '_');
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer (got '${raw}')`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLamp(entry: unknown, index: number): LampConfig {
  if (!isRecord(entry)) {
    throw new ConfigError(`LAMPS[${index}] must be an object with a non-empty "name"`);
  }
  const name = entry.name;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ConfigError(`LAMPS[${index}] must be an object with a non-empty "name"`);
  }

  const rawId = entry.id;
  let id: string;
  if (rawId === undefined) {
    id = lampIdFromName(name);
  } else if (typeof rawId === 'string') {
    id = rawId;
  } else {
    throw new ConfigError(`LAMPS[${index}].id must be a string`);
  }

  const lamp: LampConfig = { id, name };

  const attempts = entry.maxReconnectAttempts;
  if (attempts !== undefined) {
    if (typeof attempts !== 'number' || !Number.isInteger(attempts) || attempts < 0) {
      throw new ConfigError(`LAMPS[${index}].maxReconnectAttempts must be a non-negative integer`);
    }
    lamp.maxReconnectAttempts = attempts;
  }

  return lamp;
}

function parseLamps(lampsJson: string): LampConfig[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(lampsJson);
  } catch (error) {
    console.error('[Config] Failed to parse LAMPS JSON:', error);
    console.error('[Config] LAMPS value:', lampsJson);
    console.error('[Config] Make sure LAMPS is a valid JSON array on a single line');
    throw new ConfigError('Invalid LAMPS configuration. Must be a valid JSON array.');
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigError('Invalid LAMPS configuration. Must be a valid JSON array.');
  }

  const lamps = parsed.map(parseLamp);
  const ids = new Set<string>();
  for (const lamp of lamps) {
    if (ids.has(lamp.id)) {
      throw new ConfigError(`Duplicate lamp id '${lamp.id}' in LAMPS`);
    }
    ids.add(lamp.id);
  }
  return lamps;
}

function parseTransport(raw: string | undefined): TransportKind {
  const value = raw?.trim() || 'noble';
  if (value === 'noble' || value === 'node-ble') {
    return value;
  }
  throw new ConfigError(`BLE_TRANSPORT must be 'noble' or 'node-ble' (got '${value}')`);
}

/**
 * Reads configuration from environment variables (populated from .env by dotenv).
 */
export async function loadConfig(env: Env = process.env): Promise<Config> {
  return {
    lamps: parseLamps(env.LAMPS || '[]'),
    ble: {
      transport: parseTransport(env.BLE_TRANSPORT),
      scanDurationMs: readInteger(env, 'BLE_SCAN_DURATION_MS', DEFAULT_SCAN_DURATION_MS),
      maxReconnectAttempts: readInteger(env, 'MAX_RECONNECT_ATTEMPTS', DEFAULT_MAX_RECONNECT_ATTEMPTS),
    },
    mqtt: {
      brokerUrl: env.MQTT_BROKER_URL || 'mqtt://localhost:1883',
      username: env.MQTT_USERNAME || undefined,
      password: env.MQTT_PASSWORD || undefined,
      baseTopic: env.MQTT_BASE_TOPIC || 'moonside',
    },
  };
}

export function createTransport(kind: TransportKind): BleTransport {
  return kind === 'node-ble' ? new NodeBleTransport() : new NobleTransport();
}
