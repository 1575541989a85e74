/**
 * Platform-agnostic BLE transport.
 * The lamp only needs to scan, connect, list characteristics and write.
 */

export const NUS_PROTOCOL = {
  SERVICE_UUID: '6e400001-b5a3-f393-e0a9-e50e24dcca9e',
  RX_UUID: '6e400002-b5a3-f393-e0a9-e50e24dcca9e', // write
  TX_UUID: '6e400003-b5a3-f393-e0a9-e50e24dcca9e', // notify
};

export const NORDIC_UART_RX_DESCRIPTION = 'Nordic UART RX';
export const NORDIC_UART_TX_DESCRIPTION = 'Nordic UART TX';

export interface DiscoveredDevice {
  name: string | null;
  address: string;
  rssi?: number;
}

export interface BleCharacteristic {
  readonly uuid: string;
  write(data: Buffer, withResponse: boolean): Promise<void>;
}

export interface BleSession {
  readonly address: string;
  isConnected(): boolean;
  /** Keyed by description for known characteristics, otherwise by name or UUID. */
  listCharacteristics(): Promise<Map<string, BleCharacteristic>>;
  disconnect(): Promise<void>;
}

export interface BleTransport {
  initialize(): Promise<void>;
  scan(durationMs: number): Promise<DiscoveredDevice[]>;
  connect(address: string): Promise<BleSession>;
  close(): Promise<void>;
}

export function normalizeUuid(uuid: string): string {
  return uuid.toLowerCase().replace(/-/g, '');
}

const KNOWN_CHARACTERISTICS = new Map<string, string>([
  [normalizeUuid(NUS_PROTOCOL.RX_UUID), NORDIC_UART_RX_DESCRIPTION],
  [normalizeUuid(NUS_PROTOCOL.TX_UUID), NORDIC_UART_TX_DESCRIPTION],
]);

export function characteristicKey(uuid: string, name?: string | null): string {
  const normalized = normalizeUuid(uuid);
  return KNOWN_CHARACTERISTICS.get(normalized) ?? (name || normalized);
}
