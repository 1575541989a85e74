import noble, { Peripheral, Characteristic } from '@abandonware/noble';
import { BleCharacteristic, BleSession, BleTransport, DiscoveredDevice, characteristicKey } from './transport';
import { delay, withTimeout } from './timing';

const DEFAULT_CONNECT_TIMEOUT_MS = 30000;

function peripheralAddress(peripheral: Peripheral): string {
  // macOS hides MAC addresses; fall back to the CoreBluetooth id there
  if (peripheral.address && peripheral.address !== 'unknown') {
    return peripheral.address;
  }
  return peripheral.id;
}

class NobleCharacteristic implements BleCharacteristic {
  constructor(private characteristic: Characteristic) {}

  get uuid(): string {
    return this.characteristic.uuid;
  }

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    await this.characteristic.writeAsync(data, !withResponse);
  }
}

class NobleSession implements BleSession {
  constructor(private peripheral: Peripheral) {}

  get address(): string {
    return peripheralAddress(this.peripheral);
  }

  isConnected(): boolean {
    return this.peripheral.state === 'connected';
  }

  async listCharacteristics(): Promise<Map<string, BleCharacteristic>> {
    const { characteristics } = await this.peripheral.discoverAllServicesAndCharacteristicsAsync();
    const byKey = new Map<string, BleCharacteristic>();
    for (const characteristic of characteristics) {
      const key = characteristicKey(characteristic.uuid, characteristic.name);
      if (!byKey.has(key)) {
        byKey.set(key, new NobleCharacteristic(characteristic));
      }
    }
    console.log(`[BLE] ${this.address} exposes ${byKey.size} characteristic(s): ${Array.from(byKey.keys()).join(', ')}`);
    return byKey;
  }

  async disconnect(): Promise<void> {
    await this.peripheral.disconnectAsync();
  }
}

/**
 * BLE transport on top of noble (HCI socket on Linux, CoreBluetooth on macOS).
 */
export class NobleTransport implements BleTransport {
  private peripherals = new Map<string, Peripheral>();
  private isScanning = false;

  constructor(private connectTimeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS) {}

  async initialize(): Promise<void> {
    if (noble._state === 'poweredOn') {
      return;
    }

    return new Promise((resolve, reject) => {
      const onStateChange = (state: string) => {
        if (state === 'poweredOn') {
          console.log('[BLE] Adapter powered on');
          noble.removeListener('stateChange', onStateChange);
          resolve();
          return;
        }

        console.warn(`[BLE] Adapter state: ${state}`);
        if (state === 'unauthorized') {
          noble.removeListener('stateChange', onStateChange);
          reject(new Error('Bluetooth adapter unauthorized'));
        } else if (state === 'unsupported') {
          noble.removeListener('stateChange', onStateChange);
          reject(new Error('Bluetooth not supported'));
        }
      };

      noble.on('stateChange', onStateChange);
    });
  }

  async scan(durationMs: number): Promise<DiscoveredDevice[]> {
    if (this.isScanning) {
      console.log('[BLE] Already scanning');
      return [];
    }

    const found = new Map<string, Peripheral>();
    const onDiscover = (peripheral: Peripheral) => {
      const address = peripheralAddress(peripheral);
      if (!found.has(address)) {
        found.set(address, peripheral);
      }
    };

    noble.on('discover', onDiscover);
    this.isScanning = true;
    try {
      await noble.startScanningAsync([], false);
      await delay(durationMs);
    } finally {
      noble.removeListener('discover', onDiscover);
      await noble.stopScanningAsync();
      this.isScanning = false;
    }

    for (const [address, peripheral] of found) {
      this.peripherals.set(address, peripheral);
    }
    console.log(`[BLE] Found ${found.size} device(s) during scan`);

    return Array.from(found.entries()).map(([address, peripheral]) => ({
      name: peripheral.advertisement?.localName || null,
      address,
      rssi: peripheral.rssi,
    }));
  }

  async connect(address: string): Promise<BleSession> {
    const peripheral = this.peripherals.get(address);
    if (!peripheral) {
      throw new Error(`Peripheral ${address} was not seen during the last scan`);
    }

    if (peripheral.state !== 'connected') {
      console.log(`[BLE] Connecting to ${address} (current state: ${peripheral.state})...`);
      await withTimeout(
        peripheral.connectAsync(),
        this.connectTimeoutMs,
        `Connection timeout after ${this.connectTimeoutMs / 1000} seconds`
      );
    }
    console.log(`[BLE] Connection established to ${address}`);

    return new NobleSession(peripheral);
  }

  async close(): Promise<void> {
    if (this.isScanning) {
      await noble.stopScanningAsync();
      this.isScanning = false;
    }
    this.peripherals.clear();
  }
}
