/**
 * Alternative BLE transport using the node-ble library.
 * This talks to BlueZ over D-Bus instead of a raw HCI socket, so it runs without
 * root and alongside other BlueZ clients. Linux only.
 */

import { createBluetooth } from 'node-ble';
import { BleCharacteristic, BleSession, BleTransport, DiscoveredDevice, characteristicKey } from './transport';
import { delay } from './timing';

type NodeBle = ReturnType<typeof createBluetooth>;
type Adapter = Awaited<ReturnType<NodeBle['bluetooth']['defaultAdapter']>>;
type Device = Awaited<ReturnType<Adapter['getDevice']>>;
type GattServer = Awaited<ReturnType<Device['gatt']>>;
type GattService = Awaited<ReturnType<GattServer['getPrimaryService']>>;
type GattCharacteristic = Awaited<ReturnType<GattService['getCharacteristic']>>;

class NodeBleCharacteristic implements BleCharacteristic {
  constructor(
    readonly uuid: string,
    private characteristic: GattCharacteristic
  ) {}

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    if (withResponse) {
      await this.characteristic.writeValueWithResponse(data);
    } else {
      await this.characteristic.writeValueWithoutResponse(data);
    }
  }
}

class NodeBleSession implements BleSession {
  private connected = true;

  constructor(
    readonly address: string,
    private device: Device
  ) {
    this.device.on('disconnect', () => {
      console.log(`[BLE-NodeBle] ${this.address} disconnected`);
      this.connected = false;
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  async listCharacteristics(): Promise<Map<string, BleCharacteristic>> {
    const gattServer = await this.device.gatt();
    const byKey = new Map<string, BleCharacteristic>();

    for (const serviceUuid of await gattServer.services()) {
      const service = await gattServer.getPrimaryService(serviceUuid);
      for (const charUuid of await service.characteristics()) {
        const key = characteristicKey(charUuid);
        if (!byKey.has(key)) {
          byKey.set(key, new NodeBleCharacteristic(charUuid, await service.getCharacteristic(charUuid)));
        }
      }
    }

    console.log(`[BLE-NodeBle] ${this.address} exposes ${byKey.size} characteristic(s)`);
    return byKey;
  }

  async disconnect(): Promise<void> {
    await this.device.disconnect();
    this.connected = false;
  }
}

export class NodeBleTransport implements BleTransport {
  private bluetooth: NodeBle | null = null;
  private adapter: Adapter | null = null;

  async initialize(): Promise<void> {
    console.log('[BLE-NodeBle] Initializing node-ble...');
    this.bluetooth = createBluetooth();
    this.adapter = await this.bluetooth.bluetooth.defaultAdapter();

    if (!(await this.adapter.isPowered())) {
      throw new Error('Bluetooth adapter is not powered on');
    }
    console.log('[BLE-NodeBle] Adapter ready');
  }

  private requireAdapter(): Adapter {
    if (!this.adapter) {
      throw new Error('Adapter not initialized');
    }
    return this.adapter;
  }

  async scan(durationMs: number): Promise<DiscoveredDevice[]> {
    const adapter = this.requireAdapter();

    if (!(await adapter.isDiscovering())) {
      await adapter.startDiscovery();
    }
    console.log('[BLE-NodeBle] Scan started');
    try {
      await delay(durationMs);
    } finally {
      await adapter.stopDiscovery();
    }

    const discovered: DiscoveredDevice[] = [];
    for (const address of await adapter.devices()) {
      const device = await adapter.getDevice(address);
      // BlueZ has no Name property for devices that never advertised one
      const name = await device.getName().catch(() => null);
      discovered.push({ name, address });
    }
    console.log(`[BLE-NodeBle] Scan stopped. Found ${discovered.length} device(s)`);

    return discovered;
  }

  async connect(address: string): Promise<BleSession> {
    const adapter = this.requireAdapter();
    const device = await adapter.getDevice(address);

    console.log(`[BLE-NodeBle] Connecting to ${address}...`);
    await device.connect();
    console.log(`[BLE-NodeBle] Connected to ${address}`);

    return new NodeBleSession(address, device);
  }

  async close(): Promise<void> {
    if (this.bluetooth) {
      this.bluetooth.destroy();
      this.bluetooth = null;
      this.adapter = null;
    }
  }
}
