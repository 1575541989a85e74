import {
  BleCharacteristic,
  BleSession,
  BleTransport,
  DiscoveredDevice,
  NORDIC_UART_RX_DESCRIPTION,
  NUS_PROTOCOL,
} from '../transport';

export class FakeCharacteristic implements BleCharacteristic {
  readonly writes: Array<{ command: string; withResponse: boolean }> = [];
  writeError: Error | null = null;

  constructor(readonly uuid: string = NUS_PROTOCOL.RX_UUID) {}

  async write(data: Buffer, withResponse: boolean): Promise<void> {
    if (this.writeError) {
      throw this.writeError;
    }
    this.writes.push({ command: data.toString('ascii'), withResponse });
  }

  get commands(): string[] {
    return this.writes.map(w => w.command);
  }
}

export class FakeSession implements BleSession {
  alive = true;
  disconnectCalls = 0;
  disconnectError: Error | null = null;

  constructor(
    readonly address: string,
    private characteristics: Map<string, BleCharacteristic>
  ) {}

  isConnected(): boolean {
    return this.alive;
  }

  async listCharacteristics(): Promise<Map<string, BleCharacteristic>> {
    return new Map(this.characteristics);
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    if (this.disconnectError) {
      throw this.disconnectError;
    }
    this.alive = false;
  }
}

/**
 * In-process BLE transport. Every session shares {@link FakeTransport.rx},
 * so writes across reconnects land in one place.
 */
export class FakeTransport implements BleTransport {
  devices: DiscoveredDevice[] = [];
  rx = new FakeCharacteristic();
  exposeRx = true;
  /** Number of upcoming connect() calls that fail; Infinity for all of them. */
  failConnects = 0;
  connectError = new Error('Connection failed');

  scanCalls = 0;
  connectCalls: string[] = [];
  sessions: FakeSession[] = [];
  initialized = false;
  closed = false;

  constructor(...names: string[]) {
    this.devices = names.map((name, i) => ({ name, address: `aa:bb:cc:dd:ee:0${i}` }));
  }

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async scan(_durationMs: number): Promise<DiscoveredDevice[]> {
    this.scanCalls++;
    return [...this.devices];
  }

  async connect(address: string): Promise<BleSession> {
    this.connectCalls.push(address);
    if (this.failConnects > 0) {
      this.failConnects--;
      throw this.connectError;
    }

    const characteristics = new Map<string, BleCharacteristic>();
    characteristics.set('Nordic UART TX', new FakeCharacteristic(NUS_PROTOCOL.TX_UUID));
    if (this.exposeRx) {
      characteristics.set(NORDIC_UART_RX_DESCRIPTION, this.rx);
    }

    const session = new FakeSession(address, characteristics);
    this.sessions.push(session);
    return session;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get lastSession(): FakeSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }
}
