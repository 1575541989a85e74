import { RGBColor } from './color';
import {
  encodeApplyPixelMode,
  encodeBrightness,
  encodeColor,
  encodePixel,
  encodePower,
} from './encoding';
import {
  CharacteristicNotFoundError,
  DeviceNotFoundError,
  LampError,
  NotConnectedError,
  ReconnectExhaustedError,
  errorMessage,
} from './errors';
import { ThemeConfig } from './themes';
import { BleCharacteristic, BleSession, BleTransport, NORDIC_UART_RX_DESCRIPTION } from './transport';
import { ConnectionState, LampState } from './types';

export const DEFAULT_MAX_RECONNECT_ATTEMPTS = 3;
export const DEFAULT_SCAN_DURATION_MS = 5000;

export interface LampOptions {
  /** Advertised BLE name, e.g. "MOONSIDE-S1". */
  name: string;
  id?: string;
  /** Connect attempts made by {@link MoonsideLamp.ensureConnected}; 0 disables reconnecting. */
  maxReconnectAttempts?: number;
  scanDurationMs?: number;
}

const ASCII = /^[\x00-\x7f]*$/;

/**
 * High-level control of one Moonside lamp over the Nordic UART Service.
 *
 * Not safe for concurrent use: issue one command at a time per lamp. Separate
 * lamps can be driven in parallel through separate instances.
 */
export class MoonsideLamp {
  readonly name: string;
  readonly id: string;
  private readonly maxReconnectAttempts: number;
  private readonly scanDurationMs: number;

  private session: BleSession | null = null;
  private rxCharacteristic: BleCharacteristic | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private state: LampState = { power: false };

  constructor(
    private transport: BleTransport,
    options: LampOptions,
    private onStateUpdate?: (state: LampState) => void
  ) {
    this.name = options.name;
    this.id = options.id ?? options.name;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
    this.scanDurationMs = options.scanDurationMs ?? DEFAULT_SCAN_DURATION_MS;
  }

  /**
   * Scans for the lamp by name, connects and resolves the NUS RX characteristic.
   * The lamp only counts as connected once both steps succeed.
   */
  async connect(): Promise<void> {
    if (this.connectionState === 'connecting') {
      throw new LampError(`Connection to ${this.name} already in progress`);
    }

    if (this.session) {
      await this.disconnect();
    }

    this.connectionState = 'connecting';
    try {
      console.log(`[Lamp] Scanning for ${this.name}...`);
      const devices = await this.transport.scan(this.scanDurationMs);
      const match = devices.find(d => d.name === this.name);
      if (!match) {
        const seen = devices.map(d => d.name ?? 'Unknown').join(', ');
        console.error(`[Lamp] ${this.name} not found. Available devices: ${seen || 'none'}`);
        throw new DeviceNotFoundError(this.name);
      }

      console.log(`[Lamp] Found ${this.name} at ${match.address}`);
      const session = await this.transport.connect(match.address);

      let rx: BleCharacteristic | undefined;
      try {
        const characteristics = await session.listCharacteristics();
        rx = characteristics.get(NORDIC_UART_RX_DESCRIPTION);
        if (!rx) {
          throw new CharacteristicNotFoundError(this.name, NORDIC_UART_RX_DESCRIPTION);
        }
      } catch (error) {
        await this.closeSession(session);
        throw error;
      }

      this.session = session;
      this.rxCharacteristic = rx;
      this.connectionState = 'connected';
      console.log(`[Lamp] Connected to ${this.name}`);
    } catch (error) {
      this.connectionState = 'disconnected';
      throw error;
    }
  }

  /** Best-effort: close failures are logged, never thrown. */
  async disconnect(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.rxCharacteristic = null;
    this.connectionState = 'disconnected';

    if (session && session.isConnected()) {
      await this.closeSession(session);
      console.log(`[Lamp] Disconnected from ${this.name}`);
    }
  }

  private async closeSession(session: BleSession): Promise<void> {
    try {
      await session.disconnect();
    } catch (error) {
      console.warn(`[Lamp] Error disconnecting ${this.name}: ${errorMessage(error)}`);
    }
  }

  isConnected(): boolean {
    return this.connectionState === 'connected' && this.session !== null && this.session.isConnected();
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  getState(): LampState {
    return { ...this.state };
  }

  async ensureConnected(): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    if (this.session) {
      console.warn(`[Lamp] Link to ${this.name} lost`);
      this.session = null;
      this.rxCharacteristic = null;
      this.connectionState = 'disconnected';
    }

    for (let attempt = 1; attempt <= this.maxReconnectAttempts; attempt++) {
      try {
        await this.connect();
        return;
      } catch (error) {
        console.warn(
          `[Lamp] Connection attempt ${attempt}/${this.maxReconnectAttempts} to ${this.name} failed: ${errorMessage(error)}`
        );
      }
    }

    if (this.maxReconnectAttempts > 0) {
      throw new ReconnectExhaustedError(this.name, this.maxReconnectAttempts);
    }
  }

  /**
   * Writes one ASCII command to the RX characteristic and waits for the
   * write to be acknowledged. Write failures are not retried.
   */
  async sendCommand(command: string): Promise<void> {
    if (!ASCII.test(command)) {
      throw new LampError(`Command contains non-ASCII characters: ${command}`);
    }

    await this.ensureConnected();

    const rx = this.rxCharacteristic;
    if (!rx || !this.isConnected()) {
      throw new NotConnectedError(this.name);
    }

    console.log(`[Lamp] ${this.name} <- ${command}`);
    await rx.write(Buffer.from(command, 'ascii'), true);
  }

  private updateState(patch: Partial<LampState>): void {
    this.state = { ...this.state, ...patch };
    this.onStateUpdate?.({ ...this.state });
  }

  async turnOn(): Promise<void> {
    await this.sendCommand(encodePower(true));
    this.updateState({ power: true });
  }

  async turnOff(): Promise<void> {
    await this.sendCommand(encodePower(false));
    this.updateState({ power: false });
  }

  /** Brightness in the range 0..120. */
  async setBrightness(brightness: number): Promise<void> {
    await this.sendCommand(encodeBrightness(brightness));
    this.updateState({ brightness });
  }

  /** e.g. `setColor(new RGBColor(255, 0, 255), 60)` */
  async setColor(color: RGBColor, brightness?: number): Promise<void> {
    await this.sendCommand(encodeColor(color, brightness));
    this.updateState({
      power: true,
      color: color.toJSON(),
      theme: undefined,
      ...(brightness !== undefined ? { brightness } : {}),
    });
  }

  async setTheme(theme: ThemeConfig): Promise<void> {
    await this.sendCommand(theme.toCommandString());
    this.updateState({ power: true, theme: theme.name });
  }

  /** Stages one pixel; call {@link applyPixelMode} afterwards to show the result. */
  async setPixel(pixelId: number, brightness: number, color: RGBColor): Promise<void> {
    await this.sendCommand(encodePixel(pixelId, brightness, color));
  }

  async applyPixelMode(): Promise<void> {
    await this.sendCommand(encodeApplyPixelMode());
    this.updateState({ power: true, theme: undefined });
  }
}

/**
 * Runs `fn` with the lamp connected and always disconnects afterwards,
 * whether `fn` resolves or throws.
 */
export async function withLamp<T>(lamp: MoonsideLamp, fn: (lamp: MoonsideLamp) => Promise<T>): Promise<T> {
  await lamp.connect();
  try {
    return await fn(lamp);
  } finally {
    await lamp.disconnect();
  }
}

/**
 * Connects the lamps in order. Lamps already connected are disconnected in
 * reverse order on exit, including when a later lamp fails to connect.
 */
export async function withLamps<T>(
  lamps: readonly MoonsideLamp[],
  fn: (lamps: readonly MoonsideLamp[]) => Promise<T>
): Promise<T> {
  const entered: MoonsideLamp[] = [];
  try {
    for (const lamp of lamps) {
      await lamp.connect();
      entered.push(lamp);
    }
    return await fn(lamps);
  } finally {
    for (const lamp of entered.reverse()) {
      await lamp.disconnect();
    }
  }
}
