import type { RGB } from './color';
import type { ThemeName } from './themes';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export interface LampState {
  power: boolean;
  brightness?: number; // 0-120
  color?: RGB;
  theme?: ThemeName;
}

export interface LampConfig {
  id: string;
  name: string; // advertised BLE name, e.g. MOONSIDE-S1
  maxReconnectAttempts?: number;
}

export interface PixelCommand {
  id: number;
  brightness: number; // 0-120
  color: RGB;
}

export interface ThemeCommand {
  name: ThemeName;
  param?: number;
  colors: RGB[];
}

export interface MQTTCommand {
  state?: 'ON' | 'OFF';
  brightness?: number; // 0-120
  color?: RGB;
  colorBrightness?: number;
  theme?: ThemeCommand;
  pixels?: PixelCommand[];
}

export interface MQTTState {
  state: 'ON' | 'OFF';
  brightness?: number;
  color?: RGB;
  theme?: ThemeName;
}
