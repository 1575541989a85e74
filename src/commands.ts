import { RGB, RGBColor } from './color';
import { encodeBrightness, encodePixel } from './encoding';
import { InvalidCommandError } from './errors';
import { MoonsideLamp } from './lamp';
import { ThemeConfig, isThemeName } from './themes';
import { MQTTCommand, PixelCommand, ThemeCommand } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidCommandError(`${field} must be a number`);
  }
  return value;
}

function readIndex(value: unknown, field: string): number {
  const index = readNumber(value, field);
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidCommandError(`${field} must be a non-negative integer`);
  }
  return index;
}

function readColor(value: unknown, field: string): RGB {
  if (!isRecord(value)) {
    throw new InvalidCommandError(`${field} must be an object with r, g and b`);
  }
  return {
    r: readNumber(value.r, `${field}.r`),
    g: readNumber(value.g, `${field}.g`),
    b: readNumber(value.b, `${field}.b`),
  };
}

function readTheme(value: unknown): ThemeCommand {
  if (!isRecord(value)) {
    throw new InvalidCommandError('theme must be an object');
  }
  const name = value.name;
  if (!isThemeName(name)) {
    throw new InvalidCommandError(`Unknown theme: ${String(name)}`);
  }

  const colors = value.colors ?? [];
  if (!Array.isArray(colors)) {
    throw new InvalidCommandError('theme.colors must be an array');
  }

  const theme: ThemeCommand = {
    name,
    colors: colors.map((color, i) => readColor(color, `theme.colors[${i}]`)),
  };
  if (value.param !== undefined) {
    theme.param = readNumber(value.param, 'theme.param');
  }
  return theme;
}

function readPixels(value: unknown): PixelCommand[] {
  if (!Array.isArray(value)) {
    throw new InvalidCommandError('pixels must be an array');
  }
  return value.map((pixel, i) => {
    if (!isRecord(pixel)) {
      throw new InvalidCommandError(`pixels[${i}] must be an object`);
    }
    return {
      id: readIndex(pixel.id, `pixels[${i}].id`),
      brightness: readNumber(pixel.brightness, `pixels[${i}].brightness`),
      color: readColor(pixel.color, `pixels[${i}].color`),
    };
  });
}

/**
 * Validates a decoded JSON payload. Range checks are left to the encoders,
 * which run before anything is sent.
 */
export function parseLampCommand(payload: unknown): MQTTCommand {
  if (!isRecord(payload)) {
    throw new InvalidCommandError('Command must be a JSON object');
  }

  const command: MQTTCommand = {};

  const state = payload.state;
  if (state !== undefined) {
    if (state !== 'ON' && state !== 'OFF') {
      throw new InvalidCommandError('state must be "ON" or "OFF"');
    }
    command.state = state;
  }
  if (payload.brightness !== undefined) {
    command.brightness = readNumber(payload.brightness, 'brightness');
  }
  if (payload.color !== undefined) {
    command.color = readColor(payload.color, 'color');
  }
  if (payload.colorBrightness !== undefined) {
    command.colorBrightness = readNumber(payload.colorBrightness, 'colorBrightness');
  }
  if (payload.theme !== undefined) {
    command.theme = readTheme(payload.theme);
  }
  if (payload.pixels !== undefined) {
    command.pixels = readPixels(payload.pixels);
  }

  return command;
}

/**
 * Builds every lamp command up front so that a bad value rejects the whole
 * payload before anything is written, then sends them in order:
 * power on, color, theme, pixels, brightness, power off.
 */
export async function applyLampCommand(lamp: MoonsideLamp, command: MQTTCommand): Promise<void> {
  const color = command.color ? RGBColor.from(command.color) : undefined;
  const theme = command.theme
    ? new ThemeConfig({
        name: command.theme.name,
        numericParam: command.theme.param,
        colors: command.theme.colors.map(c => RGBColor.from(c)),
      })
    : undefined;
  theme?.validate();
  const pixels = (command.pixels ?? []).map(p => ({ ...p, color: RGBColor.from(p.color) }));
  for (const pixel of pixels) {
    encodePixel(pixel.id, pixel.brightness, pixel.color);
  }
  if (command.brightness !== undefined) {
    encodeBrightness(command.brightness);
  }

  if (command.state === 'ON') {
    await lamp.turnOn();
  }
  if (color) {
    await lamp.setColor(color, command.colorBrightness);
  }
  if (theme) {
    await lamp.setTheme(theme);
  }
  if (pixels.length > 0) {
    for (const pixel of pixels) {
      await lamp.setPixel(pixel.id, pixel.brightness, pixel.color);
    }
    await lamp.applyPixelMode();
  }
  if (command.brightness !== undefined) {
    await lamp.setBrightness(command.brightness);
  }
  if (command.state === 'OFF') {
    await lamp.turnOff();
  }
}
