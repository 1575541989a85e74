/**
 * Moonside command encoding.
 * Commands are plain ASCII strings written to the NUS RX characteristic, one per write.
 */

import { RGBColor, pad3 } from './color';
import { OutOfRangeError } from './errors';

export const MAX_BRIGHTNESS = 120;

function assertBrightness(field: string, level: number): void {
  if (!Number.isInteger(level) || level < 0 || level > MAX_BRIGHTNESS) {
    throw new OutOfRangeError(field, level, 0, MAX_BRIGHTNESS);
  }
}

export function encodePower(on: boolean): string {
  return on ? 'LEDON' : 'LEDOFF';
}

export function encodeBrightness(level: number): string {
  assertBrightness('Brightness', level);
  return `BRIGH${pad3(level)}`;
}

/**
 * The optional brightness is appended as-is and is not range-checked,
 * matching what the lamp firmware has been observed to accept.
 */
export function encodeColor(color: RGBColor, brightness?: number): string {
  let command = `COLOR${color.toPaddedString()}`;
  if (brightness !== undefined) {
    command += ` ${brightness}`;
  }
  return command;
}

/** `encodePixel(1, 50, red)` → `"PIXEL,1,50 COLOR255000000"` */
export function encodePixel(pixelId: number, brightness: number, color: RGBColor): string {
  assertBrightness('Pixel brightness', brightness);
  return `PIXEL,${pixelId},${brightness} COLOR${color.toPaddedString()}`;
}

export function encodeApplyPixelMode(): string {
  return 'MODEPIXEL';
}
