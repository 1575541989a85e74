import { OutOfRangeError } from './errors';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

function assertChannel(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new OutOfRangeError(field, value, 0, 255);
  }
}

/**
 * An RGB color, one 8-bit channel each.
 * Channels are checked on construction so the fixed-width wire format can't overflow.
 */
export class RGBColor implements RGB {
  readonly r: number;
  readonly g: number;
  readonly b: number;

  constructor(r: number, g: number, b: number) {
    assertChannel('red', r);
    assertChannel('green', g);
    assertChannel('blue', b);
    this.r = r;
    this.g = g;
    this.b = b;
    Object.freeze(this);
  }

  static from(rgb: RGB): RGBColor {
    return rgb instanceof RGBColor ? rgb : new RGBColor(rgb.r, rgb.g, rgb.b);
  }

  /** `RGBColor(255, 0, 255)` → `"255,0,255,"` */
  toCommaString(): string {
    return `${this.r},${this.g},${this.b},`;
  }

  /** Zero-padded `rrrgggbbb`, as used by the COLOR and PIXEL commands. */
  toPaddedString(): string {
    return `${pad3(this.r)}${pad3(this.g)}${pad3(this.b)}`;
  }

  toJSON(): RGB {
    return { r: this.r, g: this.g, b: this.b };
  }

  equals(other: RGB): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }
}

export function pad3(value: number): string {
  return value.toString().padStart(3, '0');
}
