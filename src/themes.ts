import { RGBColor } from './color';
import { MissingParameterError, ShapeMismatchError, UnexpectedParameterError } from './errors';

/**
 * Theme identifiers known to the Moonside firmware.
 * Each value is the exact token the firmware expects after `THEME.`.
 */
export const ThemeName = {
  THEME1: 'THEME1',
  THEME2: 'THEME2',
  THEME3: 'THEME3',
  THEME4: 'THEME4',
  THEME5: 'THEME5',
  GRADIENT1: 'GRADIENT1',
  GRADIENT2: 'GRADIENT2',
  PULSING1: 'PULSING1',
  TWINKLE1: 'TWINKLE1',
  WAVE1: 'WAVE1',
  BEAT1: 'BEAT1',
  BEAT2: 'BEAT2',
  BEAT3: 'BEAT3',
  COLORDROP1: 'COLORDROP1',
  LAVA1: 'LAVA1',
  FIRE2: 'FIRE2',
  PALETTE2: 'PALETTE2',
} as const;

export type ThemeName = (typeof ThemeName)[keyof typeof ThemeName];

export interface ThemeShape {
  colorCount: number;
  hasNumeric: boolean;
}

const shape = (colorCount: number, hasNumeric = false): ThemeShape => Object.freeze({ colorCount, hasNumeric });

export type ThemeShapeTable = Readonly<Record<ThemeName, ThemeShape>>;

export const THEME_SHAPES: ThemeShapeTable = Object.freeze({
  PALETTE2: shape(6),
  FIRE2: shape(4),
  THEME1: shape(2),
  THEME2: shape(2),
  THEME3: shape(6),
  THEME4: shape(2),
  THEME5: shape(2),
  WAVE1: shape(2),
  BEAT1: shape(3),
  BEAT2: shape(2),
  BEAT3: shape(3),
  GRADIENT1: shape(2),
  GRADIENT2: shape(3),
  TWINKLE1: shape(2),
  COLORDROP1: shape(2),
  LAVA1: shape(2),
  PULSING1: shape(2),
});

const THEME_NAMES: ReadonlySet<string> = new Set(Object.values(ThemeName));

export function isThemeName(value: unknown): value is ThemeName {
  return typeof value === 'string' && THEME_NAMES.has(value);
}

export function getThemeShape(name: ThemeName, shapes: ThemeShapeTable = THEME_SHAPES): ThemeShape {
  const found = shapes[name];
  if (!found) {
    // Every ThemeName has an entry, so this is a catalog bug rather than bad input.
    throw new Error(`No shape registered for theme ${String(name)}`);
  }
  return found;
}

export interface ThemeConfigInit {
  name: ThemeName;
  numericParam?: number;
  colors?: readonly RGBColor[];
  /** Shape table to validate against; defaults to the firmware catalog. */
  shapes?: ThemeShapeTable;
}

/**
 * A theme plus its parameters, e.g.
 *
 *   new ThemeConfig({ name: ThemeName.TWINKLE1, colors: [red, blue] })
 *
 * Validation is deferred to {@link ThemeConfig.validate} so a config can be built up first.
 */
export class ThemeConfig {
  readonly name: ThemeName;
  readonly numericParam?: number;
  readonly colors: readonly RGBColor[];
  private readonly shapes: ThemeShapeTable;

  constructor(init: ThemeConfigInit) {
    this.name = init.name;
    this.numericParam = init.numericParam;
    this.colors = Object.freeze([...(init.colors ?? [])]);
    this.shapes = init.shapes ?? THEME_SHAPES;
  }

  validate(): void {
    const { colorCount, hasNumeric } = getThemeShape(this.name, this.shapes);

    if (this.colors.length !== colorCount) {
      throw new ShapeMismatchError(this.name, colorCount, this.colors.length);
    }

    if (hasNumeric && this.numericParam === undefined) {
      throw new MissingParameterError(this.name);
    }
    if (!hasNumeric && this.numericParam !== undefined) {
      throw new UnexpectedParameterError(this.name);
    }
  }

  /**
   * Format: `THEME.<name>.[param]R,G,B,R,G,B,...,`
   * e.g. `THEME.TWINKLE1.255,0,0,0,0,255,`
   */
  toCommandString(): string {
    this.validate();

    let params = '';
    if (this.numericParam !== undefined) {
      params += String(this.numericParam);
    }
    for (const color of this.colors) {
      params += color.toCommaString();
    }
    if (!params.endsWith(',')) {
      params += ',';
    }

    return `THEME.${this.name}.${params}`;
  }
}
