import { performance } from 'node:perf_hooks';
import { RGBColor } from './color';
import { encodeBrightness } from './encoding';
import { LengthMismatchError } from './errors';
import { MoonsideLamp } from './lamp';
import { ThemeConfig, ThemeName } from './themes';
import { delay } from './timing';

/** Maps normalized progress in [0, 1] to eased progress. */
export type EasingCurve = (progress: number) => number;

export const linear: EasingCurve = t => t;
export const easeInQuad: EasingCurve = t => t * t;
export const easeOutQuad: EasingCurve = t => t * (2 - t);
export const easeInOutQuad: EasingCurve = t => (t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t);

export const easings = {
  linear,
  easeInQuad,
  easeOutQuad,
  easeInOutQuad,
} as const;

export type EasingName = keyof typeof easings;

export const DEFAULT_THEME_INTERVAL_MS = 150;
export const DEFAULT_BRIGHTNESS_INTERVAL_MS = 10;

export function interpolate(start: number, end: number, eased: number): number {
  return Math.trunc(start + eased * (end - start));
}

export function interpolateColor(start: RGBColor, end: RGBColor, eased: number): RGBColor {
  return new RGBColor(
    interpolate(start.r, end.r, eased),
    interpolate(start.g, end.g, eased),
    interpolate(start.b, end.b, eased)
  );
}

export interface AnimateThemeOptions {
  durationMs: number;
  startColors: readonly RGBColor[];
  endColors: readonly RGBColor[];
  startBrightness: number;
  endBrightness: number;
  colorCurve?: EasingCurve;
  brightnessCurve?: EasingCurve;
  theme?: ThemeName;
  /** Minimum spacing between theme commands. */
  themeIntervalMs?: number;
  /** Minimum spacing between brightness commands. */
  brightnessIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type AnimationTarget = Pick<MoonsideLamp, 'setTheme' | 'setBrightness'>;

/**
 * Tweens a multi-color theme and the lamp brightness from start to end values.
 * Bad endpoints are rejected before the first write. Every frame sends one theme command and one brightness command; the last
 * frame always carries the exact end values. Resolves to the number of frames.
 */
export async function animateTheme(lamp: AnimationTarget, options: AnimateThemeOptions): Promise<number> {
  const {
    durationMs,
    startColors,
    endColors,
    startBrightness,
    endBrightness,
    colorCurve = linear,
    brightnessCurve = linear,
    theme = ThemeName.GRADIENT1,
    themeIntervalMs = DEFAULT_THEME_INTERVAL_MS,
    brightnessIntervalMs = DEFAULT_BRIGHTNESS_INTERVAL_MS,
    now = () => performance.now(),
    sleep = delay,
  } = options;

  if (startColors.length !== endColors.length) {
    throw new LengthMismatchError(startColors.length, endColors.length);
  }
  // Every frame lies between the endpoints, so checking them covers the whole run.
  encodeBrightness(startBrightness);
  encodeBrightness(endBrightness);
  new ThemeConfig({ name: theme, colors: endColors }).validate();

  const startedAt = now();
  let frames = 0;

  for (;;) {
    const elapsed = now() - startedAt;
    const progress = durationMs > 0 ? Math.min(elapsed / durationMs, 1) : 1;

    const easedColor = colorCurve(progress);
    const colors = startColors.map((start, i) => interpolateColor(start, endColors[i], easedColor));
    const brightness = interpolate(startBrightness, endBrightness, brightnessCurve(progress));

    const themeSentAt = now();
    await lamp.setTheme(new ThemeConfig({ name: theme, colors }));
    await sleep(Math.max(0, themeIntervalMs - (now() - themeSentAt)));

    const brightnessSentAt = now();
    await lamp.setBrightness(brightness);
    frames++;

    if (progress >= 1) {
      break;
    }
    await sleep(Math.max(0, brightnessIntervalMs - (now() - brightnessSentAt)));
  }

  console.log(`[Animation] ${theme} transition finished after ${frames} frame(s)`);
  return frames;
}
