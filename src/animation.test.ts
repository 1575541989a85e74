import { vi } from 'vitest';
import {
  AnimationTarget,
  animateTheme,
  easeInOutQuad,
  easeInQuad,
  easeOutQuad,
  easings,
  interpolate,
  interpolateColor,
  linear,
} from './animation';
import { RGBColor } from './color';
import { LengthMismatchError, OutOfRangeError, ShapeMismatchError } from './errors';
import { MoonsideLamp } from './lamp';
import { ThemeConfig, ThemeName } from './themes';
import { FakeTransport } from './testing/fake-transport';

function fakeClock() {
  const sleeps: number[] = [];
  const clock = { time: 0, sleeps };
  return {
    clock,
    now: () => clock.time,
    sleep: async (ms: number) => {
      clock.sleeps.push(ms);
      clock.time += ms;
    },
  };
}

describe('easing curves', () => {
  it('should start at 0 and end at 1', () => {
    for (const curve of Object.values(easings)) {
      expect(curve(0)).toBe(0);
      expect(curve(1)).toBe(1);
    }
  });

  it('should shape the midpoint', () => {
    expect(linear(0.3)).toBe(0.3);
    expect(easeInQuad(0.5)).toBe(0.25);
    expect(easeOutQuad(0.5)).toBe(0.75);
    expect(easeInOutQuad(0.25)).toBe(0.125);
    expect(easeInOutQuad(0.75)).toBe(0.875);
  });
});

describe('interpolate', () => {
  it('should truncate toward zero', () => {
    expect(interpolate(255, 0, 0.5)).toBe(127);
    expect(interpolate(0, 255, 0.5)).toBe(127);
  });

  it('should hit the end value exactly', () => {
    expect(interpolate(10, 20, 1)).toBe(20);
    expect(interpolate(120, 40, 1)).toBe(40);
  });

  it('should interpolate each color channel independently', () => {
    const color = interpolateColor(new RGBColor(0, 100, 200), new RGBColor(200, 100, 0), 0.25);
    expect(color.toJSON()).toEqual({ r: 50, g: 100, b: 150 });
  });
});

describe('animateTheme', () => {
  let transport: FakeTransport;
  let lamp: MoonsideLamp;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    transport = new FakeTransport('MOONSIDE-S1');
    lamp = new MoonsideLamp(transport, { name: 'MOONSIDE-S1' });
    await lamp.connect();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should send only the end values when duration is zero', async () => {
    const { now, sleep } = fakeClock();

    const frames = await animateTheme(lamp, {
      durationMs: 0,
      startColors: [new RGBColor(255, 0, 0), new RGBColor(0, 0, 255)],
      endColors: [new RGBColor(0, 255, 0), new RGBColor(128, 0, 128)],
      startBrightness: 100,
      endBrightness: 40,
      now,
      sleep,
    });

    expect(frames).toBe(1);
    expect(transport.rx.commands).toEqual(['THEME.GRADIENT1.0,255,0,128,0,128,', 'BRIGH040']);
  });

  it('should step through the transition and finish on the end values', async () => {
    const { clock, now, sleep } = fakeClock();

    const frames = await animateTheme(lamp, {
      durationMs: 640,
      startColors: [new RGBColor(0, 0, 0), new RGBColor(200, 100, 0)],
      endColors: [new RGBColor(200, 100, 40), new RGBColor(0, 0, 0)],
      startBrightness: 120,
      endBrightness: 40,
      now,
      sleep,
    });

    expect(frames).toBe(5);
    expect(transport.rx.commands).toEqual([
      'THEME.GRADIENT1.0,0,0,200,100,0,',
      'BRIGH120',
      'THEME.GRADIENT1.50,25,10,150,75,0,',
      'BRIGH100',
      'THEME.GRADIENT1.100,50,20,100,50,0,',
      'BRIGH080',
      'THEME.GRADIENT1.150,75,30,50,25,0,',
      'BRIGH060',
      'THEME.GRADIENT1.200,100,40,0,0,0,',
      'BRIGH040',
    ]);
    expect(clock.sleeps).toEqual([150, 10, 150, 10, 150, 10, 150, 10, 150]);
  });

  it('should apply separate curves to colors and brightness', async () => {
    const { now, sleep } = fakeClock();

    await animateTheme(lamp, {
      durationMs: 320,
      startColors: [new RGBColor(0, 0, 0), new RGBColor(0, 0, 0)],
      endColors: [new RGBColor(200, 0, 0), new RGBColor(0, 0, 200)],
      startBrightness: 0,
      endBrightness: 100,
      colorCurve: easeInQuad,
      brightnessCurve: easeOutQuad,
      now,
      sleep,
    });

    // frames at progress 0, 0.5 and 1
    expect(transport.rx.commands).toEqual([
      'THEME.GRADIENT1.0,0,0,0,0,0,',
      'BRIGH000',
      'THEME.GRADIENT1.50,0,0,0,0,50,',
      'BRIGH075',
      'THEME.GRADIENT1.200,0,0,0,0,200,',
      'BRIGH100',
    ]);
  });

  it('should subtract the time a command took from the spacing', async () => {
    const { clock, now, sleep } = fakeClock();
    const target: AnimationTarget = {
      setTheme: async () => {
        clock.time += 40;
      },
      setBrightness: async () => undefined,
    };

    await animateTheme(target, {
      durationMs: 0,
      startColors: [new RGBColor(0, 0, 0), new RGBColor(0, 0, 0)],
      endColors: [new RGBColor(10, 10, 10), new RGBColor(20, 20, 20)],
      startBrightness: 0,
      endBrightness: 0,
      theme: ThemeName.THEME1,
      now,
      sleep,
    });

    expect(clock.sleeps).toEqual([110]);
  });

  it('should not sleep when a command overruns the spacing', async () => {
    const { clock, now, sleep } = fakeClock();
    const target: AnimationTarget = {
      setTheme: async () => {
        clock.time += 200;
      },
      setBrightness: async () => undefined,
    };

    await animateTheme(target, {
      durationMs: 0,
      startColors: [new RGBColor(0, 0, 0), new RGBColor(0, 0, 0)],
      endColors: [new RGBColor(10, 10, 10), new RGBColor(20, 20, 20)],
      startBrightness: 0,
      endBrightness: 0,
      now,
      sleep,
    });

    expect(clock.sleeps).toEqual([0]);
  });

  it('should use the requested theme', async () => {
    const { now, sleep } = fakeClock();
    const sent: ThemeConfig[] = [];
    const target: AnimationTarget = {
      setTheme: async theme => {
        sent.push(theme);
      },
      setBrightness: async () => undefined,
    };

    await animateTheme(target, {
      durationMs: 0,
      startColors: [new RGBColor(1, 1, 1), new RGBColor(2, 2, 2), new RGBColor(3, 3, 3)],
      endColors: [new RGBColor(4, 4, 4), new RGBColor(5, 5, 5), new RGBColor(6, 6, 6)],
      startBrightness: 10,
      endBrightness: 20,
      theme: ThemeName.GRADIENT2,
      now,
      sleep,
    });

    expect(sent).toHaveLength(1);
    expect(sent[0].toCommandString()).toBe('THEME.GRADIENT2.4,4,4,5,5,5,6,6,6,');
  });

  it('should fail with LengthMismatch before sending anything', async () => {
    const { now, sleep } = fakeClock();

    await expect(
      animateTheme(lamp, {
        durationMs: 1000,
        startColors: [new RGBColor(255, 0, 0), new RGBColor(0, 0, 255)],
        endColors: [new RGBColor(0, 255, 0)],
        startBrightness: 100,
        endBrightness: 40,
        now,
        sleep,
      })
    ).rejects.toThrow(LengthMismatchError);

    expect(transport.rx.writes).toEqual([]);
  });

  it('should fail before sending when the theme takes a different number of colors', async () => {
    const { now, sleep } = fakeClock();

    await expect(
      animateTheme(lamp, {
        durationMs: 0,
        startColors: [new RGBColor(1, 1, 1), new RGBColor(2, 2, 2), new RGBColor(3, 3, 3)],
        endColors: [new RGBColor(4, 4, 4), new RGBColor(5, 5, 5), new RGBColor(6, 6, 6)],
        startBrightness: 0,
        endBrightness: 0,
        now,
        sleep,
      })
    ).rejects.toThrow(ShapeMismatchError);

    expect(transport.rx.writes).toEqual([]);
  });

  it('should reject an out-of-range end brightness before sending anything', async () => {
    const { now, sleep } = fakeClock();

    await expect(
      animateTheme(lamp, {
        durationMs: 0,
        startColors: [new RGBColor(1, 1, 1), new RGBColor(2, 2, 2)],
        endColors: [new RGBColor(3, 3, 3), new RGBColor(4, 4, 4)],
        startBrightness: 0,
        endBrightness: 200,
        now,
        sleep,
      })
    ).rejects.toThrow(new OutOfRangeError('Brightness', 200, 0, 120));

    expect(transport.rx.writes).toEqual([]);
  });

  it('should reject an out-of-range start brightness before sending anything', async () => {
    const { now, sleep } = fakeClock();

    await expect(
      animateTheme(lamp, {
        durationMs: 500,
        startColors: [new RGBColor(1, 1, 1), new RGBColor(2, 2, 2)],
        endColors: [new RGBColor(3, 3, 3), new RGBColor(4, 4, 4)],
        startBrightness: -1,
        endBrightness: 60,
        now,
        sleep,
      })
    ).rejects.toThrow(OutOfRangeError);

    expect(transport.rx.writes).toEqual([]);
  });
});
