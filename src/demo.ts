import * as dotenv from 'dotenv';
import { animateTheme, easeInOutQuad, linear } from './animation';
import { RGBColor } from './color';
import { createTransport, loadConfig } from './config';
import { MoonsideLamp, withLamps } from './lamp';
import { ThemeConfig, ThemeName } from './themes';

dotenv.config();

/**
 * Turns the configured lamps on, applies a BEAT2 theme, then fades the first
 * lamp's GRADIENT1 from red/blue to green/purple while dimming it.
 * Run with: npm run demo
 */
async function demo() {
  const config = await loadConfig();
  if (config.lamps.length === 0) {
    throw new Error('No lamps configured. Please set the LAMPS environment variable.');
  }

  const transport = createTransport(config.ble.transport);
  await transport.initialize();

  const lamps = config.lamps.map(
    lampConfig =>
      new MoonsideLamp(transport, {
        id: lampConfig.id,
        name: lampConfig.name,
        maxReconnectAttempts: lampConfig.maxReconnectAttempts ?? config.ble.maxReconnectAttempts,
        scanDurationMs: config.ble.scanDurationMs,
      })
  );

  const beat = new ThemeConfig({
    name: ThemeName.BEAT2,
    colors: [new RGBColor(255, 0, 0), new RGBColor(0, 255, 0)],
  });

  try {
    await withLamps(lamps, async connected => {
      console.log('Lamps connected.');

      for (const lamp of connected) {
        await lamp.turnOn();
        await lamp.setTheme(beat);
      }
      console.log('Lamps turned on with the BEAT2 theme.');

      await animateTheme(connected[0], {
        durationMs: 5000,
        startColors: [new RGBColor(255, 0, 0), new RGBColor(0, 0, 255)],
        endColors: [new RGBColor(0, 255, 0), new RGBColor(128, 0, 128)],
        startBrightness: 100,
        endBrightness: 40,
        colorCurve: easeInOutQuad,
        brightnessCurve: linear,
      });
      console.log('Gradient transition finished.');
    });
  } finally {
    await transport.close();
  }
}

demo().catch((error) => {
  console.error(error);
  process.exit(1);
});
