import * as dotenv from 'dotenv';
import { createTransport, lampIdFromName, loadConfig } from './config';

/**
 * Utility script to find Moonside lamps and their advertised names
 * Run with: npm run scan
 */

dotenv.config();

async function scanForDevices() {
  const config = await loadConfig();
  const transport = createTransport(config.ble.transport);
  await transport.initialize();

  console.log(`Scanning for Bluetooth devices (${config.ble.scanDurationMs / 1000}s)...\n`);
  const devices = await transport.scan(config.ble.scanDurationMs);
  await transport.close();

  const named = devices.filter(d => d.name);
  for (const device of named) {
    const rssi = device.rssi !== undefined ? `${device.rssi} dBm` : 'unknown';
    const hint = device.name?.toUpperCase().startsWith('MOONSIDE') ? ' [Moonside?]' : '';
    console.log(`Found: ${device.name}${hint}`);
    console.log(`  Address: ${device.address}`);
    console.log(`  RSSI: ${rssi}`);
    console.log('');
  }
  console.log(`${devices.length - named.length} device(s) without an advertised name were skipped.`);

  const lamps = named
    .filter(d => d.name?.toUpperCase().startsWith('MOONSIDE'))
    .map(d => ({ id: lampIdFromName(d.name ?? ''), name: d.name }));
  if (lamps.length > 0) {
    console.log('\nAdd lamps to your .env like this:');
    console.log(`LAMPS=${JSON.stringify(lamps)}`);
  }
}

scanForDevices().catch((error) => {
  console.error(error);
  process.exit(1);
});
