import * as dotenv from 'dotenv';
import { createTransport, loadConfig } from './config';
import { errorMessage } from './errors';
import { MoonsideLamp } from './lamp';
import { MQTTBridge } from './mqtt-bridge';
import { LampState } from './types';

dotenv.config();

async function main() {
  console.log('[Main] Starting Moonside MQTT Bridge...');

  try {
    const config = await loadConfig();
    console.log(`[Main] Loaded ${config.lamps.length} lamp(s)`);

    if (config.lamps.length === 0) {
      console.error('[Main] No lamps configured. Please set the LAMPS environment variable.');
      process.exit(1);
    }

    const mqttBridge = new MQTTBridge(
      config.mqtt.brokerUrl,
      {
        username: config.mqtt.username,
        password: config.mqtt.password,
      },
      config.mqtt.baseTopic
    );
    await mqttBridge.connect();
    console.log('[Main] MQTT bridge connected');

    const transport = createTransport(config.ble.transport);
    await transport.initialize();
    console.log(`[Main] BLE transport (${config.ble.transport}) initialized`);

    // One adapter can't scan while connecting, so lamps are connected one at a time
    const lamps: MoonsideLamp[] = [];
    for (const lampConfig of config.lamps) {
      const lamp = new MoonsideLamp(
        transport,
        {
          id: lampConfig.id,
          name: lampConfig.name,
          maxReconnectAttempts: lampConfig.maxReconnectAttempts ?? config.ble.maxReconnectAttempts,
          scanDurationMs: config.ble.scanDurationMs,
        },
        (state: LampState) => mqttBridge.publishState(lampConfig.id, state)
      );

      try {
        await lamp.connect();
        console.log(`[Main] ✓ Connected to ${lampConfig.name}`);
      } catch (error) {
        // Registered anyway: the next command reconnects
        console.error(`[Main] ✗ Failed to connect to ${lampConfig.name}: ${errorMessage(error)}`);
      }

      mqttBridge.registerLamp(lamp);
      mqttBridge.publishState(lamp.id, lamp.getState());
      lamps.push(lamp);
    }

    console.log(`[Main] Bridge running. ${lamps.filter(l => l.isConnected()).length}/${lamps.length} lamp(s) connected.`);

    const shutdown = async () => {
      console.log('[Main] Shutting down...');
      await mqttBridge.idle();
      for (const lamp of lamps) {
        await lamp.disconnect();
      }
      await transport.close();
      mqttBridge.disconnect();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error) => {
        console.error('[Main] Error during shutdown:', error);
        process.exit(1);
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  } catch (error) {
    console.error('[Main] Fatal error:', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('[Main] Fatal error:', error);
  process.exit(1);
});
