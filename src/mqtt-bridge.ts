import mqtt, { IClientOptions, MqttClient } from 'mqtt';
import { applyLampCommand, parseLampCommand } from './commands';
import { errorMessage } from './errors';
import { MoonsideLamp } from './lamp';
import { LampState, MQTTCommand, MQTTState } from './types';

export class MQTTBridge {
  private client: MqttClient | null = null;
  private lamps = new Map<string, MoonsideLamp>();
  private pending = new Map<string, Promise<void>>();
  private baseTopic: string;

  constructor(
    private brokerUrl: string,
    private brokerOptions?: {
      username?: string;
      password?: string;
      clientId?: string;
    },
    baseTopic: string = 'moonside'
  ) {
    this.baseTopic = baseTopic;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const options: IClientOptions = {
        clientId: this.brokerOptions?.clientId || `moonside-bridge-${Date.now()}`,
        reconnectPeriod: 5000,
        connectTimeout: 10000,
      };

      if (this.brokerOptions?.username) {
        options.username = this.brokerOptions.username;
      }
      if (this.brokerOptions?.password) {
        options.password = this.brokerOptions.password;
      }

      const client = mqtt.connect(this.brokerUrl, options);
      this.client = client;

      client.on('connect', () => {
        console.log(`[MQTT] Connected to broker at ${this.brokerUrl}`);
        this.subscribeToCommands();
        resolve();
      });

      client.on('error', (error) => {
        console.error('[MQTT] Error:', error);
        reject(error);
      });

      client.on('message', (topic, payload) => {
        this.handleMessage(topic, payload.toString());
      });

      client.on('reconnect', () => {
        console.log('[MQTT] Reconnecting...');
      });

      client.on('close', () => {
        console.log('[MQTT] Connection closed');
      });
    });
  }

  private subscribeToCommands(): void {
    // Subscribe to all lamp command topics
    const commandTopic = `${this.baseTopic}/+/set`;
    this.client?.subscribe(commandTopic, (err) => {
      if (err) {
        console.error(`[MQTT] Failed to subscribe to ${commandTopic}:`, err);
      } else {
        console.log(`[MQTT] Subscribed to ${commandTopic}`);
      }
    });
  }

  /** Topic format: moonside/{lampId}/set */
  handleMessage(topic: string, payload: string): void {
    const prefix = `${this.baseTopic}/`;
    if (!topic.startsWith(prefix) || !topic.endsWith('/set')) {
      return;
    }
    const lampId = topic.slice(prefix.length, -'/set'.length);
    if (!lampId || lampId.includes('/')) {
      return;
    }

    const lamp = this.lamps.get(lampId);
    if (!lamp) {
      console.warn(`[MQTT] Lamp ${lampId} not found`);
      return;
    }

    let command: MQTTCommand;
    try {
      command = parseLampCommand(JSON.parse(payload));
    } catch (error) {
      console.error(`[MQTT] Failed to parse command for ${lampId}: ${errorMessage(error)}`);
      return;
    }

    console.log(`[MQTT] Received command for ${lampId}:`, command);
    this.dispatch(lampId, lamp, command).catch((error: unknown) => {
      console.error(`[MQTT] Failed to apply command to ${lampId}: ${errorMessage(error)}`);
    });
  }

  /** Commands for one lamp run one after another; a lamp handles one request at a time. */
  private dispatch(lampId: string, lamp: MoonsideLamp, command: MQTTCommand): Promise<void> {
    const previous = this.pending.get(lampId) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(() => applyLampCommand(lamp, command));
    this.pending.set(lampId, next);
    return next;
  }

  /** Resolves once every queued command has settled. */
  async idle(): Promise<void> {
    await Promise.allSettled(Array.from(this.pending.values()));
  }

  registerLamp(lamp: MoonsideLamp): void {
    this.lamps.set(lamp.id, lamp);
    console.log(`[MQTT] Registered lamp: ${lamp.name} (${lamp.id})`);
  }

  publishState(lampId: string, state: LampState): void {
    if (!this.client) {
      console.warn(`[MQTT] Cannot publish state for ${lampId}: MQTT client not initialized`);
      return;
    }

    if (!this.client.connected) {
      console.warn(`[MQTT] Cannot publish state for ${lampId}: MQTT client not connected`);
      return;
    }

    const mqttState: MQTTState = {
      state: state.power ? 'ON' : 'OFF',
    };
    if (state.brightness !== undefined) {
      mqttState.brightness = state.brightness;
    }
    if (state.color) {
      mqttState.color = state.color;
    }
    if (state.theme) {
      mqttState.theme = state.theme;
    }

    const topic = `${this.baseTopic}/${lampId}/state`;
    const payload = JSON.stringify(mqttState);

    this.client.publish(topic, payload, { retain: true, qos: 1 }, (err) => {
      if (err) {
        console.error(`[MQTT] Failed to publish state for ${lampId}:`, err);
      } else {
        console.log(`[MQTT] Published state for ${lampId} to ${topic}`);
      }
    });
  }

  disconnect(): void {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }
}
