import { connectAsync, type MqttClient } from "mqtt";

export interface BusConfig {
  host: string;
  port: number;
  clientId: string;
  maxRetries: number;
  retryDelayMs: number;
}

export interface MessageBus {
  /** Register a handler for one topic and subscribe to it on the broker. */
  subscribe(topic: string, handler: (payload: Buffer) => void): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  close(): Promise<void>;
}

export type Connector<C> = (url: string, clientId: string) => Promise<C>;

export const connectMqtt: Connector<MqttClient> = (url, clientId) =>
  // First connect fails fast so connectWithRetry owns startup retries; later drops auto-reconnect
  connectAsync(url, { clientId, keepalive: 60, reconnectPeriod: 5_000 }, false);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Connect to the broker, retrying a fixed number of times with a fixed delay.
 * Rejects with the last error once every attempt has failed.
 */
export async function connectWithRetry<C>(
  config: BusConfig,
  connect: Connector<C>,
): Promise<C> {
  const url = `mqtt://${config.host}:${config.port}`;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    console.log(`[Bus] Connecting to ${url} (attempt ${attempt}/${config.maxRetries})`);
    try {
      const client = await connect(url, config.clientId);
      console.log("[Bus] ✅ Connected to MQTT broker");
      return client;
    } catch (err) {
      lastError = err;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Bus] Connection failed (attempt ${attempt}): ${message}`);
      if (attempt < config.maxRetries) {
        console.log(`[Bus] Retrying in ${config.retryDelayMs / 1000}s...`);
        await sleep(config.retryDelayMs);
      }
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Could not connect to ${url} after ${config.maxRetries} attempts`);
}

export function createMqttBus(client: MqttClient): MessageBus {
  const handlers = new Map<string, (payload: Buffer) => void>();

  client.on("message", (topic, payload) => {
    const handler = handlers.get(topic);
    if (!handler) return;
    try {
      handler(payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Bus] Handler for ${topic} failed: ${message}`);
    }
  });

  client.on("error", (err) => {
    console.error("[Bus] Client error:", err.message);
  });

  client.on("close", () => {
    console.log("[Bus] Connection closed");
  });

  return {
    async subscribe(topic, handler) {
      handlers.set(topic, handler);
      await client.subscribeAsync(topic);
      console.log(`[Bus] 📡 Subscribed to ${topic}`);
    },
    async publish(topic, payload) {
      await client.publishAsync(topic, payload);
    },
    async close() {
      handlers.clear();
      await client.endAsync();
    },
  };
}
