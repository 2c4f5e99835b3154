import fs from "node:fs";
import path from "node:path";
import {
  BREAK_REMINDER_MS,
  LEARNING_PERIOD_MS,
  MAX_RECOMMENDATIONS_PER_SESSION,
  MQTT_DEFAULT_HOST,
  MQTT_DEFAULT_PORT,
  MQTT_MAX_RETRIES,
  MQTT_RETRY_DELAY_MS,
  RECOMMENDATION_INTERVAL_MS,
  STATUS_INTERVAL_MS,
  WS_PORT,
} from "@driveassist/shared/constants";

export interface AppConfig {
  mqttHost: string;
  mqttPort: number;
  mqttClientId: string;
  mqttMaxRetries: number;
  mqttRetryDelayMs: number;
  wsPort: number;
  learningPeriodMs: number;
  breakReminderMs: number;
  recommendationIntervalMs: number;
  maxRecommendations: number;
  statusIntervalMs: number;
  geminiApiKey: string;
  geminiModel: string;
}

type NumericKey = {
  [K in keyof AppConfig]: AppConfig[K] extends number ? K : never;
}[keyof AppConfig];

type StringKey = Exclude<keyof AppConfig, NumericKey>;

const ENV_NAMES: Record<keyof AppConfig, string> = {
  mqttHost: "MQTT_HOST",
  mqttPort: "MQTT_PORT",
  mqttClientId: "MQTT_CLIENT_ID",
  mqttMaxRetries: "MQTT_MAX_RETRIES",
  mqttRetryDelayMs: "MQTT_RETRY_DELAY_MS",
  wsPort: "WS_PORT",
  learningPeriodMs: "LEARNING_PERIOD_MS",
  breakReminderMs: "BREAK_REMINDER_MS",
  recommendationIntervalMs: "RECOMMENDATION_INTERVAL_MS",
  maxRecommendations: "MAX_RECOMMENDATIONS",
  statusIntervalMs: "STATUS_INTERVAL_MS",
  geminiApiKey: "GEMINI_API_KEY",
  geminiModel: "GEMINI_MODEL",
};

export function defaultConfig(): AppConfig {
  return {
    mqttHost: MQTT_DEFAULT_HOST,
    mqttPort: MQTT_DEFAULT_PORT,
    mqttClientId: `drive-assist-${Math.floor(1000 + Math.random() * 9000)}`,
    mqttMaxRetries: MQTT_MAX_RETRIES,
    mqttRetryDelayMs: MQTT_RETRY_DELAY_MS,
    wsPort: WS_PORT,
    learningPeriodMs: LEARNING_PERIOD_MS,
    breakReminderMs: BREAK_REMINDER_MS,
    recommendationIntervalMs: RECOMMENDATION_INTERVAL_MS,
    maxRecommendations: MAX_RECOMMENDATIONS_PER_SESSION,
    statusIntervalMs: STATUS_INTERVAL_MS,
    geminiApiKey: "",
    geminiModel: "gemini-2.5-flash",
  };
}

const INTEGER_KEYS: ReadonlySet<NumericKey> = new Set<NumericKey>([
  "mqttPort",
  "wsPort",
  "mqttMaxRetries",
  "maxRecommendations",
]);

function positiveNumber(raw: unknown, integer: boolean): number | null {
  const n = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  if (typeof n !== "number" || !Number.isFinite(n) || n <= 0) return null;
  return integer && !Number.isInteger(n) ? null : n;
}

/** Overlay every well-formed value `lookup` yields onto `base`; anything else keeps the base value. */
function applyOverrides(base: AppConfig, lookup: (key: keyof AppConfig) => unknown): AppConfig {
  const num = (key: NumericKey): number => positiveNumber(lookup(key), INTEGER_KEYS.has(key)) ?? base[key];
  const str = (key: StringKey): string => {
    const raw = lookup(key);
    return typeof raw === "string" && raw.trim() !== "" ? raw.trim() : base[key];
  };

  return {
    mqttHost: str("mqttHost"),
    mqttPort: num("mqttPort"),
    mqttClientId: str("mqttClientId"),
    mqttMaxRetries: num("mqttMaxRetries"),
    mqttRetryDelayMs: num("mqttRetryDelayMs"),
    wsPort: num("wsPort"),
    learningPeriodMs: num("learningPeriodMs"),
    breakReminderMs: num("breakReminderMs"),
    recommendationIntervalMs: num("recommendationIntervalMs"),
    maxRecommendations: num("maxRecommendations"),
    statusIntervalMs: num("statusIntervalMs"),
    geminiApiKey: str("geminiApiKey"),
    geminiModel: str("geminiModel"),
  };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  try {
    const data: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    if (typeof data === "object" && data !== null && !Array.isArray(data)) {
      return Object.fromEntries(Object.entries(data));
    }
    console.error(`[Config] Ignoring ${configPath}: expected a JSON object`);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Config] Ignoring ${configPath}: ${message}`);
  }
  return {};
}

/**
 * Resolve configuration: defaults, then `<dataDir>/config.json`, then environment variables.
 */
export function loadConfig(dataDir: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fromFile = readConfigFile(path.join(dataDir, "config.json"));
  const withFile = applyOverrides(defaultConfig(), (key) => fromFile[key]);
  return applyOverrides(withFile, (key) => env[ENV_NAMES[key]]);
}
