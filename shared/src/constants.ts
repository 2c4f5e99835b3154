export const ACTIONS_TOPIC = "vehicle/actions";
export const RECOMMENDATIONS_TOPIC = "vehicle/recommendations";

export const MQTT_DEFAULT_HOST = "localhost";
export const MQTT_DEFAULT_PORT = 1883;
export const MQTT_MAX_RETRIES = 10;
export const MQTT_RETRY_DELAY_MS = 5_000;

export const WS_PORT = 3010;

// Session timing
export const LEARNING_PERIOD_MS = 30_000;
export const BREAK_REMINDER_MS = 200_000;
export const RECOMMENDATION_INTERVAL_MS = 20_000;
export const MAX_RECOMMENDATIONS_PER_SESSION = 50;
export const STATUS_INTERVAL_MS = 30_000;

// Learning
export const HISTORY_CAPACITY = 50;
export const MIN_ACTIONS_FOR_LEARNING = 3;
export const COMMON_ACTION_MIN_COUNT = 2;

// Recommendations
export const RECENT_WINDOW_SIZE = 5;
export const SUPPRESSION_WINDOW_SIZE = 3;
export const MAX_RECOMMENDATIONS_PER_CYCLE = 2;
export const NIGHT_STARTS_AT_HOUR = 18;
export const NIGHT_ENDS_AT_HOUR = 6;

// Car limits
export const TEMPERATURE_MIN = 16;
export const TEMPERATURE_MAX = 30;
export const VOLUME_MIN = 0;
export const VOLUME_MAX = 100;
export const BRIGHTNESS_MIN = 0;
export const BRIGHTNESS_MAX = 100;
export const VOLUME_STEP = 10;
export const BRIGHTNESS_STEP = 20;
