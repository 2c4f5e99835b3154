import path from "node:path";
import type { SessionStatus } from "@driveassist/shared/assistant-types";
import { ACTIONS_TOPIC, RECOMMENDATIONS_TOPIC } from "@driveassist/shared/constants";
import { createGeminiVerbalizer } from "./assistant/gemini.js";
import { createDriveAssistant } from "./assistant/index.js";
import { connectMqtt, connectWithRetry, createMqttBus, type MessageBus } from "./bus.js";
import { loadConfig } from "./config.js";
import { createSessionLogger } from "./logger.js";
import { createMonitorServer } from "./websocket.js";

function formatStatus(status: SessionStatus): string {
  const phase = status.phase === "active" ? "Ready" : status.phase === "learning" ? "Learning" : "Waiting";
  return `Status: ${phase} | Duration: ${Math.round(status.durationMs / 1000)}s | Actions: ${status.actionsProcessed} | Recommendations: ${status.recommendationsSent}`;
}

async function main(): Promise<void> {
  const dataDir = path.join(process.cwd(), "data");
  const config = loadConfig(dataDir);

  console.log("[DriveAssist] 🚗 Starting");
  console.log(`[DriveAssist] MQTT broker: ${config.mqttHost}:${config.mqttPort}`);
  console.log(
    `[DriveAssist] Learning period ${config.learningPeriodMs / 1000}s, break reminder after ${config.breakReminderMs / 1000}s`,
  );

  // The core may not start before the bus is up; exhausting retries is fatal
  const client = await connectWithRetry(
    {
      host: config.mqttHost,
      port: config.mqttPort,
      clientId: config.mqttClientId,
      maxRetries: config.mqttMaxRetries,
      retryDelayMs: config.mqttRetryDelayMs,
    },
    connectMqtt,
  );
  const bus: MessageBus = createMqttBus(client);

  const sessionLogger = createSessionLogger(path.join(dataDir, "sessions"));

  const verbalizer = config.geminiApiKey
    ? createGeminiVerbalizer({ apiKey: config.geminiApiKey, model: config.geminiModel })
    : undefined;
  console.log(`[DriveAssist] Gemini phrasing ${verbalizer ? "enabled" : "disabled"}`);

  const assistant = createDriveAssistant({
    publish: (envelope) => bus.publish(RECOMMENDATIONS_TOPIC, JSON.stringify(envelope)),
    timing: {
      learningPeriodMs: config.learningPeriodMs,
      breakReminderMs: config.breakReminderMs,
      recommendationIntervalMs: config.recommendationIntervalMs,
      maxRecommendations: config.maxRecommendations,
    },
    verbalizer,
    onAction: (event) => sessionLogger.onAction(event),
    onPublish: (envelope) => {
      sessionLogger.onPublish(envelope);
      io.emit("recommendations", envelope);
    },
  });
  const io = createMonitorServer(config.wsPort, () => assistant.getStatus());

  await bus.subscribe(ACTIONS_TOPIC, (payload) => {
    assistant.handleMessage(payload);
  });

  const statusTimer = setInterval(() => {
    const status = assistant.getStatus();
    if (status.phase !== "idle") console.log(`[DriveAssist] 📊 ${formatStatus(status)}`);
    io.emit("session:status", status);
  }, config.statusIntervalMs);

  console.log("[DriveAssist] 🚀 Running, waiting for vehicle actions");

  let shuttingDown = false;
  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    clearInterval(statusTimer);
    assistant.stop();

    const status = assistant.getStatus();
    sessionLogger.close(status);
    console.log("[DriveAssist] 🛑 Stopped");
    console.log(`[DriveAssist] Session: ${formatStatus(status)}`);
    console.log(`[DriveAssist] Learned preferences: ${JSON.stringify(status.preferences)}`);

    try {
      io.close();
      await bus.close();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("[DriveAssist] Error during shutdown:", message);
    }
    process.exit(0);
  }

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[DriveAssist] ❌ Fatal: ${message}`);
  process.exit(1);
});
