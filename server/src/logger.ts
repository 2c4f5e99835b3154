import fs from "node:fs";
import path from "node:path";
import type { RecommendationEnvelope, SessionStatus } from "@driveassist/shared/assistant-types";
import type { ActionEvent, DriverPreferences } from "@driveassist/shared/types";

export interface SessionMeta {
  startedAt: string;
  endedAt: string | null;
  actions: number;
  envelopes: number;
  recommendationsSent: number;
  breakReminderSent: boolean;
  preferences: DriverPreferences | null;
}

export interface SessionLogger {
  /** Append an inbound action. Opens the session file on the first one. */
  onAction(event: ActionEvent): void;
  /** Append a published envelope. */
  onPublish(envelope: RecommendationEnvelope): void;
  /** Flush and close the current session, writing its summary. */
  close(status: SessionStatus): void;
}

export function createSessionLogger(dataDir: string, now: () => Date = () => new Date()): SessionLogger {
  fs.mkdirSync(dataDir, { recursive: true });

  let stream: fs.WriteStream | null = null;
  let metaPath: string | null = null;
  let meta: SessionMeta | null = null;

  function startSession(): void {
    const started = now();
    const baseName = started.toISOString().replace(/[:.]/g, "-").slice(0, 19);

    stream = fs.createWriteStream(path.join(dataDir, `${baseName}.ndjson`), { flags: "a" });
    metaPath = path.join(dataDir, `${baseName}.meta.json`);
    meta = {
      startedAt: started.toISOString(),
      endedAt: null,
      actions: 0,
      envelopes: 0,
      recommendationsSent: 0,
      breakReminderSent: false,
      preferences: null,
    };

    console.log(`[Logger] Session started: ${baseName}`);
  }

  function write(kind: "action" | "recommendations", data: unknown): void {
    stream?.write(`${JSON.stringify({ kind, loggedAt: now().toISOString(), data })}\n`);
  }

  return {
    onAction(event) {
      if (!stream) startSession();
      write("action", {
        action: event.action,
        timestamp: event.timestamp.toISOString(),
        value: event.value,
      });
      if (meta) meta.actions++;
    },
    onPublish(envelope) {
      if (!stream) return;
      write("recommendations", envelope);
      if (meta) meta.envelopes++;
    },
    close(status) {
      if (!stream || !meta || !metaPath) return;

      meta.endedAt = now().toISOString();
      meta.recommendationsSent = status.recommendationsSent;
      meta.breakReminderSent = status.breakReminderSent;
      meta.preferences = status.preferences;
      fs.writeFileSync(metaPath, JSON.stringify(meta, null, 2));

      stream.end();
      console.log(`[Logger] Session ended: ${meta.actions} actions, ${meta.envelopes} envelopes logged`);

      stream = null;
      meta = null;
      metaPath = null;
    },
  };
}
