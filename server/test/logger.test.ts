import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SessionStatus } from "@driveassist/shared/assistant-types";
import { createDefaultCarState } from "../src/car-state.js";
import { createSessionLogger } from "../src/logger.js";
import { buildEnvelope } from "../src/messages.js";
import { createDefaultPreferences } from "../src/preferences.js";
import { action } from "./helpers.js";

const NOW = new Date("2024-01-15T12:00:00.000Z");

function status(patch: Partial<SessionStatus> = {}): SessionStatus {
  return {
    phase: "active",
    startedAt: NOW.toISOString(),
    durationMs: 0,
    actionsProcessed: 2,
    historySize: 2,
    recommendationsSent: 1,
    lastRecommendationAt: null,
    breakReminderSent: false,
    carState: createDefaultCarState(),
    preferences: createDefaultPreferences(),
    ...patch,
  };
}

describe("SessionLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "drive-assist-sessions-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("opens nothing until the first action", () => {
    const logger = createSessionLogger(dir, () => NOW);
    logger.onPublish(buildEnvelope([], NOW));
    logger.close(status());

    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("writes actions, envelopes and a summary", async () => {
    const logger = createSessionLogger(dir, () => NOW);
    logger.onAction(action("seats_adjust", 6, NOW));
    logger.onAction(action("lights_dim", null, NOW));
    logger.onPublish(buildEnvelope([{ action: "climate_turn_on", message: "On?", value: null }], NOW));
    logger.close(status({ breakReminderSent: true }));

    const meta = JSON.parse(fs.readFileSync(path.join(dir, "2024-01-15T12-00-00.meta.json"), "utf-8"));
    expect(meta).toEqual({
      startedAt: NOW.toISOString(),
      endedAt: NOW.toISOString(),
      actions: 2,
      envelopes: 1,
      recommendationsSent: 1,
      breakReminderSent: true,
      preferences: createDefaultPreferences(),
    });

    await vi.waitFor(() => {
      const lines = fs.readFileSync(path.join(dir, "2024-01-15T12-00-00.ndjson"), "utf-8").trim().split("\n");
      expect(lines).toHaveLength(3);
      expect(JSON.parse(lines[0])).toEqual({
        kind: "action",
        loggedAt: NOW.toISOString(),
        data: { action: "seats_adjust", timestamp: NOW.toISOString(), value: 6 },
      });
      expect(JSON.parse(lines[2]).kind).toBe("recommendations");
    });
  });
});
