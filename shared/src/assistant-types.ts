import type { ActionName, CarState, DriverPreferences } from "./types.js";

export type SessionPhase = "idle" | "learning" | "active";

/** Sentinel action carried by break reminders */
export const TAKE_BREAK = "take_break";

export type RecommendedAction = ActionName | typeof TAKE_BREAK;

export interface Recommendation {
  action: RecommendedAction;
  message: string;
  value: number | null;
}

/** Payload published on vehicle/recommendations */
export interface RecommendationEnvelope {
  type: "ai_suggestion";
  recommendations: Recommendation[];
  timestamp: string; // ISO-8601
}

export interface SessionStatus {
  phase: SessionPhase;
  startedAt: string | null;
  durationMs: number;
  actionsProcessed: number;
  historySize: number;
  recommendationsSent: number;
  lastRecommendationAt: string | null;
  breakReminderSent: boolean;
  carState: CarState;
  preferences: DriverPreferences;
}
