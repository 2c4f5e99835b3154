import type { Recommendation, RecommendationEnvelope } from "@driveassist/shared/assistant-types";
import type { ActionEvent } from "@driveassist/shared/types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode a vehicle/actions payload. Returns null if the payload is not a JSON object
 * with a non-empty `action` string.
 *
 * A missing or unparseable `timestamp` falls back to `receivedAt`; a `value` that is
 * not a finite number is treated as absent.
 */
export function parseActionMessage(
  payload: Buffer | string,
  receivedAt: Date = new Date(),
): ActionEvent | null {
  let data: unknown;
  try {
    data = JSON.parse(typeof payload === "string" ? payload : payload.toString("utf-8"));
  } catch {
    return null;
  }

  if (!isRecord(data)) return null;
  if (typeof data.action !== "string" || data.action.length === 0) return null;

  const parsedAt = typeof data.timestamp === "string" ? new Date(data.timestamp) : null;
  const timestamp = parsedAt && !Number.isNaN(parsedAt.getTime()) ? parsedAt : receivedAt;

  const value = typeof data.value === "number" && Number.isFinite(data.value) ? data.value : null;

  return { action: data.action, timestamp, value };
}

export function buildEnvelope(recommendations: Recommendation[], at: Date): RecommendationEnvelope {
  return {
    type: "ai_suggestion",
    recommendations,
    timestamp: at.toISOString(),
  };
}
