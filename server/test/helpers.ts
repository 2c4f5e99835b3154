import type { RecommendationEnvelope } from "@driveassist/shared/assistant-types";
import type { ActionEvent, ActionName } from "@driveassist/shared/types";

export const DAYTIME = new Date(2024, 0, 15, 12, 0, 0);
export const NIGHTTIME = new Date(2024, 0, 15, 22, 0, 0);

export function action(name: ActionName, value: number | null = null, at: Date = DAYTIME): ActionEvent {
  return { action: name, timestamp: at, value };
}

/** In-process stand-in for the recommendations topic. */
export function createPublishRecorder() {
  const envelopes: RecommendationEnvelope[] = [];
  return {
    envelopes,
    publish: async (envelope: RecommendationEnvelope): Promise<void> => {
      envelopes.push(envelope);
    },
    actions(): string[][] {
      return envelopes.map((e) => e.recommendations.map((r) => r.action));
    },
  };
}
