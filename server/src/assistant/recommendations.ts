import type { Recommendation } from "@driveassist/shared/assistant-types";
import {
  MAX_RECOMMENDATIONS_PER_CYCLE,
  NIGHT_ENDS_AT_HOUR,
  NIGHT_STARTS_AT_HOUR,
  SUPPRESSION_WINDOW_SIZE,
} from "@driveassist/shared/constants";
import type { PhrasedAction } from "@driveassist/shared/phrases";
import type { ActionName, CarState, DriverPreferences } from "@driveassist/shared/types";
import { createTemplatePhraser, type Phraser } from "./phrasing.js";

export interface RecommendationContext {
  carState: CarState;
  preferences: DriverPreferences;
  /** Most recent action names, oldest first (the 5-entry recent window) */
  recentActions: ActionName[];
  now: Date;
}

interface RuleResult {
  action: PhrasedAction;
  eligible: boolean;
  value: number | null;
}

interface RecommendationRule {
  /** Evaluated in declaration order; at most two eligible rules are kept. */
  evaluate(ctx: RecommendationContext): RuleResult;
}

export interface RecommendationEngine {
  /** Returns 0-2 recommendations for the given context. */
  generate(ctx: RecommendationContext): Recommendation[];
}

export function isNight(date: Date): boolean {
  const hour = date.getHours();
  return hour >= NIGHT_STARTS_AT_HOUR || hour <= NIGHT_ENDS_AT_HOUR;
}

/** A rule that targets one action and carries no value. */
function toggleRule(
  action: PhrasedAction,
  when: (ctx: RecommendationContext) => boolean,
): RecommendationRule {
  return {
    evaluate(ctx) {
      return { action, eligible: when(ctx), value: null };
    },
  };
}

/** A rule that proposes a learned setting when it differs from the current one. */
function settingRule(
  action: PhrasedAction,
  when: (ctx: RecommendationContext) => boolean,
  preferred: (p: DriverPreferences) => number,
  current: (s: CarState) => number,
): RecommendationRule {
  return {
    evaluate(ctx) {
      const value = preferred(ctx.preferences);
      return { action, eligible: when(ctx) && value !== current(ctx.carState), value };
    },
  };
}

const rules: RecommendationRule[] = [
  toggleRule("climate_turn_on", (c) => !c.carState.climateOn),
  settingRule(
    "climate_set_temperature",
    (c) => c.carState.climateOn,
    (p) => p.preferredTemperature,
    (s) => s.temperature,
  ),
  toggleRule("infotainment_play", (c) => !c.carState.infotainmentOn && c.preferences.likesMusic),
  settingRule(
    "infotainment_set_volume",
    (c) => c.carState.infotainmentOn,
    (p) => p.preferredVolume,
    (s) => s.volume,
  ),
  {
    // Lighting follows the clock: on at night when off, off by day when on.
    evaluate(ctx) {
      if (isNight(ctx.now)) {
        return { action: "lights_turn_on", eligible: !ctx.carState.lightsOn, value: null };
      }
      return { action: "lights_turn_off", eligible: ctx.carState.lightsOn, value: null };
    },
  },
  toggleRule("seats_heat_on", (c) => !c.carState.seatsHeated && c.preferences.likesWarmSeats),
  settingRule(
    "seats_adjust",
    () => true,
    (p) => p.preferredSeatPosition,
    (s) => s.seatPosition,
  ),
];

export function createRecommendationEngine(phraser: Phraser = createTemplatePhraser()): RecommendationEngine {
  return {
    generate(ctx) {
      const suppressed = new Set(ctx.recentActions.slice(-SUPPRESSION_WINDOW_SIZE));
      const recommendations: Recommendation[] = [];

      for (const rule of rules) {
        if (recommendations.length >= MAX_RECOMMENDATIONS_PER_CYCLE) break;

        const result = rule.evaluate(ctx);
        if (!result.eligible || suppressed.has(result.action)) continue;

        recommendations.push({
          action: result.action,
          message: phraser.phrase(result.action, result.value),
          value: result.value,
        });
      }

      return recommendations;
    },
  };
}
