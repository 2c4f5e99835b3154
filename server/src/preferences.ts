import { COMMON_ACTION_MIN_COUNT } from "@driveassist/shared/constants";
import type { ActionEvent, ActionName, DriverPreferences } from "@driveassist/shared/types";

export function createDefaultPreferences(): DriverPreferences {
  return {
    preferredTemperature: 22,
    preferredVolume: 50,
    preferredSeatPosition: 5,
    likesMusic: false,
    likesWarmSeats: false,
    commonActions: [],
  };
}

/** Integer-truncated mean of the values recorded for `action`, or null when none carry a value. */
function meanValue(events: readonly ActionEvent[], action: ActionName): number | null {
  const values: number[] = [];
  for (const e of events) {
    if (e.action === action && e.value !== null) values.push(e.value);
  }
  if (values.length === 0) return null;
  return Math.trunc(values.reduce((a, b) => a + b, 0) / values.length);
}

/**
 * Derive preferences from the current history window.
 *
 * Numeric preferences and the like-flags only change when the window carries evidence;
 * otherwise they keep the value from `previous`. Flags are never reset to false here.
 * `commonActions` is rebuilt from scratch on every call.
 */
export function recomputePreferences(
  previous: DriverPreferences,
  events: readonly ActionEvent[],
): DriverPreferences {
  const counts = new Map<ActionName, number>();
  for (const e of events) {
    counts.set(e.action, (counts.get(e.action) ?? 0) + 1);
  }

  const commonActions: ActionName[] = [];
  for (const [action, count] of counts) {
    if (count >= COMMON_ACTION_MIN_COUNT) commonActions.push(action);
  }

  return {
    preferredTemperature: meanValue(events, "climate_set_temperature") ?? previous.preferredTemperature,
    preferredVolume: meanValue(events, "infotainment_set_volume") ?? previous.preferredVolume,
    preferredSeatPosition: meanValue(events, "seats_adjust") ?? previous.preferredSeatPosition,
    likesMusic: previous.likesMusic || counts.has("infotainment_play"),
    likesWarmSeats: previous.likesWarmSeats || counts.has("seats_heat_on"),
    commonActions,
  };
}
