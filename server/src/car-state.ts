import {
  BRIGHTNESS_MAX,
  BRIGHTNESS_MIN,
  BRIGHTNESS_STEP,
  TEMPERATURE_MAX,
  TEMPERATURE_MIN,
  VOLUME_MAX,
  VOLUME_MIN,
  VOLUME_STEP,
} from "@driveassist/shared/constants";
import type { ActionName, CarState } from "@driveassist/shared/types";

export function createDefaultCarState(): CarState {
  return {
    climateOn: false,
    temperature: 22,
    infotainmentOn: false,
    volume: 50,
    lightsOn: false,
    brightness: 80,
    seatsHeated: false,
    seatPosition: 5,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Pure transition: returns the state after `action`.
 *
 * Direct sets (`climate_set_temperature`, `infotainment_set_volume`, `seats_adjust`)
 * store the value as given and are no-ops without one. Only the stepwise actions clamp.
 * Unknown actions return the input state unchanged.
 */
export function applyAction(state: CarState, action: ActionName, value: number | null): CarState {
  switch (action) {
    case "climate_turn_on":
      return { ...state, climateOn: true };
    case "climate_turn_off":
      return { ...state, climateOn: false };
    case "climate_set_temperature":
      return value === null ? state : { ...state, temperature: value };
    case "climate_increase":
      return { ...state, temperature: clamp(state.temperature + 1, TEMPERATURE_MIN, TEMPERATURE_MAX) };
    case "climate_decrease":
      return { ...state, temperature: clamp(state.temperature - 1, TEMPERATURE_MIN, TEMPERATURE_MAX) };

    case "infotainment_play":
      return { ...state, infotainmentOn: true };
    case "infotainment_stop":
      return { ...state, infotainmentOn: false };
    case "infotainment_set_volume":
      return value === null ? state : { ...state, volume: value };
    case "infotainment_volume_up":
      return { ...state, volume: clamp(state.volume + VOLUME_STEP, VOLUME_MIN, VOLUME_MAX) };
    case "infotainment_volume_down":
      return { ...state, volume: clamp(state.volume - VOLUME_STEP, VOLUME_MIN, VOLUME_MAX) };

    case "lights_turn_on":
      return { ...state, lightsOn: true };
    case "lights_turn_off":
      return { ...state, lightsOn: false };
    case "lights_dim":
      return {
        ...state,
        brightness: clamp(state.brightness - BRIGHTNESS_STEP, BRIGHTNESS_MIN, BRIGHTNESS_MAX),
      };
    case "lights_brighten":
      return {
        ...state,
        brightness: clamp(state.brightness + BRIGHTNESS_STEP, BRIGHTNESS_MIN, BRIGHTNESS_MAX),
      };

    case "seats_heat_on":
      return { ...state, seatsHeated: true };
    case "seats_heat_off":
      return { ...state, seatsHeated: false };
    case "seats_adjust":
      return value === null ? state : { ...state, seatPosition: value };

    default:
      return state;
  }
}
