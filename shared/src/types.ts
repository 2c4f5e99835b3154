// ── Vehicle actions reported on vehicle/actions ─────────────────

export const KNOWN_ACTIONS = [
  "climate_turn_on",
  "climate_turn_off",
  "climate_set_temperature",
  "climate_increase",
  "climate_decrease",
  "infotainment_play",
  "infotainment_stop",
  "infotainment_set_volume",
  "infotainment_volume_up",
  "infotainment_volume_down",
  "lights_turn_on",
  "lights_turn_off",
  "lights_dim",
  "lights_brighten",
  "seats_heat_on",
  "seats_heat_off",
  "seats_adjust",
] as const;

export type KnownAction = (typeof KNOWN_ACTIONS)[number];

/** Any action name seen on the bus. Unknown names are kept in history but never change car state. */
export type ActionName = KnownAction | (string & {});

export interface ActionEvent {
  readonly action: ActionName;
  readonly timestamp: Date;
  readonly value: number | null;
}

// ── Car state ───────────────────────────────────────────────────

export interface CarState {
  climateOn: boolean;
  temperature: number; // °C, 16-30 after increase/decrease
  infotainmentOn: boolean;
  volume: number; // 0-100 after up/down
  lightsOn: boolean;
  brightness: number; // 0-100
  seatsHeated: boolean;
  seatPosition: number;
}

// ── Learned preferences ─────────────────────────────────────────

export interface DriverPreferences {
  preferredTemperature: number;
  preferredVolume: number;
  preferredSeatPosition: number;
  likesMusic: boolean;
  likesWarmSeats: boolean;
  /** Actions seen at least twice in the current history window */
  commonActions: ActionName[];
}
