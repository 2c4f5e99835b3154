export type PhrasedAction =
  | "climate_turn_on"
  | "climate_set_temperature"
  | "infotainment_play"
  | "infotainment_set_volume"
  | "lights_turn_on"
  | "lights_turn_off"
  | "seats_heat_on"
  | "seats_adjust";

/** Openers prefixed to preference-based suggestions. */
export const GREETINGS: string[] = [
  "Hello! Based on your preferences,",
  "Hi! I noticed you usually prefer this, so",
  "Hello! From your driving patterns,",
  "Hi again! Your typical routine suggests",
];

/**
 * Suggestion templates per action. `{value}` is replaced with the recommended
 * setting (temperature, volume or seat position).
 */
export const SUGGESTIONS: Record<PhrasedAction, string[]> = {
  climate_turn_on: [
    "would you like me to turn on the climate control?",
    "should I start the climate system for you?",
    "shall we get the climate going?",
  ],
  climate_set_temperature: [
    "would you like to set the temperature to {value}°C?",
    "should I adjust the temperature to your usual {value}°C?",
    "shall we set it to your preferred {value}°C?",
  ],
  infotainment_play: [
    "would you like to listen to some music?",
    "should I start playing your music?",
    "shall we get some tunes going?",
  ],
  infotainment_set_volume: [
    "would you like to set the volume to {value}%?",
    "should I adjust the volume to your usual {value}%?",
    "shall we set the volume to {value}%?",
  ],
  lights_turn_on: [
    "It's getting dark, would you like me to turn on the ambient lights for a cozy atmosphere?",
  ],
  lights_turn_off: [
    "It's bright outside, would you like me to turn off the ambient lights to save energy?",
  ],
  seats_heat_on: [
    "would you like me to warm up your seat?",
    "should I turn on the seat heating?",
    "shall we get your seat nice and warm?",
  ],
  seats_adjust: [
    "would you like me to adjust your seat to position {value}?",
    "should I move your seat to your usual position {value}?",
    "shall we adjust the seat to your preferred setting?",
  ],
};

/** Lighting suggestions are phrased on their own, without a greeting. */
export const STANDALONE_ACTIONS: ReadonlySet<PhrasedAction> = new Set([
  "lights_turn_on",
  "lights_turn_off",
]);

export const BREAK_MESSAGES: string[] = [
  "You've been driving for a while now. Would you like to take a break? Your safety is important!",
  "Time for a quick break! You've been on the road for a while. Shall we find a rest stop?",
  "Hey there! Consider taking a short break - you've been driving for quite some time now.",
  "Safety first! You've been driving continuously. Would you like to take a breather?",
];
