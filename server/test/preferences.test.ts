import { describe, expect, it } from "vitest";
import { createActionHistory } from "../src/history.js";
import { createDefaultPreferences, recomputePreferences } from "../src/preferences.js";
import { action } from "./helpers.js";

describe("recomputePreferences", () => {
  it("averages set-temperature values", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("climate_set_temperature", 20),
      action("climate_set_temperature", 22),
      action("climate_set_temperature", 24),
    ]);
    expect(prefs.preferredTemperature).toBe(22);
  });

  it("truncates the mean to an integer", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("infotainment_set_volume", 35),
      action("infotainment_set_volume", 40),
      action("seats_adjust", 6),
      action("seats_adjust", 7),
    ]);
    expect(prefs.preferredVolume).toBe(37);
    expect(prefs.preferredSeatPosition).toBe(6);
  });

  it("skips entries without a value", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("climate_set_temperature", null),
      action("climate_set_temperature", 20),
      action("climate_set_temperature", 23),
    ]);
    expect(prefs.preferredTemperature).toBe(21);
  });

  it("keeps prior numeric preferences when the window has no evidence", () => {
    const previous = { ...createDefaultPreferences(), preferredVolume: 70, preferredSeatPosition: 9 };
    const prefs = recomputePreferences(previous, [
      action("lights_dim"),
      action("lights_dim"),
      action("climate_turn_on"),
    ]);
    expect(prefs.preferredVolume).toBe(70);
    expect(prefs.preferredSeatPosition).toBe(9);
    expect(prefs.preferredTemperature).toBe(22);
  });

  it("sets the like-flags when their trigger is in the window", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("infotainment_play"),
      action("seats_heat_on"),
      action("lights_dim"),
    ]);
    expect(prefs.likesMusic).toBe(true);
    expect(prefs.likesWarmSeats).toBe(true);
  });

  it("leaves the like-flags false without evidence", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("lights_dim"),
      action("climate_turn_on"),
      action("seats_heat_off"),
    ]);
    expect(prefs.likesMusic).toBe(false);
    expect(prefs.likesWarmSeats).toBe(false);
  });

  it("keeps likesMusic after the play event ages out of the window", () => {
    const history = createActionHistory();
    history.append(action("infotainment_play"));
    history.append(action("lights_dim"));
    history.append(action("lights_dim"));
    let prefs = recomputePreferences(createDefaultPreferences(), history.entries());
    expect(prefs.likesMusic).toBe(true);

    for (let i = 0; i < 50; i++) history.append(action("lights_brighten"));
    expect(history.entries().some((e) => e.action === "infotainment_play")).toBe(false);

    prefs = recomputePreferences(prefs, history.entries());
    expect(prefs.likesMusic).toBe(true);
  });

  it("lists actions seen at least twice as common", () => {
    const prefs = recomputePreferences(createDefaultPreferences(), [
      action("climate_turn_on"),
      action("lights_dim"),
      action("climate_turn_on"),
    ]);
    expect(prefs.commonActions).toEqual(["climate_turn_on"]);
  });

  it("replaces common actions on every call", () => {
    const previous = { ...createDefaultPreferences(), commonActions: ["seats_adjust"] };
    const prefs = recomputePreferences(previous, [
      action("lights_dim"),
      action("lights_dim"),
      action("climate_turn_on"),
    ]);
    expect(prefs.commonActions).toEqual(["lights_dim"]);
  });

  it("does not mutate the previous preferences", () => {
    const previous = createDefaultPreferences();
    recomputePreferences(previous, [
      action("infotainment_play"),
      action("infotainment_play"),
      action("climate_set_temperature", 26),
    ]);
    expect(previous).toEqual(createDefaultPreferences());
  });
});
