import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Recommendation } from "@driveassist/shared/assistant-types";

const { generateContent } = vi.hoisted(() => ({ generateContent: vi.fn() }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = { generateContent };
  },
}));

import { createGeminiVerbalizer, parseVerbalizedMessages } from "../src/assistant/gemini.js";

const recommendations: Recommendation[] = [
  { action: "climate_set_temperature", message: "Set 21°C?", value: 21 },
  { action: "infotainment_play", message: "Music?", value: null },
];

describe("parseVerbalizedMessages", () => {
  it("accepts a JSON array of strings", () => {
    expect(parseVerbalizedMessages('[" Warm it to 21°C? ", "Some music?"]')).toEqual([
      "Warm it to 21°C?",
      "Some music?",
    ]);
  });

  it("rejects anything else", () => {
    expect(parseVerbalizedMessages(undefined)).toBeNull();
    expect(parseVerbalizedMessages("Sure!")).toBeNull();
    expect(parseVerbalizedMessages('{"messages":[]}')).toBeNull();
    expect(parseVerbalizedMessages('["ok", 2]')).toBeNull();
    expect(parseVerbalizedMessages('["ok", " "]')).toBeNull();
  });
});

describe("GeminiVerbalizer", () => {
  beforeEach(() => {
    generateContent.mockReset();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("replaces messages and keeps actions and values", async () => {
    generateContent.mockResolvedValue({ text: '["Shall I warm it to 21°C?", "Fancy some music?"]' });
    const verbalizer = createGeminiVerbalizer({ apiKey: "test-secret", model: "gemini-test" });

    await expect(verbalizer.verbalize(recommendations)).resolves.toEqual([
      { action: "climate_set_temperature", message: "Shall I warm it to 21°C?", value: 21 },
      { action: "infotainment_play", message: "Fancy some music?", value: null },
    ]);
    expect(generateContent).toHaveBeenCalledTimes(1);
    expect(generateContent.mock.calls[0][0].model).toBe("gemini-test");
  });

  it("keeps the template messages when the reply does not match", async () => {
    generateContent.mockResolvedValue({ text: '["Only one"]' });
    const verbalizer = createGeminiVerbalizer({ apiKey: "test-secret", model: "gemini-test" });

    await expect(verbalizer.verbalize(recommendations)).resolves.toEqual(recommendations);
  });

  it("keeps the template messages when the request fails", async () => {
    generateContent.mockRejectedValue(new Error("429 RESOURCE_EXHAUSTED"));
    const verbalizer = createGeminiVerbalizer({ apiKey: "test-secret", model: "gemini-test" });

    await expect(verbalizer.verbalize(recommendations)).resolves.toEqual(recommendations);
    expect(console.error).toHaveBeenCalledWith("[Gemini] Rephrasing failed:", "429 RESOURCE_EXHAUSTED");
  });

  it("skips the request when there is nothing to say", async () => {
    const verbalizer = createGeminiVerbalizer({ apiKey: "test-secret", model: "gemini-test" });
    await expect(verbalizer.verbalize([])).resolves.toEqual([]);
    expect(generateContent).not.toHaveBeenCalled();
  });
});
