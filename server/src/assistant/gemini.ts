import type { Recommendation } from "@driveassist/shared/assistant-types";
import { GoogleGenAI } from "@google/genai";

export interface Verbalizer {
  /** Reword recommendation messages. Actions and values are returned untouched. */
  verbalize(recommendations: Recommendation[]): Promise<Recommendation[]>;
}

export interface GeminiVerbalizerConfig {
  apiKey: string;
  model: string;
}

const SYSTEM_INSTRUCTION = `You are a friendly in-car assistant speaking to the driver.
You receive a JSON array of suggestions, each with an action, an optional value and a draft message.
Rewrite every draft message as one short, natural sentence the driver can answer with yes or no.
Keep any number from the draft exactly as written.
Reply with a JSON array of strings only, one per suggestion, in the same order.`;

/** Extract the reworded messages from a model reply. Returns null unless it is a JSON array of strings. */
export function parseVerbalizedMessages(text: string | undefined): string[] | null {
  if (!text) return null;
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  if (!Array.isArray(data)) return null;

  const messages: string[] = [];
  for (const item of data) {
    if (typeof item !== "string" || item.trim().length === 0) return null;
    messages.push(item.trim());
  }
  return messages;
}

export function createGeminiVerbalizer(config: GeminiVerbalizerConfig): Verbalizer {
  const ai = new GoogleGenAI({ apiKey: config.apiKey });

  async function verbalize(recommendations: Recommendation[]): Promise<Recommendation[]> {
    if (recommendations.length === 0) return recommendations;

    try {
      const response = await ai.models.generateContent({
        model: config.model,
        contents: JSON.stringify(
          recommendations.map((r) => ({ action: r.action, value: r.value, message: r.message })),
        ),
        config: {
          systemInstruction: SYSTEM_INSTRUCTION,
          responseMimeType: "application/json",
        },
      });

      const messages = parseVerbalizedMessages(response.text);
      if (!messages || messages.length !== recommendations.length) {
        console.error("[Gemini] Unexpected reply shape, keeping template messages");
        return recommendations;
      }
      return recommendations.map((r, i) => ({ ...r, message: messages[i] }));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error("[Gemini] Rephrasing failed:", message);
      return recommendations;
    }
  }

  return { verbalize };
}
