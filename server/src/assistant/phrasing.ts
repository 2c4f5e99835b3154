import {
  BREAK_MESSAGES,
  GREETINGS,
  type PhrasedAction,
  STANDALONE_ACTIONS,
  SUGGESTIONS,
} from "@driveassist/shared/phrases";

/** Picks one template out of a non-empty pool. */
export type TemplateChooser = <T>(options: readonly T[]) => T;

export interface Phraser {
  /** Natural-language message for a suggested action. */
  phrase(action: PhrasedAction, value: number | null): string;
  /** Message for the one-off break reminder. */
  breakReminder(): string;
}

export const randomChoice: TemplateChooser = (options) =>
  options[Math.floor(Math.random() * options.length)];

/** Deterministic chooser, always the first template. */
export const firstChoice: TemplateChooser = (options) => options[0];

export function createTemplatePhraser(choose: TemplateChooser = randomChoice): Phraser {
  return {
    phrase(action, value) {
      const template = choose(SUGGESTIONS[action]);
      const suggestion = template.replaceAll("{value}", value === null ? "" : String(value));
      if (STANDALONE_ACTIONS.has(action)) return suggestion;
      return `${choose(GREETINGS)} ${suggestion}`;
    },
    breakReminder() {
      return choose(BREAK_MESSAGES);
    },
  };
}
