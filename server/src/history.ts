import { HISTORY_CAPACITY } from "@driveassist/shared/constants";
import type { ActionEvent, ActionName } from "@driveassist/shared/types";

export interface ActionHistory {
  /** Record an event, evicting the oldest once at capacity. */
  append(event: ActionEvent): void;
  /** Last `n` action names, oldest first. */
  recentWindow(n: number): ActionName[];
  /** Every retained event, oldest first. */
  entries(): readonly ActionEvent[];
  readonly size: number;
  readonly capacity: number;
}

/** Read side of a history, for callers that must not record events themselves. */
export type ActionHistoryView = Pick<ActionHistory, "recentWindow" | "entries" | "size" | "capacity">;

export function createActionHistory(capacity = HISTORY_CAPACITY): ActionHistory {
  const events: ActionEvent[] = [];

  return {
    append(event) {
      events.push(event);
      while (events.length > capacity) events.shift();
    },
    recentWindow(n) {
      if (n <= 0) return [];
      return events.slice(-n).map((e) => e.action);
    },
    entries() {
      return [...events];
    },
    get size() {
      return events.length;
    },
    capacity,
  };
}
