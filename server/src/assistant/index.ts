import {
  type Recommendation,
  type RecommendationEnvelope,
  type SessionPhase,
  type SessionStatus,
  TAKE_BREAK,
} from "@driveassist/shared/assistant-types";
import {
  BREAK_REMINDER_MS,
  LEARNING_PERIOD_MS,
  MAX_RECOMMENDATIONS_PER_SESSION,
  MIN_ACTIONS_FOR_LEARNING,
  RECENT_WINDOW_SIZE,
  RECOMMENDATION_INTERVAL_MS,
} from "@driveassist/shared/constants";
import {
  type ActionEvent,
  type CarState,
  type DriverPreferences,
  KNOWN_ACTIONS,
} from "@driveassist/shared/types";
import { applyAction, createDefaultCarState } from "../car-state.js";
import { type ActionHistoryView, createActionHistory } from "../history.js";
import { buildEnvelope, parseActionMessage } from "../messages.js";
import { createDefaultPreferences, recomputePreferences } from "../preferences.js";
import type { Verbalizer } from "./gemini.js";
import { createTemplatePhraser, type Phraser } from "./phrasing.js";
import { createRecommendationEngine, type RecommendationEngine } from "./recommendations.js";
import { createRecommendationLoop, createReminderScheduler } from "./scheduler.js";

export interface AssistantTiming {
  learningPeriodMs: number;
  breakReminderMs: number;
  recommendationIntervalMs: number;
  maxRecommendations: number;
}

export interface AssistantOptions {
  /** Sends an envelope on vehicle/recommendations. Rejections are logged, never retried. */
  publish: (envelope: RecommendationEnvelope) => Promise<void>;
  timing?: Partial<AssistantTiming>;
  phraser?: Phraser;
  engine?: RecommendationEngine;
  /** Optional rewording applied to messages just before publishing. */
  verbalizer?: Verbalizer;
  /** Called for every accepted inbound action. */
  onAction?: (event: ActionEvent) => void;
  /** Called after an envelope was published successfully. */
  onPublish?: (envelope: RecommendationEnvelope) => void;
  now?: () => Date;
}

export interface DriveAssistant {
  /** Decode and ingest a raw vehicle/actions payload. Returns false if it was discarded. */
  handleMessage(payload: Buffer | string): boolean;
  /** Record an action: history, car state, then preferences. Starts learning on the first one. */
  ingest(event: ActionEvent): void;
  /** Learning-timer expiry. Moves learning → active and starts the recommendation loop. */
  completeLearning(): void;
  /** Break-reminder expiry. Sends at most once per session. */
  fireBreakReminder(): boolean;
  /** One generation pass while active; publishes and counts it when anything is eligible. */
  runRecommendationCycle(): Recommendation[];
  getStatus(): SessionStatus;
  /** Cancel every pending timer. Further input is ignored. */
  stop(): void;
  readonly phase: SessionPhase;
  readonly carState: CarState;
  readonly preferences: DriverPreferences;
  readonly history: ActionHistoryView;
}

const DEFAULT_TIMING: AssistantTiming = {
  learningPeriodMs: LEARNING_PERIOD_MS,
  breakReminderMs: BREAK_REMINDER_MS,
  recommendationIntervalMs: RECOMMENDATION_INTERVAL_MS,
  maxRecommendations: MAX_RECOMMENDATIONS_PER_SESSION,
};

const knownActions: ReadonlySet<string> = new Set(KNOWN_ACTIONS);

export function createDriveAssistant(options: AssistantOptions): DriveAssistant {
  const timing: AssistantTiming = { ...DEFAULT_TIMING, ...options.timing };
  const now = options.now ?? (() => new Date());
  const phraser = options.phraser ?? createTemplatePhraser();
  const engine = options.engine ?? createRecommendationEngine(phraser);

  // Session state. Every write happens synchronously inside one of the handlers below,
  // so the event loop never interleaves two of them.
  let phase: SessionPhase = "idle";
  let startedAt: Date | null = null;
  let carState = createDefaultCarState();
  let preferences = createDefaultPreferences();
  const history = createActionHistory();
  let actionsProcessed = 0;
  let recommendationsSent = 0;
  let lastRecommendationAt: Date | null = null;
  let breakReminderSent = false;
  let learningTimer: NodeJS.Timeout | null = null;
  let stopped = false;

  const reminder = createReminderScheduler({
    delayMs: timing.breakReminderMs,
    onFire: () => {
      breakReminderSent = true;
      const message = phraser.breakReminder();
      console.log(`[Assistant] 🛑 Break reminder: ${message}`);
      void deliver([{ action: TAKE_BREAK, message, value: null }]);
    },
  });

  const loop = createRecommendationLoop({
    intervalMs: timing.recommendationIntervalMs,
    lastSentAt: () => lastRecommendationAt?.getTime() ?? null,
    canContinue: () =>
      !stopped && phase === "active" && recommendationsSent < timing.maxRecommendations,
    runCycle: () => {
      runRecommendationCycle();
    },
    now: () => now().getTime(),
  });

  async function deliver(recommendations: Recommendation[]): Promise<void> {
    try {
      const phrased = options.verbalizer
        ? await options.verbalizer.verbalize(recommendations)
        : recommendations;
      const envelope = buildEnvelope(phrased, now());
      await options.publish(envelope);
      notifyPublished(envelope);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Assistant] Failed to publish recommendations: ${message}`);
    }
  }

  function notifyPublished(envelope: RecommendationEnvelope): void {
    try {
      options.onPublish?.(envelope);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Assistant] Publish listener failed: ${message}`);
    }
  }

  function startLearning(): void {
    phase = "learning";
    startedAt = now();
    console.log(
      `[Assistant] 🧠 Learning started, recommendations begin in ${timing.learningPeriodMs / 1000}s`,
    );
    learningTimer = setTimeout(() => {
      learningTimer = null;
      completeLearning();
    }, timing.learningPeriodMs);
    reminder.arm();
  }

  function completeLearning(): void {
    if (stopped || phase !== "learning") return;
    if (learningTimer) clearTimeout(learningTimer);
    learningTimer = null;
    phase = "active";
    console.log("[Assistant] 🎓 Learning complete, recommendations enabled");
    loop.start();
  }

  function ingest(event: ActionEvent): void {
    if (stopped) return;

    history.append(event);
    carState = applyAction(carState, event.action, event.value);
    actionsProcessed++;

    if (!knownActions.has(event.action)) {
      console.log(`[Assistant] Unknown action "${event.action}" recorded without state change`);
    }
    options.onAction?.(event);

    if (phase === "idle") startLearning();

    if (history.size >= MIN_ACTIONS_FOR_LEARNING) {
      preferences = recomputePreferences(preferences, history.entries());
    }
  }

  function handleMessage(payload: Buffer | string): boolean {
    const event = parseActionMessage(payload, now());
    if (!event) {
      console.error("[Assistant] Discarding malformed action payload");
      return false;
    }
    console.log(`[Assistant] 🚗 Action: ${event.action}${event.value !== null ? ` (${event.value})` : ""}`);
    ingest(event);
    return true;
  }

  function runRecommendationCycle(): Recommendation[] {
    if (stopped || phase !== "active" || recommendationsSent >= timing.maxRecommendations) return [];

    const recommendations = engine.generate({
      carState: { ...carState },
      preferences: { ...preferences, commonActions: [...preferences.commonActions] },
      recentActions: history.recentWindow(RECENT_WINDOW_SIZE),
      now: now(),
    });
    if (recommendations.length === 0) return recommendations;

    recommendationsSent++;
    lastRecommendationAt = now();
    console.log(
      `[Assistant] 🤖 Recommendation #${recommendationsSent}: ${recommendations.map((r) => r.action).join(", ")}`,
    );
    void deliver(recommendations);
    return recommendations;
  }

  function getStatus(): SessionStatus {
    return {
      phase,
      startedAt: startedAt?.toISOString() ?? null,
      durationMs: startedAt ? now().getTime() - startedAt.getTime() : 0,
      actionsProcessed,
      historySize: history.size,
      recommendationsSent,
      lastRecommendationAt: lastRecommendationAt?.toISOString() ?? null,
      breakReminderSent,
      carState: { ...carState },
      preferences: { ...preferences, commonActions: [...preferences.commonActions] },
    };
  }

  function stop(): void {
    if (stopped) return;
    stopped = true;
    if (learningTimer) clearTimeout(learningTimer);
    learningTimer = null;
    reminder.cancel();
    loop.stop();
  }

  return {
    handleMessage,
    ingest,
    completeLearning,
    fireBreakReminder: () => (stopped ? false : reminder.fire()),
    runRecommendationCycle,
    getStatus,
    stop,
    get phase() {
      return phase;
    },
    get carState() {
      return { ...carState };
    },
    get preferences() {
      return { ...preferences, commonActions: [...preferences.commonActions] };
    },
    history: {
      recentWindow: (n) => history.recentWindow(n),
      entries: () => history.entries(),
      get size() {
        return history.size;
      },
      capacity: history.capacity,
    },
  };
}
