export type ReminderState = "idle" | "armed" | "fired" | "cancelled";

export interface ReminderOptions {
  delayMs: number;
  /** Runs exactly once, on the first expiry after arming. */
  onFire: () => void;
}

export interface ReminderScheduler {
  /** Start the countdown. Only the first call has any effect. */
  arm(): void;
  /** Expiry signal. Returns true only for the call that actually fired. */
  fire(): boolean;
  /** Drop the pending timer; a fired reminder stays fired. */
  cancel(): void;
  readonly state: ReminderState;
}

export function createReminderScheduler(options: ReminderOptions): ReminderScheduler {
  let state: ReminderState = "idle";
  let timer: NodeJS.Timeout | null = null;

  function clear(): void {
    if (timer) clearTimeout(timer);
    timer = null;
  }

  function fire(): boolean {
    if (state !== "armed") return false;
    state = "fired";
    clear();
    options.onFire();
    return true;
  }

  return {
    arm() {
      if (state !== "idle") return;
      state = "armed";
      timer = setTimeout(fire, options.delayMs);
    },
    fire,
    cancel() {
      clear();
      if (state === "armed" || state === "idle") state = "cancelled";
    },
    get state() {
      return state;
    },
  };
}

export interface RecommendationLoopOptions {
  intervalMs: number;
  /** Epoch ms of the last recommendation sent, or null if none yet. */
  lastSentAt(): number | null;
  /** Checked before every attempt; once false the loop ends for good. */
  canContinue(): boolean;
  /** One generate + publish pass. */
  runCycle(): void;
  now?: () => number;
}

export interface RecommendationLoop {
  start(): void;
  stop(): void;
  readonly running: boolean;
}

export function createRecommendationLoop(options: RecommendationLoopOptions): RecommendationLoop {
  const now = options.now ?? Date.now;
  let running = false;
  let finished = false;
  let timer: NodeJS.Timeout | null = null;

  function schedule(delayMs: number, next: () => void): void {
    timer = setTimeout(() => {
      timer = null;
      next();
    }, delayMs);
  }

  function finish(): void {
    running = false;
    finished = true;
    if (timer) clearTimeout(timer);
    timer = null;
  }

  function attempt(): void {
    if (!running) return;
    if (!options.canContinue()) {
      finish();
      return;
    }
    options.runCycle();
    schedule(options.intervalMs, tick);
  }

  function tick(): void {
    if (!running) return;
    if (!options.canContinue()) {
      finish();
      return;
    }

    // Cooldown catch-up: wait out what is left of the interval since the last send
    const last = options.lastSentAt();
    if (last !== null) {
      const elapsed = now() - last;
      if (elapsed < options.intervalMs) {
        schedule(options.intervalMs - elapsed, attempt);
        return;
      }
    }

    attempt();
  }

  return {
    start() {
      if (running || finished) return;
      running = true;
      tick();
    },
    stop: finish,
    get running() {
      return running;
    },
  };
}
