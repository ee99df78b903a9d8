// worldcore/core/Heartbeat.ts

import { Logger } from "../utils/logger";
import { Minute, MIN_HEARTBEAT_MS } from "../config/time";

export interface HeartbeatConfig {
  periodMs: number; // fixed cadence, also the phase grid for the first beat

  /** Clock used for phase alignment and deltas. Defaults to Date.now. */
  now?: () => number;
}

export interface HeartbeatBeat {
  beat: number; // 1-based
  nowMs: number;
  /**
   * Time since the previous beat. The first beat reports one full period,
   * so delta-driven logic behaves as if a beat had happened just before.
   */
  deltaMs: number;
}

export type HeartbeatCallback = (beat: HeartbeatBeat) => void | Promise<void>;

export type HeartbeatState = "uninitialized" | "scheduled" | "ticking" | "stopped";

/**
 * Delay until the next wall-clock multiple of periodMs. A clock sitting
 * exactly on a boundary waits a whole period.
 */
export function computeInitialDelay(nowMs: number, periodMs: number): number {
  return periodMs - (nowMs % periodMs);
}

/**
 * HeartbeatScheduler
 *
 * Responsibilities:
 *  - Fire one callback per period, phase-aligned to the wall clock
 *  - Contain callback failures so the next beat still fires
 *  - Report overruns and a periodic summary
 *
 * It does NOT:
 *  - Prevent overlapping beats (callers that share state serialize on their own lock)
 *  - Pause or resume; stop() is for teardown
 */
export class HeartbeatScheduler {
  private readonly log = Logger.scope("HEARTBEAT");
  private readonly periodMs: number;
  private readonly now: () => number;
  private readonly summaryEvery: number;

  private state: HeartbeatState = "uninitialized";
  private startTimer: NodeJS.Timeout | null = null;
  private interval: NodeJS.Timeout | null = null;
  private callback: HeartbeatCallback | null = null;

  private beatCount = 0;
  private failures = 0;
  private overruns = 0;
  private lastBeatAt: number | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(cfg: HeartbeatConfig) {
    this.periodMs = Math.max(Math.floor(cfg.periodMs), MIN_HEARTBEAT_MS);
    this.now = cfg.now ?? Date.now;
    this.summaryEvery = Math.max(1, Math.round(Minute / this.periodMs));
  }

  get status(): HeartbeatState {
    return this.state;
  }

  get beats(): number {
    return this.beatCount;
  }

  get failureCount(): number {
    return this.failures;
  }

  get overrunCount(): number {
    return this.overruns;
  }

  get period(): number {
    return this.periodMs;
  }

  start(callback: HeartbeatCallback): void {
    if (this.state !== "uninitialized") {
      this.log.warn("Heartbeat already started; ignoring start()", { state: this.state });
      return;
    }

    this.callback = callback;
    const delayMs = computeInitialDelay(this.now(), this.periodMs);

    this.log.info("Starting heartbeat", {
      periodMs: this.periodMs,
      firstBeatInMs: delayMs,
    });

    this.state = "scheduled";
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      if (this.state === "stopped") return;

      this.interval = setInterval(() => this.fire(), this.periodMs);
      this.interval.unref();
      this.fire();
    }, delayMs);
    this.startTimer.unref();
  }

  /**
   * Clears the timers and resolves once the beat in flight (if any) has
   * settled. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.state !== "stopped") {
      if (this.startTimer) {
        clearTimeout(this.startTimer);
        this.startTimer = null;
      }
      if (this.interval) {
        clearInterval(this.interval);
        this.interval = null;
      }

      this.state = "stopped";
      this.log.info("Heartbeat stopped", {
        beats: this.beatCount,
        failures: this.failures,
        overruns: this.overruns,
      });
    }

    await Promise.all(this.inFlight);
  }

  private fire(): void {
    const callback = this.callback;
    if (this.state === "stopped" || !callback) return;

    this.state = "ticking";
    this.beatCount++;

    const nowMs = this.now();
    const deltaMs = this.lastBeatAt !== null ? nowMs - this.lastBeatAt : this.periodMs;
    this.lastBeatAt = nowMs;

    // runBeat never rejects; stop() waits on whatever is still in this set.
    const running = this.runBeat(callback, { beat: this.beatCount, nowMs, deltaMs });
    this.inFlight.add(running);
    void running.then(() => {
      this.inFlight.delete(running);
    });
  }

  private async runBeat(callback: HeartbeatCallback, beat: HeartbeatBeat): Promise<void> {
    try {
      await callback(beat);
    } catch (err) {
      this.failures++;
      this.log.error("Heartbeat callback failed", { beat: beat.beat, err });
    }

    const tookMs = this.now() - beat.nowMs;
    if (tookMs > this.periodMs) {
      this.overruns++;
      this.log.warn("Heartbeat overran its period", {
        beat: beat.beat,
        tookMs,
        periodMs: this.periodMs,
      });
    }

    if (beat.beat % this.summaryEvery === 0) {
      this.log.debug("Heartbeat summary", {
        beat: beat.beat,
        failures: this.failures,
        overruns: this.overruns,
        lastDeltaMs: beat.deltaMs,
      });
    }
  }
}
