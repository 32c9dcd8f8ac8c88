import { setTimeout as delay } from "node:timers/promises";
import * as core from "@actions/core";
import { describeError } from "./errors.js";
import {
  runCycle,
  type CycleDeps,
  type CyclePhase,
  type CycleResult,
} from "./pipeline.js";
import type { WatchConfig } from "./config.js";
import type { BestState } from "./tracker/state.js";

export type PollerPhase = "idle" | CyclePhase | "sleeping" | "stopped";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollerOptions {
  deps: CycleDeps;
  dryRun?: boolean;
  sleep?: SleepFn;
}

export interface RunOptions {
  maxCycles?: number;
}

// Node timers overflow past a signed 32-bit millisecond count and fire
// after 1 ms instead.
const MAX_TIMER_MS = 2 ** 31 - 1;

type DelayFn = (ms: number, signal: AbortSignal) => Promise<void>;

const timerDelay: DelayFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export async function chunkedSleep(
  ms: number,
  signal: AbortSignal,
  delayFn: DelayFn = timerDelay
): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await delayFn(chunk, signal);
    remaining -= chunk;
  }
}

const defaultSleep: SleepFn = (ms, signal) => chunkedSleep(ms, signal);

/**
 * Runs poll cycles one after another, sleeping a fixed interval after each
 * cycle's work. Owns the best state between cycles; a failing cycle leaves it
 * untouched and never ends the loop.
 */
export class Poller {
  private state: BestState;
  private currentPhase: PollerPhase = "idle";
  private readonly controller = new AbortController();

  constructor(
    private readonly config: WatchConfig,
    private readonly options: PollerOptions
  ) {
    this.state = options.deps.store.load();
  }

  get phase(): PollerPhase {
    return this.currentPhase;
  }

  get bestState(): BestState {
    return this.state;
  }

  async pollOnce(): Promise<CycleResult> {
    const deps: CycleDeps = {
      ...this.options.deps,
      onPhase: (phase) => {
        this.currentPhase = phase;
        this.options.deps.onPhase?.(phase);
      },
    };

    try {
      const result = await runCycle(
        this.state,
        this.config,
        deps,
        this.options.dryRun ?? false
      );
      this.state = result.state;
      return result;
    } catch (error) {
      core.warning(`Poll cycle failed: ${describeError(error)}`);
      return { state: this.state, outcome: "error", notified: false };
    }
  }

  async run(options: RunOptions = {}): Promise<number> {
    const sleep = this.options.sleep ?? defaultSleep;
    const signal = this.controller.signal;
    const intervalMs = this.config.poll_interval_seconds * 1000;
    let cycles = 0;

    while (!signal.aborted) {
      await this.pollOnce();
      cycles++;
      if (options.maxCycles !== undefined && cycles >= options.maxCycles) break;
      if (signal.aborted) break;

      this.currentPhase = "sleeping";
      core.info(
        `Waiting ${this.config.poll_interval_seconds} seconds before next check...`
      );
      try {
        await sleep(intervalMs, signal);
      } catch (error) {
        if (!signal.aborted) throw error;
      }
    }

    this.currentPhase = signal.aborted ? "stopped" : "idle";
    return cycles;
  }

  stop(): void {
    this.controller.abort();
    if (this.currentPhase === "idle") {
      this.currentPhase = "stopped";
    }
  }
}
