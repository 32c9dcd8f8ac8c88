import * as core from "@actions/core";
import { describeError } from "./errors.js";
import { buildMessage } from "./output/telegram.js";
import { rankBest } from "./scoring/ranker.js";
import { update, type BestState } from "./tracker/state.js";
import type { WatchConfig } from "./config.js";
import type { KernelInfo, ScoredKernel } from "./sources/types.js";
import type { StateStore } from "./tracker/store.js";

export type CyclePhase = "fetching" | "evaluating" | "notifying";

export type CycleOutcome =
  | "fetch_failed"
  | "no_score"
  | "unchanged"
  | "improved"
  | "error";

export interface CycleResult {
  state: BestState;
  outcome: CycleOutcome;
  candidate?: ScoredKernel;
  notified: boolean;
}

export interface CycleDeps {
  fetchKernels: (
    competition: string,
    config: WatchConfig
  ) => Promise<KernelInfo[]>;
  notify: (message: string, config: WatchConfig) => Promise<void>;
  store: StateStore;
  now?: () => Date;
  onPhase?: (phase: CyclePhase) => void;
}

export async function runCycle(
  state: BestState,
  config: WatchConfig,
  deps: CycleDeps,
  dryRun: boolean
): Promise<CycleResult> {
  deps.onPhase?.("fetching");
  core.info("Stage 1/3: Fetching public kernels...");
  let kernels: KernelInfo[];
  try {
    kernels = await deps.fetchKernels(config.competition, config);
  } catch (error) {
    core.warning(`Fetching kernels failed: ${describeError(error)}`);
    return { state, outcome: "fetch_failed", notified: false };
  }
  core.info(`  Found ${kernels.length} kernels`);

  deps.onPhase?.("evaluating");
  core.info("Stage 2/3: Ranking kernels...");
  let candidate: ScoredKernel | undefined;
  let next: BestState;
  let improved: boolean;
  try {
    candidate = rankBest(kernels, config.sort_direction);
    const result = update(state, candidate, config.sort_direction, deps.now);
    next = result.state;
    improved = result.isImprovement;
  } catch (error) {
    core.warning(`Ranking kernels failed: ${describeError(error)}`);
    return { state, outcome: "error", notified: false };
  }

  if (!candidate) {
    core.info("  No kernel title carries a parseable score");
    return { state, outcome: "no_score", notified: false };
  }
  core.info(`  Best kernel: "${candidate.title}" (${candidate.score})`);

  if (!improved) {
    core.info(`  No new best score (stored: ${state.score})`);
    return { state, outcome: "unchanged", candidate, notified: false };
  }

  deps.onPhase?.("notifying");
  core.info("Stage 3/3: Sending notification...");
  const message = buildMessage(candidate, state);
  let notified = false;
  if (dryRun) {
    core.info(`  [dry run] Would send:\n${message}`);
  } else {
    try {
      await deps.notify(message, config);
      notified = true;
    } catch (error) {
      // The new best is still committed below; delivery is not retried.
      core.warning(`Notification failed: ${describeError(error)}`);
    }
  }

  try {
    deps.store.save(next);
  } catch (error) {
    core.warning(`Saving the best score failed: ${describeError(error)}`);
  }
  return { state: next, outcome: "improved", candidate, notified };
}
