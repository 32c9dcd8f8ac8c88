import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as core from "@actions/core";
import { z } from "zod";
import { describeError } from "../errors.js";
import { emptyState, type BestState } from "./state.js";

const StoredStateSchema = z.object({
  score: z.number().finite().optional(),
  kernelIdentifier: z.string().optional(),
  title: z.string().optional(),
  updatedAt: z.string().optional(),
});

const LEGACY_SCORE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export interface StateStore {
  load(): BestState;
  save(state: BestState): void;
}

export class MemoryStateStore implements StateStore {
  private state: BestState;

  constructor(initial: BestState = emptyState()) {
    this.state = initial;
  }

  load(): BestState {
    return this.state;
  }

  save(state: BestState): void {
    this.state = state;
  }
}

export function parseStoredState(content: string): BestState {
  const trimmed = content.trim();
  if (trimmed === "") return emptyState();

  // Older deployments kept only the bare score in the file.
  if (LEGACY_SCORE.test(trimmed)) {
    const score = Number(trimmed);
    if (!Number.isFinite(score)) {
      throw new Error(`Stored score is not finite: ${trimmed}`);
    }
    return { score };
  }

  const raw: unknown = JSON.parse(trimmed);
  return StoredStateSchema.parse(raw);
}

export class FileStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  load(): BestState {
    let content: string;
    try {
      content = readFileSync(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        core.info(`No stored best score at ${this.filePath}, starting empty`);
      } else {
        core.warning(
          `Could not read state file "${this.filePath}": ${describeError(error)}`
        );
      }
      return emptyState();
    }

    try {
      return parseStoredState(content);
    } catch (error) {
      core.warning(
        `Ignoring invalid state file "${this.filePath}": ${describeError(error)}`
      );
      return emptyState();
    }
  }

  save(state: BestState): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
    } catch (error) {
      core.warning(
        `Could not save state file "${this.filePath}": ${describeError(error)}`
      );
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Builds a starting state from a previous run's `best_score` / `best_kernel`
 * outputs. Empty score input means no seed.
 */
export function seedFromInputs(
  score: string,
  kernelIdentifier: string
): BestState | undefined {
  const trimmed = score.trim();
  if (trimmed === "") return undefined;

  const value = Number(trimmed);
  if (!LEGACY_SCORE.test(trimmed) || !Number.isFinite(value)) {
    throw new Error(`previous_best_score is not a number: ${trimmed}`);
  }
  return {
    score: value,
    kernelIdentifier: kernelIdentifier.trim() || undefined,
  };
}

/** Falls back to `seed` while the wrapped store holds no score. */
export class SeededStateStore implements StateStore {
  constructor(
    private readonly inner: StateStore,
    private readonly seed: BestState
  ) {}

  load(): BestState {
    const stored = this.inner.load();
    return stored.score === undefined ? this.seed : stored;
  }

  save(state: BestState): void {
    this.inner.save(state);
  }
}
