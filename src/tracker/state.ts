import type { ScoredKernel, SortDirection } from "../sources/types.js";

export interface BestState {
  score?: number;
  kernelIdentifier?: string;
  title?: string;
  updatedAt?: string;
}

export interface UpdateResult {
  state: BestState;
  isImprovement: boolean;
}

export function emptyState(): BestState {
  return {};
}

export function isImprovement(
  current: BestState,
  score: number,
  direction: SortDirection
): boolean {
  if (current.score === undefined) return true;
  return direction === "maximize"
    ? score > current.score
    : score < current.score;
}

/**
 * Compares this cycle's best kernel against the stored best. Equal scores are
 * never an improvement, so a kernel listed again with the same title does not
 * notify twice. The returned state is `current` itself when nothing changed.
 */
export function update(
  current: BestState,
  candidate: ScoredKernel | undefined,
  direction: SortDirection,
  now: () => Date = () => new Date()
): UpdateResult {
  if (!candidate || !isImprovement(current, candidate.score, direction)) {
    return { state: current, isImprovement: false };
  }

  return {
    state: {
      score: candidate.score,
      kernelIdentifier: candidate.identifier,
      title: candidate.title,
      updatedAt: now().toISOString(),
    },
    isImprovement: true,
  };
}
