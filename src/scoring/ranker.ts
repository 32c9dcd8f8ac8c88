import { parseScore } from "./parser.js";
import type {
  KernelInfo,
  ScoredKernel,
  SortDirection,
} from "../sources/types.js";

export function scoreKernels(kernels: readonly KernelInfo[]): ScoredKernel[] {
  const seen = new Set<string>();
  const scored: ScoredKernel[] = [];

  for (const kernel of kernels) {
    if (seen.has(kernel.identifier)) continue;
    seen.add(kernel.identifier);

    const result = parseScore(kernel.title);
    if (result.found) {
      scored.push({ ...kernel, score: result.score });
    }
  }

  return scored;
}

function beats(
  a: ScoredKernel,
  b: ScoredKernel,
  direction: SortDirection
): boolean {
  if (a.score !== b.score) {
    return direction === "maximize" ? a.score > b.score : a.score < b.score;
  }
  // Ties go to the smallest identifier so the pick does not depend on the
  // order the listing happened to return.
  return a.identifier < b.identifier;
}

export function rankBest(
  kernels: readonly KernelInfo[],
  direction: SortDirection
): ScoredKernel | undefined {
  let best: ScoredKernel | undefined;
  for (const kernel of scoreKernels(kernels)) {
    if (!best || beats(kernel, best, direction)) {
      best = kernel;
    }
  }
  return best;
}

export { beats };
