export interface KernelInfo {
  title: string;
  identifier: string;
  author?: string;
  url?: string;
}

export interface ScoredKernel extends KernelInfo {
  score: number;
}

export type SortDirection = "maximize" | "minimize";
