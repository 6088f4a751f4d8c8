import type { GenerationResult } from "../generation/types";
import type { ConsistencyBaseline } from "../style/record";

export type ConsistencyScore = Readonly<{
  jobId: string;
  // 0..10
  score: number;
  baselineRef: string;
  thresholdUsed: number;
  passed: boolean;
}>;

/**
 * Similarity between an artifact and the approved baseline, 0..10.
 * Must be deterministic for identical inputs; throws ScoringUnavailableError
 * when the baseline cannot be used.
 */
export interface ConsistencyScorer {
  score(artifact: GenerationResult, baseline: ConsistencyBaseline, signal?: AbortSignal): Promise<number>;
}
