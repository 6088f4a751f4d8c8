import { isAbortError, sleep } from "../async";
import { ScoringUnavailableError, toErrorMessage } from "../errors";
import type { GenerationResult } from "../generation/types";
import { createLogger } from "../logger";
import type { ConsistencyBaseline } from "../style/record";
import type { ConsistencyScore, ConsistencyScorer } from "./types";

const log = createLogger("scoring");

export const MAX_SCORE = 10;

export type ScoreArtifactOptions = {
  threshold: number;
  maxScoringRetries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
};

export type ScoreArtifactResult =
  | { ok: true; score: ConsistencyScore; scoringCalls: number }
  | { ok: false; error: string; scoringCalls: number };

export function clampScore(value: number) {
  return Math.max(0, Math.min(MAX_SCORE, value));
}

export function buildConsistencyScore(
  jobId: string,
  rawScore: number,
  baseline: ConsistencyBaseline,
  threshold: number,
): ConsistencyScore {
  const score = clampScore(rawScore);
  return Object.freeze({
    jobId,
    score,
    baselineRef: baseline.baselineRef,
    thresholdUsed: threshold,
    passed: score >= threshold,
  });
}

/**
 * Scores one artifact. Scorer failures are retried here with their own budget so
 * they never consume generation attempts; only an abort propagates.
 */
export async function scoreArtifact(
  scorer: ConsistencyScorer,
  artifact: GenerationResult,
  baseline: ConsistencyBaseline,
  options: ScoreArtifactOptions,
): Promise<ScoreArtifactResult> {
  const maxCalls = options.maxScoringRetries + 1;
  let lastError: unknown = null;
  for (let call = 1; call <= maxCalls; call++) {
    try {
      const raw = await scorer.score(artifact, baseline, options.signal);
      if (!Number.isFinite(raw)) {
        throw new ScoringUnavailableError(`Scorer returned a non-numeric score for ${artifact.jobId}`);
      }
      return { ok: true, score: buildConsistencyScore(artifact.jobId, raw, baseline, options.threshold), scoringCalls: call };
    } catch (error) {
      if (isAbortError(error)) throw error;
      lastError = error;
      log.warn(
        `Scoring unavailable for ${artifact.jobId} (call ${call}/${maxCalls}): ${toErrorMessage(error, "unknown error")}`,
      );
      if (call < maxCalls) {
        await sleep(options.retryDelayMs, options.signal);
      }
    }
  }
  return { ok: false, error: toErrorMessage(lastError, "Scoring unavailable"), scoringCalls: maxCalls };
}
