import type { FailureKind } from "../errors";
import type { GenerationResult } from "../generation/types";
import type { ConsistencyScore } from "../scoring/types";
import type { GenerationJob } from "./types";

export const DEFAULT_PER_ASSET_THRESHOLD = 8.5;
export const DEFAULT_BATCH_THRESHOLD = 9.0;
export const DEFAULT_MAX_ATTEMPTS = 3;

export type RetryPolicy = {
  perAssetThreshold: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  throttleBaseDelayMs: number;
  throttleMaxDelayMs: number;
  maxThrottleRetries: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  perAssetThreshold: DEFAULT_PER_ASSET_THRESHOLD,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 15_000,
  throttleBaseDelayMs: 1_000,
  throttleMaxDelayMs: 30_000,
  maxThrottleRetries: 5,
};

export type AttemptOutcome =
  | { kind: "scored"; result: GenerationResult; score: ConsistencyScore }
  | { kind: "service_error"; failure: FailureKind; error: string; retryAfterMs: number | null }
  | { kind: "scoring_exhausted"; result: GenerationResult; error: string };

// No variant carries parameters: a retry always reuses the job's locked config and prompt.
export type Disposition =
  | { action: "accept"; status: "SUCCEEDED" }
  | { action: "retry"; status: "FAILED_TRANSIENT" | "FAILED_CONSISTENCY"; delayMs: number; reason: string }
  | { action: "fail"; status: "FAILED_PERMANENT" | "FAILED_CONSISTENCY"; reason: string };

type AttemptBudget = Pick<GenerationJob, "attemptCount" | "maxAttempts">;

function formatScore(value: number) {
  return value.toFixed(2);
}

export class RetryController {
  readonly policy: RetryPolicy;

  constructor(policy: Partial<RetryPolicy> = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
  }

  decide(job: AttemptBudget, outcome: AttemptOutcome): Disposition {
    const attemptsLeft = job.attemptCount < job.maxAttempts;

    if (outcome.kind === "service_error") {
      if (outcome.failure === "permanent") {
        return { action: "fail", status: "FAILED_PERMANENT", reason: outcome.error };
      }
      if (!attemptsLeft) {
        return {
          action: "fail",
          status: "FAILED_PERMANENT",
          reason: `${outcome.error} (gave up after ${job.attemptCount} attempts)`,
        };
      }
      return {
        action: "retry",
        status: "FAILED_TRANSIENT",
        delayMs: this.transientRetryDelayMs(job.attemptCount, outcome.retryAfterMs),
        reason: outcome.error,
      };
    }

    if (outcome.kind === "scoring_exhausted") {
      return { action: "fail", status: "FAILED_PERMANENT", reason: `Scoring failed: ${outcome.error}` };
    }

    const { score } = outcome;
    if (score.score >= this.policy.perAssetThreshold) {
      return { action: "accept", status: "SUCCEEDED" };
    }
    const reason = `Consistency ${formatScore(score.score)} below ${formatScore(this.policy.perAssetThreshold)}`;
    if (!attemptsLeft) {
      return { action: "fail", status: "FAILED_CONSISTENCY", reason };
    }
    return { action: "retry", status: "FAILED_CONSISTENCY", delayMs: 0, reason };
  }

  transientRetryDelayMs(attempt: number, retryAfterMs: number | null) {
    if (retryAfterMs != null && retryAfterMs > 0) return Math.min(this.policy.retryMaxDelayMs, retryAfterMs);
    return Math.min(this.policy.retryMaxDelayMs, this.policy.retryBaseDelayMs * 2 ** Math.max(0, attempt - 1));
  }

  /** Backoff before resubmitting after the n-th consecutive throttle event (n >= 1). */
  throttleDelayMs(consecutiveThrottles: number, retryAfterMs: number | null) {
    if (retryAfterMs != null && retryAfterMs > 0) return Math.min(this.policy.throttleMaxDelayMs, retryAfterMs);
    return Math.min(
      this.policy.throttleMaxDelayMs,
      this.policy.throttleBaseDelayMs * 2 ** Math.max(0, consecutiveThrottles - 1),
    );
  }
}
