import { clampInt, isAbortError, sleep } from "../async";
import {
  ArtifactNotReadyError,
  AttemptTimeoutError,
  GenerationServiceError,
  classifyFailure,
  isThrottleError,
  toErrorMessage,
} from "../errors";
import type { GenerationClientAdapter, GenerationHandle, GenerationRequest, GenerationResult } from "../generation/types";
import { createLogger } from "../logger";
import { scoreArtifact } from "../scoring/gate";
import type { ConsistencyScorer } from "../scoring/types";
import type { ConsistencyBaseline } from "../style/record";
import { composePrompt, lockedStyleRef } from "../style/lockedStyle";
import type { LockedStyleConfig } from "../style/types";
import { BatchAggregator, type BatchRunHeader } from "./aggregate";
import { DEFAULT_MAX_ATTEMPTS, RetryController, type AttemptOutcome, type RetryPolicy } from "./retryPolicy";
import type { AttemptRecord, BatchRun, BatchThresholds, GenerationJob, JobSpec } from "./types";
import { parseJobSpecs, parseThresholds } from "./validation";

const log = createLogger("scheduler");

export const DEFAULT_MAX_CONCURRENCY = 5;
export const MAX_CONCURRENCY_LIMIT = 32;
export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const MAX_POLL_INTERVAL_MS = 30_000;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_SCORING_RETRIES = 2;
export const DEFAULT_SCORING_RETRY_DELAY_MS = 500;
export const CANCELLED_JOB_ERROR = "Batch cancelled";

// poll interval grows by this factor every POLL_BACKOFF_EVERY polls
const POLL_BACKOFF_FACTOR = 1.2;
const POLL_BACKOFF_EVERY = 10;

export type StartBatchRunInput = {
  batchId?: string;
  jobs: JobSpec[];
  config: LockedStyleConfig;
  baseline: ConsistencyBaseline;
  adapter: GenerationClientAdapter;
  scorer: ConsistencyScorer;
  thresholds?: Partial<BatchThresholds>;
  maxConcurrency?: number;
  maxAttempts?: number;
  maxScoringRetries?: number;
  scoringRetryDelayMs?: number;
  attemptTimeoutMs?: number;
  pollIntervalMs?: number;
  maxPollIntervalMs?: number;
  retryPolicy?: Partial<Omit<RetryPolicy, "perAssetThreshold">>;
  signal?: AbortSignal;
  onState?: (run: BatchRun) => void;
};

export type BatchRunHandle = {
  batchId: string;
  done: Promise<BatchRun>;
  cancel: () => void;
  getState: () => BatchRun;
};

function retryAfterMsFromUnknown(error: unknown): number | null {
  if (error instanceof GenerationServiceError && typeof error.retryAfterSeconds === "number" && error.retryAfterSeconds > 0) {
    return error.retryAfterSeconds * 1000;
  }
  return null;
}

function createBatchId() {
  return `batch-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

/** `<batchId>-NNN` by position, suffixed when a caller already took that id. */
function assignJobIds(batchId: string, specs: JobSpec[]): Array<JobSpec & { jobId: string }> {
  const taken = new Set<string>();
  for (const spec of specs) {
    if (spec.jobId) taken.add(spec.jobId);
  }
  return specs.map((spec, index) => {
    if (spec.jobId) return { ...spec, jobId: spec.jobId };
    const base = `${batchId}-${String(index + 1).padStart(3, "0")}`;
    let jobId = base;
    for (let suffix = 2; taken.has(jobId); suffix += 1) jobId = `${base}-${suffix}`;
    taken.add(jobId);
    return { ...spec, jobId };
  });
}

async function withAttemptTimeout<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs every job of a batch against one locked style config with at most
 * `maxConcurrency` attempts in flight. Validation errors throw synchronously;
 * `done` always resolves with the final report.
 */
export function startBatchRun(input: StartBatchRunInput): BatchRunHandle {
  const specs = parseJobSpecs(input.jobs);
  const thresholds = parseThresholds(input.thresholds ?? {});
  const config = input.config;
  const configRef = lockedStyleRef(config);
  const maxConcurrency = clampInt(input.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY, 1, MAX_CONCURRENCY_LIMIT);
  const maxAttempts = clampInt(input.maxAttempts ?? DEFAULT_MAX_ATTEMPTS, 1, 10);
  const maxScoringRetries = clampInt(input.maxScoringRetries ?? DEFAULT_MAX_SCORING_RETRIES, 0, 10);
  const scoringRetryDelayMs = clampInt(input.scoringRetryDelayMs ?? DEFAULT_SCORING_RETRY_DELAY_MS, 0, 60_000);
  const attemptTimeoutMs = clampInt(input.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS, 1, 3_600_000);
  const maxPollIntervalMs = clampInt(input.maxPollIntervalMs ?? MAX_POLL_INTERVAL_MS, 1, 600_000);
  const basePollIntervalMs = clampInt(input.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS, 1, maxPollIntervalMs);
  const retry = new RetryController({ ...input.retryPolicy, perAssetThreshold: thresholds.perAsset });
  const { adapter, scorer, baseline } = input;

  const abortController = new AbortController();
  const signal = abortController.signal;
  if (input.signal) {
    if (input.signal.aborted) {
      abortController.abort();
    } else {
      input.signal.addEventListener("abort", () => abortController.abort(), { once: true });
    }
  }

  const batchId = input.batchId ?? createBatchId();
  const startedAt = Date.now();
  const jobs: GenerationJob[] = assignJobIds(batchId, specs).map((spec) => ({
    jobId: spec.jobId,
    category: spec.category,
    prompt: spec.prompt,
    lockedConfigRef: configRef,
    attemptCount: 0,
    maxAttempts,
    status: "PENDING",
    attempts: [],
    scores: [],
    readyAt: startedAt,
  }));

  const header: BatchRunHeader = {
    batchId,
    projectId: config.projectId,
    lockedConfigRef: configRef,
    lockedConfig: config,
    thresholds,
    maxConcurrency,
    cancelled: false,
    startedAt,
  };
  const aggregator = new BatchAggregator(jobs);
  const queue: GenerationJob[] = [...jobs];
  let inFlight = 0;

  const onState = input.onState;
  const getState = () => aggregator.report(header);
  const notifyState = (run: BatchRun) => {
    if (!onState) return;
    try {
      onState(run);
    } catch (error) {
      log.error(`Batch ${batchId} onState listener failed`, error);
    }
  };
  const emit = (job?: GenerationJob) => {
    if (job) aggregator.publish(job);
    if (onState) notifyState(getState());
  };

  const waiters = new Set<() => void>();
  const notifyWorkers = () => {
    for (const wake of [...waiters]) wake();
  };
  const waitForWork = (ms: number | null) =>
    new Promise<void>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const wake = () => {
        clearTimeout(timer);
        waiters.delete(wake);
        signal.removeEventListener("abort", wake);
        resolve();
      };
      waiters.add(wake);
      signal.addEventListener("abort", wake, { once: true });
      if (ms != null) timer = setTimeout(wake, ms);
    });

  const takeReadyJob = (): GenerationJob | null => {
    const now = Date.now();
    const index = queue.findIndex((job) => job.readyAt <= now);
    if (index < 0) return null;
    const [job] = queue.splice(index, 1);
    return job;
  };

  const withThrottleBackoff = async <T>(
    record: AttemptRecord,
    attemptSignal: AbortSignal,
    operation: () => Promise<T>,
  ): Promise<T> => {
    let consecutive = 0;
    while (true) {
      try {
        return await operation();
      } catch (error) {
        if (!isThrottleError(error) || record.throttleEvents >= retry.policy.maxThrottleRetries) throw error;
        consecutive += 1;
        record.throttleEvents += 1;
        const delayMs = retry.throttleDelayMs(consecutive, retryAfterMsFromUnknown(error));
        log.debug(`Throttled (${toErrorMessage(error, "throttled")}); backing off ${delayMs}ms`);
        await sleep(delayMs, attemptSignal);
      }
    }
  };

  const awaitArtifact = async (
    handle: GenerationHandle,
    record: AttemptRecord,
    attemptSignal: AbortSignal,
  ): Promise<GenerationResult> => {
    let intervalMs = basePollIntervalMs;
    let polls = 0;
    while (true) {
      const status = await withThrottleBackoff(record, attemptSignal, () => adapter.poll(handle, attemptSignal));
      if (status.status === "completed") {
        let result: GenerationResult | null = null;
        try {
          result = await withThrottleBackoff(record, attemptSignal, () => adapter.fetch(handle, attemptSignal));
        } catch (error) {
          if (!(error instanceof ArtifactNotReadyError)) throw error;
          log.debug(`Artifact for ${handle.jobId} not ready yet; polling again`);
        }
        if (result?.error) {
          throw new GenerationServiceError(`Artifact for ${handle.jobId} reported an error: ${result.error}`, "transient");
        }
        if (result) return result;
      } else if (status.status === "failed") {
        throw new GenerationServiceError(status.error ?? "Generation failed", status.failure ?? "transient");
      }
      polls += 1;
      if (polls % POLL_BACKOFF_EVERY === 0) {
        intervalMs = Math.min(maxPollIntervalMs, Math.round(intervalMs * POLL_BACKOFF_FACTOR));
      }
      await sleep(intervalMs, attemptSignal);
    }
  };

  const executeAttempt = async (job: GenerationJob, record: AttemptRecord): Promise<AttemptOutcome> => {
    const request: GenerationRequest = {
      jobId: job.jobId,
      category: job.category,
      prompt: job.prompt,
      fullPrompt: record.fullPrompt,
      config,
      attempt: record.attempt,
    };

    let result: GenerationResult;
    try {
      result = await withAttemptTimeout(attemptTimeoutMs, async (attemptSignal) => {
        const handle = await withThrottleBackoff(record, attemptSignal, () => adapter.submit(request, attemptSignal));
        return awaitArtifact(handle, record, attemptSignal);
      });
    } catch (error) {
      return {
        kind: "service_error",
        failure: classifyFailure(error),
        error: toErrorMessage(error, "Generation failed"),
        retryAfterMs: retryAfterMsFromUnknown(error),
      };
    }
    record.result = result;

    const scored = await scoreArtifact(scorer, result, baseline, {
      threshold: thresholds.perAsset,
      maxScoringRetries,
      retryDelayMs: scoringRetryDelayMs,
    });
    record.scoringCalls = scored.scoringCalls;
    if (!scored.ok) return { kind: "scoring_exhausted", result, error: scored.error };
    return { kind: "scored", result, score: scored.score };
  };

  const finishJob = (job: GenerationJob, status: GenerationJob["status"], error?: string) => {
    job.status = status;
    job.lastError = error;
    job.finishedAt = Date.now();
  };

  const runAttempt = async (job: GenerationJob) => {
    job.status = "IN_FLIGHT";
    job.attemptCount += 1;
    job.startedAt ??= Date.now();
    const record: AttemptRecord = {
      attempt: job.attemptCount,
      configRef,
      fullPrompt: composePrompt(job.prompt, config),
      startedAt: Date.now(),
      throttleEvents: 0,
      scoringCalls: 0,
    };
    job.attempts.push(record);
    inFlight += 1;
    emit(job);
    log.debug(`Job ${job.jobId} attempt ${record.attempt}/${job.maxAttempts} started`);

    let outcome: AttemptOutcome;
    try {
      outcome = await executeAttempt(job, record);
    } catch (error) {
      log.error(`Job ${job.jobId} attempt ${record.attempt} crashed`, error);
      outcome = { kind: "service_error", failure: "permanent", error: toErrorMessage(error, "Attempt failed"), retryAfterMs: null };
    } finally {
      inFlight -= 1;
    }

    const disposition = retry.decide(job, outcome);
    record.finishedAt = Date.now();
    record.outcome = disposition.status;
    if (outcome.kind === "scored") {
      record.score = outcome.score;
      job.scores.push(outcome.score);
    }

    if (disposition.action === "accept") {
      if (outcome.kind === "scored") job.acceptedScore = outcome.score;
      finishJob(job, "SUCCEEDED");
      log.debug(`Job ${job.jobId} succeeded on attempt ${record.attempt}`);
    } else {
      record.error = disposition.reason;
      if (disposition.action === "fail") {
        finishJob(job, disposition.status, disposition.reason);
        log.warn(`Job ${job.jobId} failed (${disposition.status}): ${disposition.reason}`);
      } else if (signal.aborted) {
        finishJob(job, "FAILED_PERMANENT", `${CANCELLED_JOB_ERROR} after: ${disposition.reason}`);
      } else {
        job.status = "PENDING";
        job.lastError = disposition.reason;
        job.readyAt = Date.now() + disposition.delayMs;
        queue.push(job);
        log.warn(
          `Job ${job.jobId} attempt ${record.attempt} ${disposition.status}: ${disposition.reason}; retrying in ${disposition.delayMs}ms`,
        );
      }
    }
    emit(job);
    notifyWorkers();
  };

  const workerLoop = async () => {
    while (!signal.aborted) {
      const job = takeReadyJob();
      if (job) {
        await runAttempt(job);
        continue;
      }
      if (queue.length === 0 && inFlight === 0) {
        notifyWorkers();
        return;
      }
      const nextReadyAt = queue.length > 0 ? Math.min(...queue.map((queued) => queued.readyAt)) : null;
      await waitForWork(nextReadyAt == null ? null : Math.max(1, nextReadyAt - Date.now()));
    }
  };

  const done = (async (): Promise<BatchRun> => {
    log.info(`Batch ${batchId} started: ${jobs.length} jobs, ${configRef}, concurrency ${maxConcurrency}`);
    emit();
    try {
      const workers = Array.from({ length: Math.min(maxConcurrency, jobs.length) }, () => workerLoop());
      await Promise.all(workers);
    } catch (error) {
      if (!isAbortError(error)) log.error(`Batch ${batchId} worker failed`, error);
    }

    for (const job of queue.splice(0)) {
      finishJob(job, "FAILED_PERMANENT", job.lastError ? `${CANCELLED_JOB_ERROR} after: ${job.lastError}` : CANCELLED_JOB_ERROR);
      aggregator.publish(job);
    }
    header.cancelled = signal.aborted;
    header.completedAt = Date.now();
    const report = getState();
    notifyState(report);
    log.info(
      `Batch ${batchId} ${report.status}: ${report.summary.byStatus.SUCCEEDED}/${report.summary.total} succeeded, aggregate ${
        report.aggregateScore == null ? "n/a" : report.aggregateScore.toFixed(2)
      }`,
    );
    return report;
  })();

  return {
    batchId,
    done,
    cancel: () => {
      abortController.abort();
    },
    getState,
  };
}
