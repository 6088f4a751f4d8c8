import { z } from "zod";
import { BatchNotFoundError, InvalidParameterError, MissingLockError } from "../errors";
import type { StyleStore } from "../adapters/styleStore";
import type { GenerationClientAdapter } from "../generation/types";
import { createLogger } from "../logger";
import type { ConsistencyScorer } from "../scoring/types";
import { isValidProjectId } from "../style/ids";
import {
  baselineFromRecord,
  configFromRecord,
  parseLockedStyleRecord,
  type LockedStyleRecord,
} from "../style/record";
import { StyleLockRegistry } from "../style/registry";
import type { LockedStyleConfig } from "../style/types";
import { DEFAULT_BATCH_THRESHOLD, DEFAULT_MAX_ATTEMPTS, DEFAULT_PER_ASSET_THRESHOLD, type RetryPolicy } from "./retryPolicy";
import { DEFAULT_MAX_CONCURRENCY, startBatchRun, type BatchRunHandle } from "./scheduler";
import type { BatchRun, BatchRunStatus, BatchThresholds } from "./types";
import { jobSpecsSchema, parseThresholds, thresholdsSchema } from "./validation";

const log = createLogger("orchestrator");

export const submitBatchSchema = z.object({
  projectId: z.string().refine(isValidProjectId, "projectId must be lowercase letters, digits, '-' or '_'"),
  jobs: jobSpecsSchema,
  thresholds: thresholdsSchema.optional(),
  maxConcurrency: z.number().int().min(1).max(32).optional(),
  maxAttempts: z.number().int().min(1).max(10).optional(),
});

export type SubmitBatchRequest = z.input<typeof submitBatchSchema>;

export type BatchDefaults = {
  thresholds: BatchThresholds;
  maxConcurrency: number;
  maxAttempts: number;
  attemptTimeoutMs?: number;
  pollIntervalMs?: number;
  maxScoringRetries?: number;
  scoringRetryDelayMs?: number;
  retryPolicy?: Partial<Omit<RetryPolicy, "perAssetThreshold">>;
};

export type BatchListItem = {
  batchId: string;
  projectId: string;
  lockedConfigRef: string;
  status: BatchRunStatus;
  total: number;
  succeeded: number;
  aggregateScore: number | null;
  cancelled: boolean;
  startedAt: number;
  completedAt?: number;
};

type BatchOrchestratorOptions = {
  store: StyleStore;
  adapter: GenerationClientAdapter;
  scorer: ConsistencyScorer;
  registry?: StyleLockRegistry;
  defaults?: Partial<BatchDefaults>;
  // completed runs kept for reporting before the oldest are dropped
  maxRetainedBatches?: number;
};

const DEFAULTS: BatchDefaults = {
  thresholds: { perAsset: DEFAULT_PER_ASSET_THRESHOLD, batch: DEFAULT_BATCH_THRESHOLD },
  maxConcurrency: DEFAULT_MAX_CONCURRENCY,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
};

function toInvalidParameterError(error: z.ZodError) {
  const issue = error.issues[0];
  const field = issue?.path.map(String).join(".") || undefined;
  return new InvalidParameterError(`Invalid batch request${field ? ` (${field})` : ""}: ${issue?.message ?? "invalid"}`, field);
}

function requireProjectId(projectId: string) {
  if (!isValidProjectId(projectId)) {
    throw new InvalidParameterError(`Invalid projectId "${projectId}"`, "projectId");
  }
}

/**
 * Entry point for callers: resolves a project's approved locked style, runs
 * batches against it and keeps their reports in memory.
 */
export class BatchOrchestrator {
  readonly registry: StyleLockRegistry;
  private readonly store: StyleStore;
  private readonly adapter: GenerationClientAdapter;
  private readonly scorer: ConsistencyScorer;
  private readonly defaults: BatchDefaults;
  private readonly maxRetainedBatches: number;
  private readonly runs = new Map<string, BatchRunHandle>();

  constructor(options: BatchOrchestratorOptions) {
    this.store = options.store;
    this.adapter = options.adapter;
    this.scorer = options.scorer;
    this.registry = options.registry ?? new StyleLockRegistry();
    this.defaults = { ...DEFAULTS, ...options.defaults };
    this.maxRetainedBatches = Math.max(1, options.maxRetainedBatches ?? 100);
  }

  /**
   * Creates and starts a batch. Fails with MissingLockError before any job
   * exists when the project has no approved locked style.
   */
  async submitBatch(request: SubmitBatchRequest): Promise<BatchRun> {
    const parsed = submitBatchSchema.safeParse(request);
    if (!parsed.success) throw toInvalidParameterError(parsed.error);
    const { projectId, jobs } = parsed.data;
    const thresholds = parseThresholds(parsed.data.thresholds ?? {}, this.defaults.thresholds);

    const record = await this.store.getRecord(projectId);
    if (!record || !record.approved) throw new MissingLockError(projectId);
    const config = this.registry.adopt(configFromRecord(projectId, record));
    const baseline = baselineFromRecord(projectId, record);

    const handle = startBatchRun({
      jobs,
      config,
      baseline,
      adapter: this.adapter,
      scorer: this.scorer,
      thresholds,
      maxConcurrency: parsed.data.maxConcurrency ?? this.defaults.maxConcurrency,
      maxAttempts: parsed.data.maxAttempts ?? this.defaults.maxAttempts,
      attemptTimeoutMs: this.defaults.attemptTimeoutMs,
      pollIntervalMs: this.defaults.pollIntervalMs,
      maxScoringRetries: this.defaults.maxScoringRetries,
      scoringRetryDelayMs: this.defaults.scoringRetryDelayMs,
      retryPolicy: this.defaults.retryPolicy,
    });
    this.runs.set(handle.batchId, handle);
    this.pruneCompleted();
    log.info(`Submitted ${handle.batchId} for ${projectId}: ${jobs.length} jobs`);
    return handle.getState();
  }

  getBatchReport(batchId: string): BatchRun | null {
    return this.runs.get(batchId)?.getState() ?? null;
  }

  async awaitCompletion(batchId: string): Promise<BatchRun> {
    return this.requireRun(batchId).done;
  }

  /**
   * Stops dispatching; attempts already in flight finish and are recorded.
   * Returns false when the batch is unknown or already complete.
   */
  cancelBatch(batchId: string): boolean {
    const handle = this.runs.get(batchId);
    if (!handle || handle.getState().completedAt != null) return false;
    handle.cancel();
    return true;
  }

  listBatches(projectId?: string): BatchListItem[] {
    const items: BatchListItem[] = [];
    for (const handle of this.runs.values()) {
      const run = handle.getState();
      if (projectId && run.projectId !== projectId) continue;
      items.push({
        batchId: run.batchId,
        projectId: run.projectId,
        lockedConfigRef: run.lockedConfigRef,
        status: run.status,
        total: run.summary.total,
        succeeded: run.summary.byStatus.SUCCEEDED,
        aggregateScore: run.aggregateScore,
        cancelled: run.cancelled,
        startedAt: run.startedAt,
        completedAt: run.completedAt,
      });
    }
    return items.sort((a, b) => b.startedAt - a.startedAt);
  }

  async getStyleRecord(projectId: string): Promise<LockedStyleRecord | null> {
    requireProjectId(projectId);
    return this.store.getRecord(projectId);
  }

  async listStyleVersions(projectId: string): Promise<number[]> {
    requireProjectId(projectId);
    return this.store.listVersions(projectId);
  }

  /** Persists a first approved style; an existing approved record is never overwritten. */
  async lockStyle(projectId: string, input: unknown): Promise<{ record: LockedStyleRecord; config: LockedStyleConfig | null }> {
    requireProjectId(projectId);
    const record = parseLockedStyleRecord(input);
    // parameters are validated before anything is written
    configFromRecord(projectId, record);
    const saved = await this.store.saveRecord(projectId, record);
    const config = saved.approved ? this.registry.adopt(configFromRecord(projectId, saved)) : null;
    log.info(`Stored style for ${projectId} v${saved.version} (approved=${saved.approved})`);
    return { record: saved, config };
  }

  /** Explicit relock: archives the current record and stores the next version. */
  async relockStyle(projectId: string, input: unknown): Promise<{ record: LockedStyleRecord; config: LockedStyleConfig | null }> {
    requireProjectId(projectId);
    const record = parseLockedStyleRecord(input);
    configFromRecord(projectId, record);
    const saved = await this.store.replaceRecord(projectId, record);
    const config = saved.approved ? this.registry.adopt(configFromRecord(projectId, saved)) : null;
    log.warn(`Relocked style for ${projectId} to v${saved.version}`);
    return { record: saved, config };
  }

  private requireRun(batchId: string): BatchRunHandle {
    const handle = this.runs.get(batchId);
    if (!handle) throw new BatchNotFoundError(batchId);
    return handle;
  }

  private pruneCompleted() {
    if (this.runs.size <= this.maxRetainedBatches) return;
    for (const [batchId, handle] of this.runs) {
      if (this.runs.size <= this.maxRetainedBatches) break;
      if (handle.getState().completedAt != null) this.runs.delete(batchId);
    }
  }
}
