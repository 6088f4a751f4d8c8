import type { AssetCategory } from "../assetCategory";
import type { GenerationResult } from "../generation/types";
import type { ConsistencyScore } from "../scoring/types";
import type { LockedStyleConfig } from "../style/types";

export type JobStatus =
  | "PENDING"
  | "IN_FLIGHT"
  | "SUCCEEDED"
  | "FAILED_TRANSIENT"
  | "FAILED_PERMANENT"
  | "FAILED_CONSISTENCY";

export type BatchVerdict = "SUCCEEDED" | "PARTIAL_FAILURE" | "FAILED";
export type BatchRunStatus = "RUNNING" | BatchVerdict;

export type BatchThresholds = {
  perAsset: number;
  batch: number;
};

export type JobSpec = {
  category: AssetCategory;
  prompt: string;
  jobId?: string;
};

export type AttemptRecord = {
  attempt: number;
  configRef: string;
  fullPrompt: string;
  startedAt: number;
  finishedAt?: number;
  throttleEvents: number;
  scoringCalls: number;
  result?: GenerationResult;
  score?: ConsistencyScore;
  outcome?: JobStatus;
  error?: string;
};

export type GenerationJob = {
  jobId: string;
  category: AssetCategory;
  prompt: string;
  lockedConfigRef: string;
  attemptCount: number;
  maxAttempts: number;
  status: JobStatus;
  attempts: AttemptRecord[];
  scores: ConsistencyScore[];
  acceptedScore?: ConsistencyScore;
  lastError?: string;
  // earliest time a PENDING retry may be dispatched
  readyAt: number;
  startedAt?: number;
  finishedAt?: number;
};

export type ScoreStats = {
  count: number;
  mean: number | null;
  min: number | null;
};

export const CONSISTENCY_GRADES = ["EXCELLENT", "VERY_GOOD", "GOOD", "ACCEPTABLE", "NEEDS_IMPROVEMENT", "POOR"] as const;

export type ConsistencyGrade = (typeof CONSISTENCY_GRADES)[number];

export type CategoryBreakdown = ScoreStats & {
  total: number;
  succeeded: number;
  failed: number;
  // succeeded / total, 0..1
  successRate: number;
  grade: ConsistencyGrade | null;
};

export type BatchSummary = {
  total: number;
  byStatus: Record<JobStatus, number>;
  scores: ScoreStats;
  successRate: number;
  // grade of the aggregate score; null when nothing succeeded
  grade: ConsistencyGrade | null;
  byCategory: Partial<Record<AssetCategory, CategoryBreakdown>>;
};

export type BatchRun = {
  batchId: string;
  projectId: string;
  lockedConfigRef: string;
  lockedConfig: LockedStyleConfig;
  thresholds: BatchThresholds;
  maxConcurrency: number;
  jobs: GenerationJob[];
  aggregateScore: number | null;
  summary: BatchSummary;
  status: BatchRunStatus;
  cancelled: boolean;
  startedAt: number;
  completedAt?: number;
};
