import type { AssetCategory } from "../assetCategory";
import type { LockedStyleConfig } from "../style/types";
import type {
  BatchRun,
  BatchSummary,
  BatchThresholds,
  BatchVerdict,
  CategoryBreakdown,
  ConsistencyGrade,
  GenerationJob,
  JobStatus,
  ScoreStats,
} from "./types";

export type BatchRunHeader = {
  batchId: string;
  projectId: string;
  lockedConfigRef: string;
  lockedConfig: LockedStyleConfig;
  thresholds: BatchThresholds;
  maxConcurrency: number;
  cancelled: boolean;
  startedAt: number;
  completedAt?: number;
};

export function cloneJob(job: GenerationJob): GenerationJob {
  return {
    ...job,
    attempts: job.attempts.map((attempt) => ({ ...attempt })),
    scores: [...job.scores],
  };
}

function emptyStatusCounts(): Record<JobStatus, number> {
  return {
    PENDING: 0,
    IN_FLIGHT: 0,
    SUCCEEDED: 0,
    FAILED_TRANSIENT: 0,
    FAILED_PERMANENT: 0,
    FAILED_CONSISTENCY: 0,
  };
}

function scoreStats(values: number[]): ScoreStats {
  if (values.length === 0) return { count: 0, mean: null, min: null };
  let sum = 0;
  let min = Infinity;
  for (const value of values) {
    sum += value;
    min = Math.min(min, value);
  }
  return { count: values.length, mean: sum / values.length, min };
}

const GRADE_FLOORS: [number, ConsistencyGrade][] = [
  [9.5, "EXCELLENT"],
  [9.0, "VERY_GOOD"],
  [8.5, "GOOD"],
  [8.0, "ACCEPTABLE"],
  [7.0, "NEEDS_IMPROVEMENT"],
];

export function consistencyGrade(score: number | null): ConsistencyGrade | null {
  if (score == null) return null;
  for (const [floor, grade] of GRADE_FLOORS) {
    if (score >= floor) return grade;
  }
  return "POOR";
}

function successRate(succeeded: number, total: number) {
  return total > 0 ? succeeded / total : 0;
}

/** Latest accepted score of every SUCCEEDED job, in job order. */
export function acceptedScores(jobs: GenerationJob[]): number[] {
  const scores: number[] = [];
  for (const job of jobs) {
    if (job.status === "SUCCEEDED" && job.acceptedScore) scores.push(job.acceptedScore.score);
  }
  return scores;
}

export function summarizeJobs(jobs: GenerationJob[]): BatchSummary {
  const byStatus = emptyStatusCounts();
  const categoryJobs = new Map<AssetCategory, GenerationJob[]>();
  for (const job of jobs) {
    byStatus[job.status] += 1;
    const list = categoryJobs.get(job.category) ?? [];
    list.push(job);
    categoryJobs.set(job.category, list);
  }

  const byCategory: Partial<Record<AssetCategory, CategoryBreakdown>> = {};
  for (const [category, list] of categoryJobs) {
    let succeeded = 0;
    let failed = 0;
    for (const job of list) {
      if (job.status === "SUCCEEDED") succeeded += 1;
      else if (job.status === "FAILED_PERMANENT" || job.status === "FAILED_CONSISTENCY") failed += 1;
    }
    const stats = scoreStats(acceptedScores(list));
    byCategory[category] = {
      total: list.length,
      succeeded,
      failed,
      ...stats,
      successRate: successRate(succeeded, list.length),
      grade: consistencyGrade(stats.mean),
    };
  }

  const scores = scoreStats(acceptedScores(jobs));
  return {
    total: jobs.length,
    byStatus,
    scores,
    successRate: successRate(byStatus.SUCCEEDED, jobs.length),
    grade: consistencyGrade(scores.mean),
    byCategory,
  };
}

export function computeVerdict(summary: BatchSummary, thresholds: BatchThresholds): BatchVerdict {
  const failed = summary.byStatus.FAILED_PERMANENT + summary.byStatus.FAILED_CONSISTENCY;
  const succeeded = summary.byStatus.SUCCEEDED;
  const mean = summary.scores.mean;
  const meetsBatchThreshold = mean != null && mean >= thresholds.batch;

  if (failed === 0 && succeeded === summary.total && meetsBatchThreshold) return "SUCCEEDED";
  if (failed > 0 && succeeded > 0 && meetsBatchThreshold) return "PARTIAL_FAILURE";
  return "FAILED";
}

/**
 * Single owner of a run's job snapshots. Workers publish after every
 * transition; `report` is a pure read of what has been published.
 */
export class BatchAggregator {
  private readonly jobs = new Map<string, GenerationJob>();

  constructor(jobs: GenerationJob[] = []) {
    for (const job of jobs) this.publish(job);
  }

  publish(job: GenerationJob): void {
    this.jobs.set(job.jobId, cloneJob(job));
  }

  report(header: BatchRunHeader): BatchRun {
    const jobs = Array.from(this.jobs.values(), cloneJob);
    const summary = summarizeJobs(jobs);
    const complete = header.completedAt != null;
    return {
      ...header,
      thresholds: { ...header.thresholds },
      jobs,
      aggregateScore: summary.scores.mean,
      summary,
      status: complete ? computeVerdict(summary, header.thresholds) : "RUNNING",
    };
  }
}

/** Recomputes a report from its own final job list. */
export function recomputeReport(run: BatchRun): BatchRun {
  const { jobs, aggregateScore: _score, summary: _summary, status: _status, ...header } = run;
  return new BatchAggregator(jobs).report(header);
}
