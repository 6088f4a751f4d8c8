import { z } from "zod";
import { ASSET_CATEGORIES } from "../assetCategory";
import { InvalidParameterError } from "../errors";
import { DEFAULT_BATCH_THRESHOLD, DEFAULT_PER_ASSET_THRESHOLD } from "./retryPolicy";
import type { BatchThresholds, JobSpec } from "./types";

export const MAX_JOBS_PER_BATCH = 1000;

export const jobSpecSchema = z.object({
  category: z.enum(ASSET_CATEGORIES),
  prompt: z.string().trim().min(1, "prompt must not be empty").max(2000),
  jobId: z.string().trim().min(1).max(128).optional(),
});

export const jobSpecsSchema = z
  .array(jobSpecSchema)
  .min(1, "a batch needs at least one job")
  .max(MAX_JOBS_PER_BATCH)
  .superRefine((jobs, ctx) => {
    const seen = new Set<string>();
    jobs.forEach((job, index) => {
      if (!job.jobId) return;
      if (seen.has(job.jobId)) {
        ctx.addIssue({ code: "custom", path: [index, "jobId"], message: `duplicate jobId "${job.jobId}"` });
      }
      seen.add(job.jobId);
    });
  });

const scoreSchema = z.number().min(0).max(10);

export const thresholdsSchema = z
  .object({
    perAsset: scoreSchema.optional(),
    batch: scoreSchema.optional(),
  })
  .default({});

function toInvalidParameterError(error: z.ZodError, label: string) {
  const issue = error.issues[0];
  const field = issue?.path.map(String).join(".") || undefined;
  return new InvalidParameterError(`${label}${field ? ` (${field})` : ""}: ${issue?.message ?? "invalid"}`, field);
}

export function parseJobSpecs(input: unknown): JobSpec[] {
  const parsed = jobSpecsSchema.safeParse(input);
  if (!parsed.success) throw toInvalidParameterError(parsed.error, "Invalid jobs");
  return parsed.data;
}

export function parseThresholds(
  input: unknown,
  defaults: BatchThresholds = { perAsset: DEFAULT_PER_ASSET_THRESHOLD, batch: DEFAULT_BATCH_THRESHOLD },
): BatchThresholds {
  const parsed = thresholdsSchema.safeParse(input);
  if (!parsed.success) throw toInvalidParameterError(parsed.error, "Invalid thresholds");
  const thresholds = {
    perAsset: parsed.data.perAsset ?? defaults.perAsset,
    batch: parsed.data.batch ?? defaults.batch,
  };
  if (thresholds.batch < thresholds.perAsset) {
    throw new InvalidParameterError(
      `Invalid thresholds (batch): batch threshold ${thresholds.batch} is below per-asset threshold ${thresholds.perAsset}`,
      "batch",
    );
  }
  return thresholds;
}
