import { z } from "zod";
import { InvalidParameterError } from "../errors";
import { createLockedStyleConfig } from "./lockedStyle";
import type { LockedStyleConfig } from "./types";

// Persisted shape of an approved style, snake_case as handed off between tools.
export const lockedStyleRecordSchema = z.object({
  model_id: z.string(),
  steps: z.number(),
  cfg_scale: z.number(),
  seed_base: z.number(),
  width: z.number(),
  height: z.number(),
  style_prompt_suffix: z.string(),
  validation_samples: z.array(z.string().min(1)).default([]),
  consistency_score: z.number().min(0).max(10).nullable().default(null),
  approved: z.boolean(),
  locked_date: z.string().datetime({ offset: true }),
  version: z.number().int().min(1).default(1),
});

export type LockedStyleRecord = z.infer<typeof lockedStyleRecordSchema>;
export type LockedStyleRecordInput = z.input<typeof lockedStyleRecordSchema>;

export type ConsistencyBaseline = {
  baselineRef: string;
  samples: string[];
};

export function parseLockedStyleRecord(raw: unknown): LockedStyleRecord {
  const parsed = lockedStyleRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join(".") || undefined;
    throw new InvalidParameterError(
      `Invalid locked style record${field ? ` (${field})` : ""}: ${issue?.message ?? "unknown error"}`,
      field,
    );
  }
  return parsed.data;
}

export function configFromRecord(projectId: string, record: LockedStyleRecord): LockedStyleConfig {
  return createLockedStyleConfig({
    projectId,
    version: record.version,
    createdAt: record.locked_date,
    modelId: record.model_id,
    steps: record.steps,
    cfgScale: record.cfg_scale,
    seedBase: record.seed_base,
    width: record.width,
    height: record.height,
    promptSuffix: record.style_prompt_suffix,
  });
}

export function baselineFromRecord(projectId: string, record: LockedStyleRecord): ConsistencyBaseline {
  return {
    baselineRef: `${projectId}@v${record.version}/validation`,
    samples: [...record.validation_samples],
  };
}
