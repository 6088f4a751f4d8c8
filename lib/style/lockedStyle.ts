import crypto from "node:crypto";
import { z } from "zod";
import { InvalidParameterError } from "../errors";
import { isValidProjectId } from "./ids";
import type { CreateLockedStyleInput, LockedStyleConfig, LockedStyleParams } from "./types";

export const MAX_SEED = 4_294_967_295;

const dimensionSchema = z
  .number()
  .int()
  .min(64)
  .max(2048)
  .refine((value) => value % 64 === 0, { message: "must be a multiple of 64" });

export const lockedStyleParamsSchema = z.object({
  modelId: z.string().trim().min(1, "must not be empty"),
  steps: z.number().int().min(1).max(150),
  cfgScale: z.number().min(0.1).max(30),
  seedBase: z.number().int().min(0).max(MAX_SEED),
  width: dimensionSchema,
  height: dimensionSchema,
  promptSuffix: z.string().trim().min(1, "must not be empty"),
});

const lockedStyleMetaSchema = z.object({
  projectId: z.string().refine(isValidProjectId, { message: "must be 1-63 lowercase letters, digits, '-' or '_'" }),
  version: z.number().int().min(1).default(1),
  createdAt: z.string().datetime({ offset: true }).optional(),
});

const PARAM_KEYS: (keyof LockedStyleParams)[] = [
  "modelId",
  "steps",
  "cfgScale",
  "seedBase",
  "width",
  "height",
  "promptSuffix",
];

function toInvalidParameterError(error: z.ZodError): InvalidParameterError {
  const issue = error.issues[0];
  const field = issue?.path.map(String).join(".") || undefined;
  const message = issue ? `${field ?? "locked style"}: ${issue.message}` : "Invalid locked style parameters";
  return new InvalidParameterError(message, field);
}

/**
 * Validates the parameters and returns a frozen config. A config never changes
 * after this point; a new style means a new config with a higher version.
 */
export function createLockedStyleConfig(input: CreateLockedStyleInput): LockedStyleConfig {
  const params = lockedStyleParamsSchema.safeParse(input);
  if (!params.success) throw toInvalidParameterError(params.error);
  const meta = lockedStyleMetaSchema.safeParse(input);
  if (!meta.success) throw toInvalidParameterError(meta.error);

  return Object.freeze({
    projectId: meta.data.projectId,
    version: meta.data.version,
    createdAt: meta.data.createdAt ?? new Date().toISOString(),
    ...params.data,
  });
}

export function lockedStyleFingerprint(config: LockedStyleConfig) {
  const canonical = JSON.stringify(PARAM_KEYS.map((key) => [key, config[key]]));
  return crypto.createHash("sha256").update(canonical).digest("hex");
}

export function lockedStyleRef(config: LockedStyleConfig) {
  return `${config.projectId}@v${config.version}:${lockedStyleFingerprint(config).slice(0, 12)}`;
}

export function lockedStyleEquals(a: LockedStyleConfig, b: LockedStyleConfig) {
  if (a === b) return true;
  if (a.projectId !== b.projectId || a.version !== b.version || a.createdAt !== b.createdAt) return false;
  return PARAM_KEYS.every((key) => a[key] === b[key]);
}

export function composePrompt(prompt: string, config: LockedStyleConfig) {
  return `${prompt.trim()}, ${config.promptSuffix}`;
}
