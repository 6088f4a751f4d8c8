import type { AssetCategory } from "../assetCategory";
import type { FailureKind } from "../errors";
import type { LockedStyleConfig } from "../style/types";

export type GenerationRequest = {
  jobId: string;
  category: AssetCategory;
  prompt: string;
  // prompt + locked suffix, identical on every attempt
  fullPrompt: string;
  config: LockedStyleConfig;
  attempt: number;
};

export type GenerationHandle = {
  id: string;
  jobId: string;
  submittedAt: number;
};

export type PollStatus = "queued" | "processing" | "completed" | "failed";

export type PollResult = {
  status: PollStatus;
  // 0..1
  progress: number;
  failure?: FailureKind;
  error?: string;
};

export type GenerationResult = Readonly<{
  jobId: string;
  artifactRef: string;
  rawServiceStatus: string;
  durationMs: number;
  error?: string;
}>;

/**
 * Boundary to the remote generation service. Implementations classify their
 * failures by throwing the GenerationServiceError subclasses from lib/errors.
 */
export interface GenerationClientAdapter {
  submit(request: GenerationRequest, signal: AbortSignal): Promise<GenerationHandle>;
  poll(handle: GenerationHandle, signal: AbortSignal): Promise<PollResult>;
  fetch(handle: GenerationHandle, signal: AbortSignal): Promise<GenerationResult>;
}
