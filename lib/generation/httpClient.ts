import { z } from "zod";
import { createAbortError } from "../async";
import {
  ArtifactNotReadyError,
  DownloadFailedError,
  GenerationServiceError,
  InvalidRequestError,
  RateLimitError,
  ServiceUnavailableError,
} from "../errors";
import type {
  GenerationClientAdapter,
  GenerationHandle,
  GenerationRequest,
  GenerationResult,
  PollResult,
} from "./types";

type FetchLike = typeof fetch;

type Endpoint = "submit" | "poll" | "artifact";

export type HttpGenerationClientOptions = {
  baseUrl: string;
  apiKey?: string | null;
  requestTimeoutMs?: number;
  fetchImpl?: FetchLike;
};

const submitResponseSchema = z.object({
  id: z.string().min(1),
});

const pollResponseSchema = z.object({
  status: z.enum(["queued", "processing", "completed", "failed"]),
  progress: z.number().min(0).max(1).default(0),
  error: z.string().nullish(),
  retryable: z.boolean().optional(),
});

const artifactResponseSchema = z.object({
  artifact_ref: z.string().min(1),
  status: z.string().min(1),
  duration_ms: z.number().nonnegative(),
  error: z.string().nullish(),
});

const errorBodySchema = z.object({
  error: z.string().optional(),
  detail: z.string().optional(),
});

function readErrorMessage(bodyText: string, fallback: string) {
  const trimmed = bodyText.trim();
  if (!trimmed) return fallback;
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(trimmed));
    if (parsed.success) {
      const message = parsed.data.error?.trim() || parsed.data.detail?.trim();
      if (message) return message;
    }
  } catch {
    // not JSON: use the raw text
  }
  return trimmed;
}

function parseRetryAfterSeconds(raw: string | null) {
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function toServiceError(endpoint: Endpoint, status: number, bodyText: string, retryAfter: string | null) {
  const message = `Generation service ${status}: ${readErrorMessage(bodyText, "request failed")}`;
  const options = { statusCode: status, responseBody: bodyText };
  if (status === 429) {
    return new RateLimitError(message, { ...options, retryAfterSeconds: parseRetryAfterSeconds(retryAfter) });
  }
  if (endpoint === "artifact" && (status === 404 || status === 409)) {
    return new ArtifactNotReadyError(message, options);
  }
  if (status >= 500 || status === 408) {
    return new ServiceUnavailableError(message, { ...options, retryAfterSeconds: parseRetryAfterSeconds(retryAfter) });
  }
  return new InvalidRequestError(message, options);
}

/**
 * GenerationClientAdapter over the generation service's REST API.
 * Every failure is thrown as a GenerationServiceError subclass.
 */
export class HttpGenerationClient implements GenerationClientAdapter {
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpGenerationClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey ?? null;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async submit(request: GenerationRequest, signal: AbortSignal): Promise<GenerationHandle> {
    const { config } = request;
    const body = {
      job_id: request.jobId,
      category: request.category,
      prompt: request.fullPrompt,
      model_id: config.modelId,
      steps: config.steps,
      cfg_scale: config.cfgScale,
      seed: config.seedBase,
      width: config.width,
      height: config.height,
      attempt: request.attempt,
    };
    const parsed = await this.requestJson("submit", "POST", "/v1/generations", body, signal, submitResponseSchema);
    return { id: parsed.id, jobId: request.jobId, submittedAt: Date.now() };
  }

  async poll(handle: GenerationHandle, signal: AbortSignal): Promise<PollResult> {
    const parsed = await this.requestJson(
      "poll",
      "GET",
      `/v1/generations/${encodeURIComponent(handle.id)}`,
      undefined,
      signal,
      pollResponseSchema,
    );
    if (parsed.status === "failed") {
      return {
        status: "failed",
        progress: parsed.progress,
        failure: parsed.retryable === false ? "permanent" : "transient",
        error: parsed.error ?? "Generation failed",
      };
    }
    return { status: parsed.status, progress: parsed.progress };
  }

  async fetch(handle: GenerationHandle, signal: AbortSignal): Promise<GenerationResult> {
    const parsed = await this.requestJson(
      "artifact",
      "GET",
      `/v1/generations/${encodeURIComponent(handle.id)}/artifact`,
      undefined,
      signal,
      artifactResponseSchema,
    );
    return Object.freeze({
      jobId: handle.jobId,
      artifactRef: parsed.artifact_ref,
      rawServiceStatus: parsed.status,
      durationMs: parsed.duration_ms,
      ...(parsed.error ? { error: parsed.error } : {}),
    });
  }

  private async requestJson<T>(
    endpoint: Endpoint,
    method: "GET" | "POST",
    path: string,
    body: unknown,
    signal: AbortSignal,
    responseSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    if (signal.aborted) throw createAbortError();
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onAbort = () => controller.abort();
    signal.addEventListener("abort", onAbort, { once: true });

    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let responseText: string;
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      responseText = await response.text();
    } catch (error) {
      if (signal.aborted) throw createAbortError();
      if (timedOut) {
        throw new ServiceUnavailableError(`Generation service request timed out after ${this.requestTimeoutMs}ms`, {
          statusCode: 504,
          cause: error,
        });
      }
      if (endpoint === "artifact") {
        throw new DownloadFailedError("Artifact download failed", { statusCode: 502, cause: error });
      }
      throw new ServiceUnavailableError("Generation service is unreachable", { statusCode: 502, cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      throw toServiceError(endpoint, response.status, responseText, response.headers.get("retry-after"));
    }

    let json: unknown;
    try {
      json = JSON.parse(responseText);
    } catch (error) {
      throw new GenerationServiceError("Generation service returned invalid JSON", "transient", {
        statusCode: 502,
        responseBody: responseText,
        cause: error,
      });
    }
    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GenerationServiceError(
        `Generation service returned an unexpected ${endpoint} response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        "transient",
        { statusCode: 502, responseBody: responseText },
      );
    }
    return parsed.data;
  }
}
