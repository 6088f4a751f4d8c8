import { z } from "zod";
import { ScoringUnavailableError } from "../errors";
import type { GenerationResult } from "../generation/types";
import type { ConsistencyBaseline } from "../style/record";
import type { ConsistencyScorer } from "./types";

type FetchLike = typeof fetch;

const scoreResponseSchema = z.object({
  score: z.number(),
});

export type HttpConsistencyScorerOptions = {
  baseUrl: string;
  requestTimeoutMs?: number;
  fetchImpl?: FetchLike;
};

export class HttpConsistencyScorer implements ConsistencyScorer {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpConsistencyScorerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async score(artifact: GenerationResult, baseline: ConsistencyBaseline, signal?: AbortSignal): Promise<number> {
    if (baseline.samples.length === 0) {
      throw new ScoringUnavailableError(`Baseline ${baseline.baselineRef} has no validation samples`);
    }

    const timeoutSignal = AbortSignal.timeout(this.requestTimeoutMs);
    let response: Response;
    let responseText: string;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/score`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          artifact_ref: artifact.artifactRef,
          baseline_ref: baseline.baselineRef,
          samples: baseline.samples,
        }),
        signal: signal ? mergeSignals(signal, timeoutSignal) : timeoutSignal,
      });
      responseText = await response.text();
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new ScoringUnavailableError("Scoring service is unreachable", { cause: error });
    }

    if (!response.ok) {
      throw new ScoringUnavailableError(`Scoring service ${response.status}: ${responseText.trim() || "request failed"}`);
    }
    let json: unknown;
    try {
      json = JSON.parse(responseText);
    } catch (error) {
      throw new ScoringUnavailableError("Scoring service returned invalid JSON", { cause: error });
    }
    const parsed = scoreResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ScoringUnavailableError("Scoring service response has no numeric score");
    }
    return parsed.data.score;
  }
}

function mergeSignals(a: AbortSignal, b: AbortSignal): AbortSignal {
  const controller = new AbortController();
  const abort = () => controller.abort();
  if (a.aborted || b.aborted) {
    controller.abort();
  } else {
    a.addEventListener("abort", abort, { once: true });
    b.addEventListener("abort", abort, { once: true });
  }
  return controller.signal;
}
