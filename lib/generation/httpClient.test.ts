import assert from "node:assert/strict";
import test from "node:test";
import {
  ArtifactNotReadyError,
  DownloadFailedError,
  GenerationServiceError,
  InvalidRequestError,
  RateLimitError,
  ServiceUnavailableError,
} from "../errors";
import { composePrompt, createLockedStyleConfig } from "../style/lockedStyle";
import { HttpGenerationClient } from "./httpClient";
import type { GenerationHandle, GenerationRequest } from "./types";

type FetchCall = { url: string; init?: RequestInit };

const CONFIG = createLockedStyleConfig({
  projectId: "demo",
  modelId: "pixel-xl",
  steps: 30,
  cfgScale: 7.5,
  seedBase: 1234,
  width: 512,
  height: 512,
  promptSuffix: "16-bit pixel art",
  createdAt: "2026-01-15T10:00:00.000Z",
});

const REQUEST: GenerationRequest = {
  jobId: "job-1",
  category: "character",
  prompt: "knight idle",
  fullPrompt: composePrompt("knight idle", CONFIG),
  config: CONFIG,
  attempt: 1,
};

const HANDLE: GenerationHandle = { id: "gen-42", jobId: "job-1", submittedAt: 0 };

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json", ...headers } });
}

function createClient(respond: (call: FetchCall) => Response | Promise<Response>) {
  const calls: FetchCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const call = { url: String(input), init };
    calls.push(call);
    return respond(call);
  };
  const client = new HttpGenerationClient({
    baseUrl: "http://generation.test/",
    apiKey: "test-secret",
    requestTimeoutMs: 1000,
    fetchImpl,
  });
  return { client, calls };
}

function signal() {
  return new AbortController().signal;
}

test("submit posts the locked parameters and returns a handle", async () => {
  const { client, calls } = createClient(() => jsonResponse({ id: "gen-42" }, 201));
  const handle = await client.submit(REQUEST, signal());

  assert.equal(handle.id, "gen-42");
  assert.equal(handle.jobId, "job-1");
  assert.equal(calls[0]?.url, "http://generation.test/v1/generations");
  assert.equal(calls[0]?.init?.method, "POST");
  assert.equal(new Headers(calls[0]?.init?.headers).get("authorization"), "Bearer test-secret");
  const body = calls[0]?.init?.body;
  assert.equal(typeof body, "string");
  assert.deepEqual(JSON.parse(typeof body === "string" ? body : "null"), {
    job_id: "job-1",
    category: "character",
    prompt: "knight idle, 16-bit pixel art",
    model_id: "pixel-xl",
    steps: 30,
    cfg_scale: 7.5,
    seed: 1234,
    width: 512,
    height: 512,
    attempt: 1,
  });
});

test("429 maps to RateLimitError with Retry-After", async () => {
  const { client } = createClient(() => jsonResponse({ error: "too many requests" }, 429, { "Retry-After": "7" }));
  await assert.rejects(
    client.submit(REQUEST, signal()),
    (error: unknown) =>
      error instanceof RateLimitError &&
      error.statusCode === 429 &&
      error.retryAfterSeconds === 7 &&
      error.message === "Generation service 429: too many requests",
  );
});

test("5xx maps to ServiceUnavailableError and 4xx to InvalidRequestError", async () => {
  const unavailable = createClient(() => new Response("upstream down", { status: 503 }));
  await assert.rejects(unavailable.client.submit(REQUEST, signal()), ServiceUnavailableError);

  const invalid = createClient(() => jsonResponse({ detail: "prompt too long" }, 422));
  await assert.rejects(
    invalid.client.submit(REQUEST, signal()),
    (error: unknown) =>
      error instanceof InvalidRequestError &&
      error.failureKind === "permanent" &&
      error.message === "Generation service 422: prompt too long",
  );
});

test("408 is a transient timeout, not an invalid request", async () => {
  const { client } = createClient(() => new Response("request timeout", { status: 408 }));
  await assert.rejects(
    client.submit(REQUEST, signal()),
    (error: unknown) =>
      error instanceof ServiceUnavailableError &&
      error.failureKind === "transient" &&
      error.statusCode === 408 &&
      error.message === "Generation service 408: request timeout",
  );
});

test("poll maps service states, including permanent failures", async () => {
  const processing = createClient(() => jsonResponse({ status: "processing", progress: 0.4 }));
  assert.deepEqual(await processing.client.poll(HANDLE, signal()), { status: "processing", progress: 0.4 });
  assert.equal(processing.calls[0]?.url, "http://generation.test/v1/generations/gen-42");

  const failed = createClient(() => jsonResponse({ status: "failed", error: "content filter", retryable: false }));
  assert.deepEqual(await failed.client.poll(HANDLE, signal()), {
    status: "failed",
    progress: 0,
    failure: "permanent",
    error: "content filter",
  });
});

test("fetch returns the artifact reference", async () => {
  const { client, calls } = createClient(() =>
    jsonResponse({ artifact_ref: "s3://assets/gen-42.png", status: "completed", duration_ms: 1500 }),
  );
  assert.deepEqual(await client.fetch(HANDLE, signal()), {
    jobId: "job-1",
    artifactRef: "s3://assets/gen-42.png",
    rawServiceStatus: "completed",
    durationMs: 1500,
  });
  assert.equal(calls[0]?.url, "http://generation.test/v1/generations/gen-42/artifact");
});

test("an artifact that is not ready maps to ArtifactNotReadyError", async () => {
  const { client } = createClient(() => jsonResponse({ error: "still rendering" }, 409));
  await assert.rejects(client.fetch(HANDLE, signal()), ArtifactNotReadyError);
});

test("transport failures map to DownloadFailedError or ServiceUnavailableError", async () => {
  const { client } = createClient(() => {
    throw new TypeError("fetch failed");
  });
  await assert.rejects(client.fetch(HANDLE, signal()), DownloadFailedError);
  await assert.rejects(client.submit(REQUEST, signal()), ServiceUnavailableError);
});

test("an unexpected response body is a transient service error", async () => {
  const { client } = createClient(() => jsonResponse({ unexpected: true }));
  await assert.rejects(
    client.submit(REQUEST, signal()),
    (error: unknown) => error instanceof GenerationServiceError && error.failureKind === "transient",
  );
});

test("an aborted caller signal rejects with an AbortError", async () => {
  const controller = new AbortController();
  controller.abort();
  const { client, calls } = createClient(() => jsonResponse({ id: "gen-42" }));
  await assert.rejects(client.submit(REQUEST, controller.signal), { name: "AbortError" });
  assert.equal(calls.length, 0);
});
