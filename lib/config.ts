import path from "node:path";
import type { BatchDefaults } from "./batch/orchestrator";
import { DEFAULT_BATCH_THRESHOLD, DEFAULT_MAX_ATTEMPTS, DEFAULT_PER_ASSET_THRESHOLD } from "./batch/retryPolicy";
import {
  DEFAULT_ATTEMPT_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_POLL_INTERVAL_MS,
  MAX_CONCURRENCY_LIMIT,
} from "./batch/scheduler";
import { createLogger } from "./logger";
import { STYLE_LOCKS_ROOT } from "./paths";

const log = createLogger("config");

const DEFAULT_GENERATION_SERVICE_URL = "http://127.0.0.1:8010";
const DEFAULT_SCORING_SERVICE_URL = "http://127.0.0.1:8011";
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

type Env = Record<string, string | undefined>;

export type AppConfig = {
  generationServiceUrl: string;
  generationServiceApiKey: string | null;
  scoringServiceUrl: string;
  requestTimeoutMs: number;
  styleLocksDir: string;
  batch: BatchDefaults;
};

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    log.warn(`Ignoring ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return Math.min(max, Math.floor(value));
}

function readScore(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 10) {
    log.warn(`Ignoring ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return value;
}

function readUrl(env: Env, name: string, fallback: string) {
  return (env[name]?.trim() || fallback).replace(/\/$/, "");
}

export function loadConfig(env: Env = process.env): AppConfig {
  let perAsset = readScore(env, "CONSISTENCY_THRESHOLD_PER_ASSET", DEFAULT_PER_ASSET_THRESHOLD);
  let batchThreshold = readScore(env, "CONSISTENCY_THRESHOLD_BATCH", DEFAULT_BATCH_THRESHOLD);
  if (batchThreshold < perAsset) {
    log.warn(
      `CONSISTENCY_THRESHOLD_BATCH (${batchThreshold}) is below CONSISTENCY_THRESHOLD_PER_ASSET (${perAsset}); using defaults`,
    );
    perAsset = DEFAULT_PER_ASSET_THRESHOLD;
    batchThreshold = DEFAULT_BATCH_THRESHOLD;
  }

  const styleLocksDir = env.STYLE_LOCKS_DIR?.trim();

  return {
    generationServiceUrl: readUrl(env, "GENERATION_SERVICE_URL", DEFAULT_GENERATION_SERVICE_URL),
    generationServiceApiKey: env.GENERATION_SERVICE_API_KEY?.trim() || null,
    scoringServiceUrl: readUrl(env, "SCORING_SERVICE_URL", DEFAULT_SCORING_SERVICE_URL),
    requestTimeoutMs: readInt(env, "GENERATION_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1, 600_000),
    styleLocksDir: styleLocksDir ? path.resolve(styleLocksDir) : STYLE_LOCKS_ROOT,
    batch: {
      thresholds: { perAsset, batch: batchThreshold },
      maxConcurrency: readInt(env, "BATCH_MAX_CONCURRENCY", DEFAULT_MAX_CONCURRENCY, 1, MAX_CONCURRENCY_LIMIT),
      maxAttempts: readInt(env, "BATCH_MAX_ATTEMPTS", DEFAULT_MAX_ATTEMPTS, 1, 10),
      attemptTimeoutMs: readInt(env, "BATCH_ATTEMPT_TIMEOUT_MS", DEFAULT_ATTEMPT_TIMEOUT_MS, 1, 3_600_000),
      pollIntervalMs: readInt(env, "BATCH_POLL_INTERVAL_MS", DEFAULT_POLL_INTERVAL_MS, 1, 60_000),
    },
  };
}
