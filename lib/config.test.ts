import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "./config";
import { STYLE_LOCKS_ROOT } from "./paths";

process.env.LOG_LEVEL = "SILENT";

test("loadConfig falls back to defaults for an empty environment", () => {
  assert.deepEqual(loadConfig({}), {
    generationServiceUrl: "http://127.0.0.1:8010",
    generationServiceApiKey: null,
    scoringServiceUrl: "http://127.0.0.1:8011",
    requestTimeoutMs: 60_000,
    styleLocksDir: STYLE_LOCKS_ROOT,
    batch: {
      thresholds: { perAsset: 8.5, batch: 9 },
      maxConcurrency: 5,
      maxAttempts: 3,
      attemptTimeoutMs: 300_000,
      pollIntervalMs: 2_000,
    },
  });
});

test("loadConfig reads overrides and clamps numeric limits", () => {
  const config = loadConfig({
    GENERATION_SERVICE_URL: "http://generation.test:9000/",
    GENERATION_SERVICE_API_KEY: "test-secret",
    SCORING_SERVICE_URL: "http://scoring.test",
    BATCH_MAX_CONCURRENCY: "64",
    BATCH_MAX_ATTEMPTS: "4",
    BATCH_POLL_INTERVAL_MS: "250",
    CONSISTENCY_THRESHOLD_PER_ASSET: "9",
    CONSISTENCY_THRESHOLD_BATCH: "9.5",
    STYLE_LOCKS_DIR: "/tmp/style-locks",
  });
  assert.equal(config.generationServiceUrl, "http://generation.test:9000");
  assert.equal(config.generationServiceApiKey, "test-secret");
  assert.equal(config.scoringServiceUrl, "http://scoring.test");
  assert.equal(config.batch.maxConcurrency, 32);
  assert.equal(config.batch.maxAttempts, 4);
  assert.equal(config.batch.pollIntervalMs, 250);
  assert.deepEqual(config.batch.thresholds, { perAsset: 9, batch: 9.5 });
  assert.equal(config.styleLocksDir, "/tmp/style-locks");
});

test("invalid values are ignored", () => {
  const config = loadConfig({
    BATCH_MAX_ATTEMPTS: "zero",
    BATCH_MAX_CONCURRENCY: "0",
    CONSISTENCY_THRESHOLD_PER_ASSET: "11",
  });
  assert.equal(config.batch.maxAttempts, 3);
  assert.equal(config.batch.maxConcurrency, 5);
  assert.equal(config.batch.thresholds.perAsset, 8.5);
});

test("a batch threshold below the per-asset threshold resets both to defaults", () => {
  const config = loadConfig({ CONSISTENCY_THRESHOLD_PER_ASSET: "9.5", CONSISTENCY_THRESHOLD_BATCH: "9" });
  assert.deepEqual(config.batch.thresholds, { perAsset: 8.5, batch: 9 });
});
