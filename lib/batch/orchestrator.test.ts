import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { FileStyleStore } from "../adapters/styleStore.file";
import {
  BatchNotFoundError,
  InvalidParameterError,
  MissingLockError,
  StyleAlreadyLockedError,
} from "../errors";
import { approvedRecord, FakeGenerationAdapter, ScriptedScorer } from "../testing/fakes";
import { BatchOrchestrator } from "./orchestrator";

process.env.LOG_LEVEL = "SILENT";

async function createOrchestrator(scorer = new ScriptedScorer(9.2)) {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "orchestrator-"));
  const adapter = new FakeGenerationAdapter();
  const orchestrator = new BatchOrchestrator({
    store: new FileStyleStore(rootDir),
    adapter,
    scorer,
    defaults: {
      pollIntervalMs: 1,
      scoringRetryDelayMs: 1,
      retryPolicy: { retryBaseDelayMs: 1, retryMaxDelayMs: 5, throttleBaseDelayMs: 1, throttleMaxDelayMs: 5 },
    },
  });
  return { orchestrator, adapter, scorer };
}

const JOBS = [
  { category: "character" as const, prompt: "knight idle" },
  { category: "environment" as const, prompt: "forest clearing" },
];

test("submitting without a locked style fails and creates no jobs", async () => {
  const { orchestrator, adapter } = await createOrchestrator();
  await assert.rejects(
    orchestrator.submitBatch({ projectId: "demo", jobs: JOBS }),
    (error: unknown) => error instanceof MissingLockError && error.projectId === "demo",
  );
  assert.deepEqual(orchestrator.listBatches(), []);
  assert.equal(adapter.submitted.length, 0);
});

test("a style that is stored but not approved does not unlock batches", async () => {
  const { orchestrator } = await createOrchestrator();
  const { config } = await orchestrator.lockStyle("demo", approvedRecord({ approved: false }));
  assert.equal(config, null);
  await assert.rejects(orchestrator.submitBatch({ projectId: "demo", jobs: JOBS }), MissingLockError);
});

test("a locked project runs a batch end to end against its locked style", async () => {
  const { orchestrator, adapter, scorer } = await createOrchestrator();
  const { record, config } = await orchestrator.lockStyle("demo", approvedRecord());
  assert.equal(record.version, 1);
  assert.ok(config);

  const submitted = await orchestrator.submitBatch({ projectId: "demo", jobs: JOBS });
  assert.equal(submitted.status, "RUNNING");
  assert.equal(submitted.summary.total, 2);

  const run = await orchestrator.awaitCompletion(submitted.batchId);
  assert.equal(run.status, "SUCCEEDED");
  assert.equal(run.aggregateScore, 9.2);
  assert.deepEqual(run.thresholds, { perAsset: 8.5, batch: 9 });
  assert.equal(run.lockedConfig, orchestrator.registry.get("demo"));
  assert.equal(orchestrator.getBatchReport(submitted.batchId)?.status, "SUCCEEDED");

  assert.deepEqual(
    adapter.submitted.map((request) => request.fullPrompt).sort(),
    ["forest clearing, 16-bit pixel art, limited palette", "knight idle, 16-bit pixel art, limited palette"],
  );
  assert.ok(adapter.submitted.every((request) => request.config === run.lockedConfig));
  assert.ok(scorer.calls.every((call) => call.baselineRef === "demo@v1/validation"));
});

test("batches of one project share the same locked config instance", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("demo", approvedRecord());
  const first = await orchestrator.submitBatch({ projectId: "demo", jobs: JOBS });
  const second = await orchestrator.submitBatch({ projectId: "demo", jobs: JOBS });
  assert.equal(first.lockedConfig, second.lockedConfig);
  assert.equal(first.lockedConfigRef, second.lockedConfigRef);
  await orchestrator.awaitCompletion(first.batchId);
  await orchestrator.awaitCompletion(second.batchId);
});

test("locking twice is refused; an explicit relock moves batches to the next version", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("demo", approvedRecord());
  await assert.rejects(orchestrator.lockStyle("demo", approvedRecord({ steps: 40 })), StyleAlreadyLockedError);

  const { record } = await orchestrator.relockStyle("demo", approvedRecord({ steps: 40 }));
  assert.equal(record.version, 2);
  assert.deepEqual(await orchestrator.listStyleVersions("demo"), [1, 2]);
  assert.equal((await orchestrator.getStyleRecord("demo"))?.steps, 40);
  const run = await orchestrator.submitBatch({ projectId: "demo", jobs: JOBS });
  assert.match(run.lockedConfigRef, /^demo@v2:[0-9a-f]{12}$/);
  assert.equal(run.lockedConfig.steps, 40);
  assert.equal(orchestrator.registry.history("demo").length, 1);
  await orchestrator.awaitCompletion(run.batchId);
});

test("invalid submissions are rejected with InvalidParameterError", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("demo", approvedRecord());
  await assert.rejects(orchestrator.submitBatch({ projectId: "demo", jobs: [] }), InvalidParameterError);
  await assert.rejects(
    orchestrator.submitBatch({ projectId: "demo", jobs: JOBS, thresholds: { perAsset: 9.5, batch: 9 } }),
    InvalidParameterError,
  );
  await assert.rejects(orchestrator.submitBatch({ projectId: "Demo!", jobs: JOBS }), InvalidParameterError);
  await assert.rejects(orchestrator.lockStyle("demo-2", approvedRecord({ width: 500 })), /width/);
});

test("caller thresholds apply to the run", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("demo", approvedRecord());
  const submitted = await orchestrator.submitBatch({
    projectId: "demo",
    jobs: JOBS,
    thresholds: { perAsset: 9, batch: 9.5 },
  });
  const run = await orchestrator.awaitCompletion(submitted.batchId);
  assert.deepEqual(run.thresholds, { perAsset: 9, batch: 9.5 });
  assert.equal(run.summary.byStatus.SUCCEEDED, 2);
  assert.equal(run.status, "FAILED");
});

test("unknown batches: null report, no cancel, awaitCompletion rejects", async () => {
  const { orchestrator } = await createOrchestrator();
  assert.equal(orchestrator.getBatchReport("missing"), null);
  assert.equal(orchestrator.cancelBatch("missing"), false);
  await assert.rejects(orchestrator.awaitCompletion("missing"), BatchNotFoundError);
});

test("cancelBatch only affects running batches", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("demo", approvedRecord());
  const submitted = await orchestrator.submitBatch({ projectId: "demo", jobs: JOBS });
  await orchestrator.awaitCompletion(submitted.batchId);
  assert.equal(orchestrator.cancelBatch(submitted.batchId), false);
});

test("listBatches filters by project", async () => {
  const { orchestrator } = await createOrchestrator();
  await orchestrator.lockStyle("alpha", approvedRecord());
  await orchestrator.lockStyle("beta", approvedRecord());
  const a = await orchestrator.submitBatch({ projectId: "alpha", jobs: JOBS });
  const b = await orchestrator.submitBatch({ projectId: "beta", jobs: JOBS });
  await Promise.all([orchestrator.awaitCompletion(a.batchId), orchestrator.awaitCompletion(b.batchId)]);

  assert.equal(orchestrator.listBatches().length, 2);
  assert.deepEqual(
    orchestrator.listBatches("beta").map((item) => [item.batchId, item.status, item.total, item.succeeded]),
    [[b.batchId, "SUCCEEDED", 2, 2]],
  );
});
