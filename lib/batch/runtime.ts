import { FileStyleStore } from "../adapters/styleStore.file";
import { loadConfig } from "../config";
import { HttpGenerationClient } from "../generation/httpClient";
import { HttpConsistencyScorer } from "../scoring/httpScorer";
import { BatchOrchestrator } from "./orchestrator";

let orchestrator: BatchOrchestrator | null = null;

// One orchestrator per server process; batch reports live in its memory.
export function getBatchOrchestrator(): BatchOrchestrator {
  if (!orchestrator) {
    const config = loadConfig();
    orchestrator = new BatchOrchestrator({
      store: new FileStyleStore(config.styleLocksDir),
      adapter: new HttpGenerationClient({
        baseUrl: config.generationServiceUrl,
        apiKey: config.generationServiceApiKey,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
      scorer: new HttpConsistencyScorer({
        baseUrl: config.scoringServiceUrl,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
      defaults: config.batch,
    });
  }
  return orchestrator;
}
