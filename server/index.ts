import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./domain/errors.js";
import { CacheStore } from "./domain/store.js";
import { MistralClient } from "./llm/mistral-client.js";
import { CrawlOrchestrator } from "./orchestrator/crawl-orchestrator.js";
import { DocumentChunker } from "./rag/document-chunker.js";
import { SemanticRetriever } from "./rag/retrieval.js";
import { PageFetcher } from "./services/page-fetcher.js";
import { createScheduler } from "./services/scheduler.js";
import { StartupDataService } from "./services/startup-data.js";
import { StartupExtractor } from "./services/startup-extractor.js";
import { StartupSearchService } from "./services/startup-search.js";

async function start(): Promise<void> {
  const config = loadConfig();

  const store = new CacheStore({
    dataDir: config.storage.dataDir,
    databaseUrl: config.storage.databaseUrl,
    databaseSsl: config.storage.databaseSsl
  });
  await store.init();

  const crawler = new CrawlOrchestrator({
    fetcher: new PageFetcher({ timeoutMs: config.crawl.fetchTimeoutMs, retries: config.crawl.fetchRetries }),
    extractor: new StartupExtractor({
      defaultLocation: config.directory.defaultLocation,
      defaultDomain: config.directory.defaultDomain
    }),
    rootUrl: config.directory.url,
    maxPages: config.directory.maxPages
  });

  const data = new StartupDataService({
    store,
    crawler,
    scheduler: createScheduler(config.crawl.scheduler),
    dailyAt: config.crawl.dailyAt
  });
  data.init();

  const mistral = new MistralClient({
    apiKey: config.mistral.apiKey,
    baseUrl: config.mistral.baseUrl,
    embeddingModel: config.mistral.embeddingModel
  });
  const retriever = new SemanticRetriever({
    chunker: new DocumentChunker(config.rag),
    provider: mistral,
    batchSize: config.mistral.embeddingBatchSize
  });
  const search = new StartupSearchService({
    data,
    retriever,
    llm: mistral,
    llmConfig: config.llm,
    zeroMatchPolicy: config.zeroMatchPolicy
  });

  const app = createApp({ data, search, corsOrigin: config.corsOrigin });
  const server = app.listen(config.port, () => {
    console.log(`Startup matcher listening on http://localhost:${config.port}`);
  });

  process.once("SIGTERM", () => {
    console.info("[api] SIGTERM received, shutting down");
    data.shutdown();
    server.close();
    store.shutdown().catch((error: unknown) => {
      console.error(`[cache] Shutdown failed: ${errorMessage(error)}`);
    });
  });
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
