/**
 * Hybrid RAG API - Application Context
 *
 * Every long-lived collaborator is built once here and handed to the
 * components that need it. Nothing else holds a client.
 */

import { AppConfig } from "./config";
import { SearchStore } from "./searchStore";
import { createElasticClient, ElasticSearchStore } from "./elasticStore";
import { InMemorySearchStore } from "./memoryStore";
import { createGenAIClient } from "./genaiClient";
import { DenseModel, ElserSparseModel, EmbeddingGenerator, GeminiDenseModel, SparseModel } from "./embeddings";
import { ChunkIndexer } from "./indexer";
import { HybridRetriever } from "./retrieval";
import { CachedRetriever } from "./cache";
import { IngestionPipeline } from "./ingestion";
import { AnswerGenerator, GeminiLanguageModel, LanguageModel } from "./generation";
import { logInfo, logWarn } from "./utils";

export interface AppContext {
  config: AppConfig;
  store: SearchStore;
  embeddings: EmbeddingGenerator;
  indexer: ChunkIndexer;
  retriever: CachedRetriever;
  ingestion: IngestionPipeline;
  generator: AnswerGenerator;
}

export interface AppDependencies {
  config: AppConfig;
  store: SearchStore;
  dense: DenseModel | null;
  sparse: SparseModel | null;
  languageModel: LanguageModel | null;
}

/** Wire the components around already-built models and store */
export function buildAppContext(deps: AppDependencies): AppContext {
  const { config, store } = deps;

  const embeddings = new EmbeddingGenerator(deps.dense, deps.sparse, {
    denseTimeoutMs: config.dense.timeoutMs,
    denseMaxRetries: config.dense.maxRetries,
    sparseTimeoutMs: config.sparse.timeoutMs,
  });
  const indexer = new ChunkIndexer(store, embeddings, { concurrency: config.indexing.concurrency });
  const retriever = new CachedRetriever(
    new HybridRetriever(store, embeddings, config.retrieval),
    config.cache
  );

  return {
    config,
    store,
    embeddings,
    indexer,
    retriever,
    ingestion: new IngestionPipeline(indexer, config.chunking),
    generator: new AnswerGenerator(deps.languageModel),
  };
}

/** Build clients and models from configuration, then make sure the index exists */
export async function createAppContext(config: AppConfig): Promise<AppContext> {
  let store: SearchStore;
  let sparse: SparseModel | null = null;

  if (config.store.backend === 'elasticsearch') {
    const client = createElasticClient(config.store);
    store = new ElasticSearchStore(client, config.store.index, config.dense.dimensions, config.store.refreshOnWrite);
    if (config.sparse.enabled) {
      sparse = new ElserSparseModel(client, config.sparse.modelId, config.sparse.inputField, config.sparse.timeoutMs);
    }
  } else {
    store = new InMemorySearchStore();
    if (config.sparse.enabled) {
      logWarn('Sparse expansion needs the Elasticsearch backend; disabled', { backend: config.store.backend });
    }
  }

  const genai = createGenAIClient(config.genai);
  const dense = genai && config.dense.enabled
    ? new GeminiDenseModel(genai, config.dense.model, config.dense.dimensions)
    : null;
  const languageModel = genai
    ? new GeminiLanguageModel(genai, config.chat.model, {
        temperature: config.chat.temperature,
        maxOutputTokens: config.chat.maxOutputTokens,
      })
    : null;

  const ctx = buildAppContext({ config, store, dense, sparse, languageModel });
  const indexStatus = await ctx.indexer.ensureIndex();

  logInfo('Application context ready', {
    store: store.getName(),
    index: config.store.index,
    indexStatus,
    denseModel: ctx.embeddings.denseModelName ?? null,
    sparseModel: ctx.embeddings.sparseModelName ?? null,
    chatModel: ctx.generator.modelName,
  });
  return ctx;
}
