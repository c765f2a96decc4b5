/**
 * Hybrid RAG API - Elasticsearch Store
 *
 * Chunk documents live in one index holding the text, dense vector and
 * sparse expansion of every chunk. Document ids are the chunk composite key,
 * so indexing the same key twice overwrites in place.
 */

import { Client, errors } from "@elastic/elasticsearch";
import type { estypes } from "@elastic/elasticsearch";
import { AppConfig } from "./config";
import { ChunkDocument, DenseVector, SparseVector } from "./types";
import { ChunkSource, IndexStatus, SearchStore, StoreHealth, StoreHit, UpsertResult } from "./searchStore";
import { buildDenseSearch, buildIndexMappings, buildLexicalSearch, buildSparseSearch, mapSearchHits } from "./elasticQueries";
import { errorMessage, logError, logInfo } from "./utils";

export function createElasticClient(config: AppConfig['store']): Client {
  return new Client({
    node: config.url,
    ...(config.apiKey ? { auth: { apiKey: config.apiKey } } : {}),
  });
}

function isStatus(err: unknown, statusCode: number): err is errors.ResponseError {
  return err instanceof errors.ResponseError && err.statusCode === statusCode;
}

export function normalizeHealthStatus(status: string): StoreHealth['status'] {
  const lower = status.toLowerCase();
  return lower === 'green' || lower === 'yellow' || lower === 'red' ? lower : 'unavailable';
}

/** The slice of the Elasticsearch client the store calls */
export interface ElasticIndexClient {
  indices: {
    exists(params: estypes.IndicesExistsRequest): Promise<boolean>;
    create(params: estypes.IndicesCreateRequest): Promise<estypes.IndicesCreateResponse>;
  };
  cluster: {
    health(): Promise<estypes.ClusterHealthResponse>;
  };
  index(params: estypes.IndexRequest<ChunkDocument>): Promise<estypes.IndexResponse>;
  get(params: estypes.GetRequest): Promise<estypes.GetResponse<ChunkDocument>>;
  count(params: estypes.CountRequest): Promise<estypes.CountResponse>;
  search(params: estypes.SearchRequest): Promise<estypes.SearchResponse<ChunkSource>>;
}

export class ElasticSearchStore implements SearchStore {
  constructor(
    private readonly client: ElasticIndexClient,
    private readonly index: string,
    private readonly dimensions: number,
    private readonly refreshOnWrite: boolean = false
  ) {}

  getName(): string { return 'elasticsearch'; }

  async ensureIndex(): Promise<IndexStatus> {
    if (await this.client.indices.exists({ index: this.index })) {
      logInfo('Index already exists', { index: this.index });
      return 'exists';
    }

    try {
      await this.client.indices.create({ index: this.index, mappings: buildIndexMappings(this.dimensions) });
      logInfo('Index created', { index: this.index, dimensions: this.dimensions });
      return 'created';
    } catch (err) {
      // Another process created it between the check and the create
      if (isStatus(err, 400) && err.message.includes('resource_already_exists_exception')) {
        logInfo('Index created concurrently', { index: this.index });
        return 'exists';
      }
      logError('Failed to create index', err, { index: this.index });
      throw err;
    }
  }

  async upsert(id: string, doc: ChunkDocument): Promise<UpsertResult> {
    const response = await this.client.index({
      index: this.index,
      id,
      document: doc,
      refresh: this.refreshOnWrite ? 'wait_for' : false,
    });
    return response.result === 'created' || response.result === 'updated' ? response.result : 'noop';
  }

  async get(id: string): Promise<ChunkDocument | null> {
    try {
      const response = await this.client.get({ index: this.index, id });
      return response.found && response._source ? response._source : null;
    } catch (err) {
      if (isStatus(err, 404)) return null;
      throw err;
    }
  }

  async count(): Promise<number> {
    return (await this.client.count({ index: this.index })).count;
  }

  async searchLexical(query: string, size: number): Promise<StoreHit[]> {
    return this.search(buildLexicalSearch(this.index, query, size));
  }

  async searchDense(vector: DenseVector, size: number): Promise<StoreHit[]> {
    return this.search(buildDenseSearch(this.index, vector, size));
  }

  async searchSparse(vector: SparseVector, size: number): Promise<StoreHit[]> {
    if (Object.keys(vector).length === 0) return [];
    return this.search(buildSparseSearch(this.index, vector, size));
  }

  async healthCheck(): Promise<StoreHealth> {
    try {
      const health = await this.client.cluster.health();
      return { status: normalizeHealthStatus(health.status) };
    } catch (err) {
      logError('Elasticsearch health check failed', err);
      return { status: 'unavailable', error: errorMessage(err) };
    }
  }

  private async search(request: estypes.SearchRequest): Promise<StoreHit[]> {
    const response = await this.client.search(request);
    return mapSearchHits(response);
  }
}
