/**
 * Hybrid RAG API - Configuration
 *
 * Centralized configuration loaded from environment variables.
 * All config values have sensible defaults for local development.
 */

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Helpers
// =============================================================================

function envInt(env: Env, key: string, defaultValue: number): number {
  const val = env[key];
  if (!val) return defaultValue;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envFloat(env: Env, key: string, defaultValue: number): number {
  const val = env[key];
  if (!val) return defaultValue;
  const parsed = parseFloat(val);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envBool(env: Env, key: string, defaultValue: boolean): boolean {
  const val = env[key]?.toLowerCase();
  if (!val) return defaultValue;
  return val === 'true' || val === '1';
}

function envString(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

// =============================================================================
// Types
// =============================================================================

export type StoreBackend = 'elasticsearch' | 'memory';
export type GenAIMode = 'apikey' | 'vertex';

export interface ChunkingConfig {
  targetSize: number;
  minSize: number;
  maxSize: number;
  overlap: number;
}

export interface AppConfig {
  port: number;
  allowedOrigins: string[];
  store: {
    backend: StoreBackend;
    url: string;
    index: string;
    apiKey: string;
    refreshOnWrite: boolean;
  };
  chunking: ChunkingConfig;
  genai: {
    mode: GenAIMode;
    apiKey: string;
    projectId: string;
    location: string;
  };
  dense: {
    enabled: boolean;
    model: string;
    dimensions: number;
    timeoutMs: number;
    maxRetries: number;
  };
  sparse: {
    enabled: boolean;
    modelId: string;
    inputField: string;
    timeoutMs: number;
  };
  indexing: {
    concurrency: number;
  };
  retrieval: {
    rrfK: number;
    minCandidatesPerSignal: number;
    signalTimeoutMs: number;
  };
  cache: {
    ttlMs: number;
    maxSize: number;
  };
  chat: {
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };
}

// =============================================================================
// Loader
// =============================================================================

export function loadConfig(env: Env = process.env): AppConfig {
  const backend = envString(env, 'STORE_BACKEND', 'elasticsearch') === 'memory' ? 'memory' : 'elasticsearch';
  const mode = envString(env, 'GENAI_MODE', 'apikey') === 'vertex' ? 'vertex' : 'apikey';

  return {
    port: envInt(env, 'PORT', 8080),
    allowedOrigins: envString(env, 'ALLOWED_ORIGINS', '*').split(','),

    // Document store
    store: {
      backend,
      url: envString(env, 'ELASTICSEARCH_URL', 'http://localhost:9200'),
      index: envString(env, 'ELASTICSEARCH_INDEX', 'rag_documents'),
      apiKey: envString(env, 'ELASTICSEARCH_API_KEY', ''),
      refreshOnWrite: envBool(env, 'ELASTICSEARCH_REFRESH_ON_WRITE', false),
    },

    // Chunk sizes are in characters
    chunking: {
      targetSize: envInt(env, 'CHUNK_TARGET_SIZE', 450),
      minSize: envInt(env, 'CHUNK_MIN_SIZE', 80),
      maxSize: envInt(env, 'CHUNK_MAX_SIZE', 700),
      overlap: envInt(env, 'CHUNK_OVERLAP', 75),
    },

    genai: {
      mode,
      apiKey: env.GOOGLE_API_KEY || env.GEMINI_API_KEY || '',
      projectId: envString(env, 'GOOGLE_CLOUD_PROJECT', '') || envString(env, 'GCLOUD_PROJECT', ''),
      location: envString(env, 'VERTEX_AI_LOCATION', 'us-central1'),
    },

    dense: {
      enabled: envBool(env, 'EMBEDDINGS_ENABLED', true),
      model: envString(env, 'EMBEDDING_MODEL', 'text-embedding-004'),
      dimensions: envInt(env, 'EMBEDDING_DIMENSIONS', 768),
      timeoutMs: envInt(env, 'EMBEDDING_TIMEOUT_MS', 15000),
      maxRetries: envInt(env, 'EMBEDDING_MAX_RETRIES', 2),
    },

    // ELSER runs inside the Elasticsearch cluster
    sparse: {
      enabled: envBool(env, 'SPARSE_ENABLED', true),
      modelId: envString(env, 'SPARSE_MODEL_ID', '.elser_model_2'),
      inputField: envString(env, 'SPARSE_INPUT_FIELD', 'text_field'),
      timeoutMs: envInt(env, 'SPARSE_TIMEOUT_MS', 30000),
    },

    indexing: {
      concurrency: Math.max(1, envInt(env, 'INDEX_CONCURRENCY', 8)),
    },

    retrieval: {
      rrfK: envFloat(env, 'RRF_K', 60),
      minCandidatesPerSignal: envInt(env, 'RETRIEVAL_MIN_CANDIDATES', 20),
      signalTimeoutMs: envInt(env, 'RETRIEVAL_SIGNAL_TIMEOUT_MS', 10000),
    },

    cache: {
      ttlMs: envInt(env, 'RETRIEVAL_CACHE_TTL_MS', 5 * 60 * 1000),
      maxSize: envInt(env, 'RETRIEVAL_CACHE_MAX_SIZE', 200),
    },

    chat: {
      model: envString(env, 'CHAT_MODEL', 'gemini-2.0-flash'),
      temperature: envFloat(env, 'CHAT_TEMPERATURE', 0.1),
      maxOutputTokens: envInt(env, 'LLM_MAX_OUTPUT_TOKENS', 1024),
    },
  };
}
