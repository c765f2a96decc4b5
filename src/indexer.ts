/**
 * Hybrid RAG API - Chunk Indexer
 *
 * Turns chunks into store documents carrying every representation that
 * could be computed, and writes them under their composite key.
 * A chunk that fails is tallied and logged; the batch always completes.
 */

import { Chunk, ChunkDocument, DenseVector, EmbeddingResult, IndexingResult, SparseVector, makeChunkKey } from "./types";
import { EmbeddingGenerator } from "./embeddings";
import { IndexStatus, SearchStore } from "./searchStore";
import { logError, logInfo, logWarn } from "./utils";

export interface ChunkIndexerOptions {
  /** Chunks embedded and written at the same time */
  concurrency: number;
}

const DEFAULT_CONCURRENCY = 8;

/** Store document for a chunk; model ids are recorded only beside a present embedding */
export function buildChunkDocument(
  chunk: Chunk,
  dense: EmbeddingResult<DenseVector>,
  sparse: EmbeddingResult<SparseVector>,
  modelNames: { dense?: string; sparse?: string },
  indexedAt: Date = new Date()
): ChunkDocument {
  const doc: ChunkDocument = {
    text: chunk.text,
    content: chunk.text,
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    filename: chunk.filename,
    sourceUrl: chunk.sourceUrl,
    tokenCount: chunk.tokenCount,
    charCount: chunk.charCount,
    indexedAt: indexedAt.toISOString(),
  };
  if (dense.kind === 'present') {
    doc.denseEmbedding = dense.value;
    doc.denseModel = modelNames.dense;
  }
  if (sparse.kind === 'present') {
    doc.sparseEmbedding = sparse.value;
    doc.sparseModel = modelNames.sparse;
  }
  return doc;
}

export class ChunkIndexer {
  private readonly concurrency: number;

  constructor(
    private readonly store: SearchStore,
    private readonly embeddings: EmbeddingGenerator,
    options: Partial<ChunkIndexerOptions> = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  ensureIndex(): Promise<IndexStatus> {
    return this.store.ensureIndex();
  }

  async indexChunks(chunks: readonly Chunk[]): Promise<IndexingResult> {
    if (chunks.length === 0) return { indexed: 0, errors: 0 };

    const startTime = Date.now();
    const pairs = await this.embeddings.generateSparseBatch(chunks);

    let indexed = 0;
    let errors = 0;
    for (let i = 0; i < pairs.length; i += this.concurrency) {
      const slice = pairs.slice(i, i + this.concurrency);
      const outcomes = await Promise.all(slice.map(({ item, sparse }) => this.indexOne(item, sparse)));
      for (const ok of outcomes) {
        if (ok) indexed++;
        else errors++;
      }
    }

    logInfo('Chunks indexed', {
      store: this.store.getName(),
      total: chunks.length,
      indexed,
      errors,
      elapsedMs: Date.now() - startTime,
    });
    return { indexed, errors };
  }

  private async indexOne(chunk: Chunk, sparse: EmbeddingResult<SparseVector>): Promise<boolean> {
    const key = makeChunkKey(chunk.documentId, chunk.chunkId);
    try {
      const dense = await this.embeddings.generateDense(chunk.text);
      const doc = buildChunkDocument(chunk, dense, sparse, {
        dense: this.embeddings.denseModelName,
        sparse: this.embeddings.sparseModelName,
      });
      const result = await this.store.upsert(key, doc);
      if (result === 'noop') {
        logWarn('Chunk write had no effect', { key });
        return false;
      }
      return true;
    } catch (err) {
      logError('Failed to index chunk', err, { key });
      return false;
    }
  }
}
