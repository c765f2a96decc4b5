/**
 * In-process search store for local development and tests.
 *
 * Mirrors the Elasticsearch backend's three query types: BM25 over `text`,
 * dot product over unit-length dense vectors, and weighted-term overlap over
 * sparse expansions. Fine for small corpora; every query scans all documents.
 */

import { ChunkDocument, DenseVector, SparseVector } from "./types";
import { IndexStatus, SearchStore, StoreHealth, StoreHit, UpsertResult, toChunkSource } from "./searchStore";
import { cosineSimilarity, logInfo, tokenize } from "./utils";

// Standard BM25 parameters
const BM25_K1 = 1.2;
const BM25_B = 0.75;

interface StoredDoc {
  doc: ChunkDocument;
  termFreqs: Map<string, number>;
  length: number;
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const freqs = new Map<string, number>();
  for (const t of tokens) freqs.set(t, (freqs.get(t) ?? 0) + 1);
  return freqs;
}

/** Score descending, id ascending for equal scores */
function rankHits(hits: StoreHit[], size: number): StoreHit[] {
  return hits
    .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .slice(0, size);
}

export class InMemorySearchStore implements SearchStore {
  private docs = new Map<string, StoredDoc>();
  private indexCreated = false;

  getName(): string { return 'memory'; }

  async ensureIndex(): Promise<IndexStatus> {
    if (this.indexCreated) return 'exists';
    this.indexCreated = true;
    logInfo('In-memory index created');
    return 'created';
  }

  async upsert(id: string, doc: ChunkDocument): Promise<UpsertResult> {
    const existed = this.docs.has(id);
    const tokens = tokenize(doc.text);
    this.docs.set(id, { doc: structuredClone(doc), termFreqs: termFrequencies(tokens), length: tokens.length });
    return existed ? 'updated' : 'created';
  }

  async get(id: string): Promise<ChunkDocument | null> {
    const stored = this.docs.get(id);
    return stored ? structuredClone(stored.doc) : null;
  }

  async count(): Promise<number> {
    return this.docs.size;
  }

  async searchLexical(query: string, size: number): Promise<StoreHit[]> {
    const queryTerms = [...new Set(tokenize(query))];
    const n = this.docs.size;
    if (queryTerms.length === 0 || n === 0) return [];

    let totalLength = 0;
    const docFreq = new Map<string, number>();
    for (const { termFreqs, length } of this.docs.values()) {
      totalLength += length;
      for (const term of queryTerms) {
        if (termFreqs.has(term)) docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }
    const avgLength = totalLength / n || 1;

    const hits: StoreHit[] = [];
    for (const [id, { doc, termFreqs, length }] of this.docs) {
      let score = 0;
      for (const term of queryTerms) {
        const tf = termFreqs.get(term);
        if (!tf) continue;
        const df = docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (n - df + 0.5) / (df + 0.5));
        score += idf * (tf * (BM25_K1 + 1)) / (tf + BM25_K1 * (1 - BM25_B + BM25_B * (length / avgLength)));
      }
      if (score > 0) hits.push({ id, score, source: toChunkSource(doc) });
    }
    return rankHits(hits, size);
  }

  async searchDense(vector: DenseVector, size: number): Promise<StoreHit[]> {
    const hits: StoreHit[] = [];
    for (const [id, { doc }] of this.docs) {
      if (!doc.denseEmbedding || doc.denseEmbedding.length !== vector.length) continue;
      hits.push({ id, score: cosineSimilarity(vector, doc.denseEmbedding), source: toChunkSource(doc) });
    }
    return rankHits(hits, size);
  }

  async searchSparse(vector: SparseVector, size: number): Promise<StoreHit[]> {
    const queryTerms = Object.entries(vector);
    if (queryTerms.length === 0) return [];

    const hits: StoreHit[] = [];
    for (const [id, { doc }] of this.docs) {
      const expansion = doc.sparseEmbedding;
      if (!expansion) continue;
      let score = 0;
      for (const [term, weight] of queryTerms) {
        const docWeight = expansion[term];
        if (docWeight !== undefined) score += weight * docWeight;
      }
      if (score > 0) hits.push({ id, score, source: toChunkSource(doc) });
    }
    return rankHits(hits, size);
  }

  async healthCheck(): Promise<StoreHealth> {
    return { status: 'green' };
  }

  clear(): void {
    this.docs.clear();
  }
}
