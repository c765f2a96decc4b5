/**
 * Hybrid RAG API - Ingestion Pipeline
 *
 * Parsed documents in, indexed chunks out. Documents are handled one at a
 * time; within a document the indexer bounds its own parallelism.
 */

import { ChunkingConfig } from "./config";
import { chunkDocument, DEFAULT_CHUNKING } from "./chunking";
import { ChunkIndexer } from "./indexer";
import { IngestionResult, ParsedDocument } from "./types";
import { hashText, logInfo, logWarn } from "./utils";

export const SAMPLE_DOCUMENT_ID = 'sample_id';
export const DEFAULT_SAMPLE_TEXT =
  'This is a sample document for checking the retrieval service end to end. ' +
  'It contains a little text that will be chunked, embedded and indexed.';

/** A document as received from a caller; only filename and text are required */
export interface DocumentInput {
  filename: string;
  text: string;
  documentId?: string;
  sourceUrl?: string;
  charCount?: number;
  extractionSuccess?: boolean;
}

export function defaultDocumentId(filename: string): string {
  return `doc_${hashText(filename)}`;
}

export function toParsedDocument(input: DocumentInput): ParsedDocument {
  return {
    documentId: input.documentId || defaultDocumentId(input.filename),
    filename: input.filename,
    text: input.text,
    sourceUrl: input.sourceUrl ?? '',
    charCount: input.charCount ?? input.text.length,
    extractionSuccess: input.extractionSuccess ?? true,
  };
}

export class IngestionPipeline {
  constructor(
    private readonly indexer: ChunkIndexer,
    private readonly chunking: ChunkingConfig = DEFAULT_CHUNKING
  ) {}

  async ingestDocuments(docs: readonly ParsedDocument[]): Promise<IngestionResult> {
    const startTime = Date.now();
    const result: IngestionResult = { documentsProcessed: 0, documentsSkipped: 0, chunksCreated: 0, indexed: 0, errors: 0 };

    for (const doc of docs) {
      if (!doc.extractionSuccess) {
        logWarn('Skipping document with failed extraction', { documentId: doc.documentId, filename: doc.filename });
        result.documentsSkipped++;
        continue;
      }

      const chunks = chunkDocument(doc, this.chunking);
      const { indexed, errors } = await this.indexer.indexChunks(chunks);
      result.documentsProcessed++;
      result.chunksCreated += chunks.length;
      result.indexed += indexed;
      result.errors += errors;
    }

    logInfo('Ingestion complete', { ...result, elapsedMs: Date.now() - startTime });
    return result;
  }

  ingestSampleText(text: string, filename = 'sample.txt'): Promise<IngestionResult> {
    return this.ingestDocuments([
      toParsedDocument({ documentId: SAMPLE_DOCUMENT_ID, filename, text }),
    ]);
  }
}
