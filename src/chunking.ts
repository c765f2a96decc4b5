/**
 * Hybrid RAG API - Chunking
 *
 * Splits extracted document text into overlapping chunks for indexing.
 * Uses paragraph and sentence boundary detection with a character-based
 * size window and context overlap carried from the previous chunk.
 */

import { ChunkingConfig } from "./config";
import { Chunk, ParsedDocument } from "./types";
import { estimateTokens, logInfo, logWarn } from "./utils";

// =============================================================================
// Constants
// =============================================================================

/** Pattern for splitting text into paragraphs */
const PARAGRAPH_BOUNDARY = /\n\n+/;

/** Pattern for splitting text into sentences */
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export const DEFAULT_CHUNKING: ChunkingConfig = {
  targetSize: 450,
  minSize: 80,
  maxSize: 700,
  overlap: 75,
};

// =============================================================================
// Text Splitting
// =============================================================================

/**
 * Split text into semantic units (paragraphs, then sentences).
 * Paragraphs are kept whole if under target size, otherwise split into sentences.
 */
function splitIntoSemanticUnits(text: string, targetSize: number): string[] {
  const paragraphs = text.split(PARAGRAPH_BOUNDARY).filter(p => p.trim());
  const units: string[] = [];

  for (const para of paragraphs) {
    if (para.length <= targetSize) {
      units.push(para.trim());
    } else {
      const sentences = para.split(SENTENCE_BOUNDARY).filter(s => s.trim());
      units.push(...sentences.map(s => s.trim()));
    }
  }

  return units;
}

function joinWithContext(context: string, rest: string): string {
  return context ? `${context} ${rest}` : rest;
}

/**
 * Split text into chunk strings.
 *
 * Empty text yields no chunks; text up to `maxSize` characters is a single chunk.
 */
export function splitIntoChunks(text: string, options: ChunkingConfig = DEFAULT_CHUNKING): string[] {
  const normalizedText = text.replace(/\r\n/g, '\n').trim();
  if (!normalizedText) return [];
  if (normalizedText.length <= options.maxSize) return [normalizedText];

  const { targetSize, minSize, maxSize, overlap } = options;
  const units = splitIntoSemanticUnits(normalizedText, targetSize);
  const chunks: string[] = [];
  let currentChunk = '';

  for (const unit of units) {
    const potentialLength = currentChunk.length + (currentChunk ? 1 : 0) + unit.length;

    if (potentialLength > maxSize && currentChunk.length >= minSize) {
      chunks.push(currentChunk);
      currentChunk = joinWithContext(extractOverlapContext(currentChunk, overlap), unit);
    } else {
      currentChunk = currentChunk ? `${currentChunk} ${unit}` : unit;
    }

    // Units without sentence breaks are cut until the remainder fits
    while (currentChunk.length > maxSize) {
      const splitPoint = Math.min(Math.max(findBestSplitPoint(currentChunk, targetSize), 1), maxSize);
      const head = currentChunk.slice(0, splitPoint).trim();
      const rest = currentChunk.slice(splitPoint).trim();
      if (head) chunks.push(head);
      const carried = joinWithContext(extractOverlapContext(head, overlap), rest);
      currentChunk = carried.length < currentChunk.length ? carried : rest;
    }

    if (currentChunk.length >= targetSize && currentChunk.length <= maxSize) {
      const breakPoint = findBestSplitPoint(currentChunk, targetSize);
      if (breakPoint > minSize && breakPoint < currentChunk.length - 50) {
        const head = currentChunk.slice(0, breakPoint);
        chunks.push(head.trim());
        currentChunk = joinWithContext(extractOverlapContext(head, overlap), currentChunk.slice(breakPoint).trim());
      }
    }
  }

  const remainder = currentChunk.trim();
  if (remainder) {
    const last = chunks[chunks.length - 1];
    if (remainder.length >= minSize || last === undefined) {
      chunks.push(remainder);
    } else if (last.length + remainder.length + 1 <= maxSize) {
      chunks[chunks.length - 1] = `${last} ${remainder}`;
    } else {
      chunks.push(remainder);
    }
  }

  return chunks.filter(c => c.length > 0);
}

/**
 * Extract context for overlap, preferring sentence boundaries
 */
function extractOverlapContext(text: string, maxLength: number): string {
  const trimmed = text.trim();
  if (maxLength <= 0) return '';
  if (trimmed.length <= maxLength) return trimmed;

  const suffix = trimmed.slice(-maxLength);

  const sentenceStart = suffix.search(/(?<=[.!?])\s+/);
  if (sentenceStart > 10) {
    return suffix.slice(sentenceStart).trim();
  }

  const wordStart = suffix.indexOf(' ');
  if (wordStart > 0) {
    return suffix.slice(wordStart).trim();
  }

  return suffix.trim();
}

/**
 * Find the best split point near target, preferring sentence boundaries
 */
function findBestSplitPoint(text: string, target: number): number {
  const searchStart = Math.max(0, target - 100);
  const searchEnd = Math.min(text.length, target + 100);
  const window = text.slice(searchStart, searchEnd);

  const sentenceEnd = window.search(/[.!?]\s+/);
  if (sentenceEnd > 0) {
    return searchStart + sentenceEnd + 2;
  }

  const clauseEnd = window.search(/[,;]\s+/);
  if (clauseEnd > 0) {
    return searchStart + clauseEnd + 2;
  }

  const lastSpace = window.lastIndexOf(' ');
  if (lastSpace > 0) {
    return searchStart + lastSpace;
  }

  return target;
}

// =============================================================================
// Document Chunking
// =============================================================================

/**
 * Chunk a parsed document. Chunk ids are assigned sequentially from 0 and
 * every chunk carries the document's display metadata.
 */
export function chunkDocument(doc: ParsedDocument, options: ChunkingConfig = DEFAULT_CHUNKING): Chunk[] {
  if (!doc.text.trim()) {
    logWarn('No text found in document', { filename: doc.filename, documentId: doc.documentId });
    return [];
  }

  const chunks = splitIntoChunks(doc.text, options).map((text, chunkId): Chunk => ({
    chunkId,
    documentId: doc.documentId,
    filename: doc.filename,
    sourceUrl: doc.sourceUrl,
    text,
    tokenCount: estimateTokens(text),
    charCount: text.length,
  }));

  logInfo('Document chunked', {
    documentId: doc.documentId,
    filename: doc.filename,
    inputChars: doc.text.length,
    chunkCount: chunks.length,
  });

  return chunks;
}
