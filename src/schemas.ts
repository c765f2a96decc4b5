/** Zod Validation Schemas - Request validation for the HTTP API */

import { z } from 'zod';
import { SEARCH_MODES } from './types';

// === Query ===
export const QUESTION_MIN_LENGTH = 3;
export const QUESTION_MAX_LENGTH = 1000;
export const TOP_K_MAX = 20;

export const SearchModeSchema = z.enum(SEARCH_MODES);

export const QueryRequestSchema = z.object({
  question: z.string()
    .min(QUESTION_MIN_LENGTH, `Question must be at least ${QUESTION_MIN_LENGTH} characters`)
    .max(QUESTION_MAX_LENGTH, `Question must be at most ${QUESTION_MAX_LENGTH} characters`)
    .refine(q => q.trim().length > 0, { message: 'Question must not be blank' }),
  top_k: z.number().int().min(1).max(TOP_K_MAX).default(5),
  search_mode: SearchModeSchema.default('full_hybrid'),
});
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

// === Ingest ===
export const DocumentInputSchema = z.object({
  filename: z.string().min(1).max(500),
  text: z.string(),
  document_id: z.string().min(1).max(200).optional(),
  source_url: z.string().max(2000).optional(),
  char_count: z.number().int().min(0).optional(),
  extraction_success: z.boolean().optional(),
});
export type DocumentInputBody = z.infer<typeof DocumentInputSchema>;

export const IngestRequestSchema = z.discriminatedUnion('source', [
  z.object({
    source: z.literal('sample'),
    sample_text: z.string().min(1).optional(),
    filename: z.string().min(1).max(500).optional(),
  }),
  z.object({
    source: z.literal('documents'),
    documents: z.array(DocumentInputSchema).min(1).max(100),
  }),
]);
export type IngestRequest = z.infer<typeof IngestRequestSchema>;
