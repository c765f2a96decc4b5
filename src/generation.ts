/**
 * Hybrid RAG API - Answer Generation
 *
 * Grounded answer over the top retrieved chunks, plus the citations shown
 * beside it. Generation never fails a query: without a model, or when the
 * model errors, a fixed answer is returned with the citations intact.
 */

import type { GoogleGenAI } from "@google/genai";
import { RetrievedChunk } from "./types";
import { logError, logInfo, sanitizeForLogging } from "./utils";

/** Contexts placed in the prompt and cited */
export const MAX_CONTEXTS = 5;
const EXCERPT_LENGTH = 200;

export const NO_DOCUMENTS_ANSWER =
  "I don't have enough information to answer that question as no relevant documents were retrieved.";
export const NOT_ENOUGH_INFO_ANSWER = "I don't have enough information to answer that question.";
export const GENERATION_FAILED_ANSWER = "I'm sorry, there was an error generating an answer to your question.";

const ANSWER_PREFIXES = ['Answer:', 'ANSWER:', 'A:', 'Response:'];

export interface LanguageModel {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export class GeminiLanguageModel implements LanguageModel {
  constructor(
    private readonly client: GoogleGenAI,
    readonly name: string,
    private readonly options: GenerationOptions
  ) {}

  async generate(prompt: string): Promise<string> {
    const result = await this.client.models.generateContent({
      model: this.name,
      contents: prompt,
      config: {
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens,
      },
    });
    return result.text ?? '';
  }
}

export interface Citation {
  sourceId: number;
  filename: string;
  chunkId: number;
  excerpt: string;
  score: number;
  sourceUrl: string;
}

export interface GeneratedAnswer {
  answer: string;
  citations: Citation[];
  model: string | null;
}

export function buildPrompt(question: string, results: readonly RetrievedChunk[]): string {
  const context = results
    .slice(0, MAX_CONTEXTS)
    .map((r, i) => `Document ${i + 1} (${r.filename}):\n${r.content}`)
    .join('\n\n');

  return `Based on the following documents, answer the question clearly and concisely. If the information is not available in the documents, say "${NOT_ENOUGH_INFO_ANSWER}"

DOCUMENTS:
${context}

QUESTION: ${question}

ANSWER:`;
}

export function formatCitations(results: readonly RetrievedChunk[]): Citation[] {
  return results.slice(0, MAX_CONTEXTS).map((r, i) => ({
    sourceId: i + 1,
    filename: r.filename,
    chunkId: r.chunkId,
    excerpt: r.content.length > EXCERPT_LENGTH ? `${r.content.slice(0, EXCERPT_LENGTH)}...` : r.content,
    score: Math.round(r.score * 10000) / 10000,
    sourceUrl: r.sourceUrl,
  }));
}

/** Drop a leading "Answer:"-style label the model sometimes echoes */
export function cleanAnswer(raw: string): string {
  let answer = raw.trim();
  for (const prefix of ANSWER_PREFIXES) {
    if (answer.startsWith(prefix)) answer = answer.slice(prefix.length).trim();
  }
  return answer || NOT_ENOUGH_INFO_ANSWER;
}

export class AnswerGenerator {
  constructor(private readonly model: LanguageModel | null) {}

  get modelName(): string | null {
    return this.model?.name ?? null;
  }

  async generate(question: string, results: readonly RetrievedChunk[]): Promise<GeneratedAnswer> {
    const model = this.modelName;
    if (results.length === 0) {
      return { answer: NO_DOCUMENTS_ANSWER, citations: [], model };
    }

    const citations = formatCitations(results);
    if (!this.model) {
      logError('Answer generation unavailable', new Error('No language model configured'));
      return { answer: GENERATION_FAILED_ANSWER, citations, model };
    }

    const startTime = Date.now();
    try {
      const raw = await this.model.generate(buildPrompt(question, results));
      logInfo('Answer generated', {
        model,
        question: sanitizeForLogging(question),
        contexts: Math.min(results.length, MAX_CONTEXTS),
        elapsedMs: Date.now() - startTime,
      });
      return { answer: cleanAnswer(raw), citations, model };
    } catch (err) {
      logError('Answer generation failed', err, { model });
      return { answer: GENERATION_FAILED_ANSWER, citations, model };
    }
  }
}
