/** Hybrid RAG API - Utility Functions */

import * as crypto from "crypto";
import { AsyncLocalStorage } from 'async_hooks';

export function sanitizeText(text: string, maxLength: number = 10000): string {
  if (!text || typeof text !== 'string') return '';
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '').normalize('NFC').trim().slice(0, maxLength);
}

export function sanitizeForLogging(text: string, maxLength: number = 100): string {
  return sanitizeText(text, maxLength).replace(/[\n\r]/g, ' ').replace(/\s+/g, ' ');
}

export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text).digest('hex').slice(0, 16);
}

export function estimateTokens(text: string): number { return Math.ceil(text.length / 4); }

// === Request context & structured logging ===

interface RequestContext { requestId: string; startTime: number; path?: string; }
const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string { return `req_${Date.now().toString(36)}_${crypto.randomBytes(4).toString('hex')}`; }
export function withRequestContext<T>(context: RequestContext, fn: () => T): T { return requestContextStorage.run(context, fn); }
export function getRequestContext(): RequestContext | undefined { return requestContextStorage.getStore(); }

function structuredLog(severity: string, message: string, data?: Record<string, unknown>, error?: unknown): void {
  const ctx = getRequestContext();
  const errorInfo = error ? (error instanceof Error ? { errorMessage: error.message, errorStack: error.stack } : { errorMessage: String(error) }) : {};
  const logFn = severity === 'ERROR' ? console.error : console.log;
  logFn(JSON.stringify({ severity, message, requestId: ctx?.requestId, ...errorInfo, ...data, timestamp: new Date().toISOString() }));
}

export function logInfo(message: string, data?: Record<string, unknown>): void { structuredLog('INFO', message, data); }
export function logWarn(message: string, data?: Record<string, unknown>): void { structuredLog('WARNING', message, data); }
export function logError(message: string, error?: unknown, data?: Record<string, unknown>): void { structuredLog('ERROR', message, data, error); }

export function errorMessage(err: unknown): string { return err instanceof Error ? err.message : String(err); }

// === Timeouts ===

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** Race a promise against a timer; the timer is always cleared */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label = 'Operation'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

// === Vectors & terms ===

/** Cosine similarity with loop unrolling optimization */
export function cosineSimilarity(a: number[] | Float32Array, b: number[] | Float32Array): number {
  const len = a.length; if (len !== b.length || len === 0) return 0;
  let dot = 0, normA = 0, normB = 0, i = 0;
  const limit = len - (len % 4);
  for (; i < limit; i += 4) {
    const a0 = a[i], a1 = a[i+1], a2 = a[i+2], a3 = a[i+3], b0 = b[i], b1 = b[i+1], b2 = b[i+2], b3 = b[i+3];
    dot += a0*b0 + a1*b1 + a2*b2 + a3*b3; normA += a0*a0 + a1*a1 + a2*a2 + a3*a3; normB += b0*b0 + b1*b1 + b2*b2 + b3*b3;
  }
  for (; i < len; i++) { dot += a[i]*b[i]; normA += a[i]*a[i]; normB += b[i]*b[i]; }
  const denom = Math.sqrt(normA * normB); return denom === 0 ? 0 : dot / denom;
}

export function l2Norm(v: number[]): number {
  let sum = 0;
  for (const x of v) sum += x * x;
  return Math.sqrt(sum);
}

/** Scale a vector to unit length; null for zero or non-finite vectors */
export function l2Normalize(v: number[]): number[] | null {
  const norm = l2Norm(v);
  if (norm === 0 || !Number.isFinite(norm)) return null;
  return v.map(x => x / norm);
}

/** Lowercased word tokens, as a standard analyzer would split them */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}_]+/u).filter(t => t.length > 0);
}
