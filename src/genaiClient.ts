/**
 * Hybrid RAG API - GenAI Client Factory
 */

import { GoogleGenAI } from "@google/genai";
import { AppConfig } from "./config";
import { logInfo, logError, logWarn } from "./utils";

export function isGenAIConfigured(config: AppConfig['genai']): boolean {
  if (config.mode === 'vertex') return !!config.projectId;
  return !!config.apiKey;
}

/**
 * Build the shared GenAI client, or null when credentials are missing or
 * construction fails. Callers treat null as "model unavailable".
 */
export function createGenAIClient(config: AppConfig['genai']): GoogleGenAI | null {
  if (!isGenAIConfigured(config)) {
    logWarn('GenAI credentials not configured', {
      mode: config.mode,
      hint: config.mode === 'vertex' ? 'Set GOOGLE_CLOUD_PROJECT' : 'Set GOOGLE_API_KEY or GEMINI_API_KEY',
    });
    return null;
  }

  try {
    const client = config.mode === 'vertex'
      ? new GoogleGenAI({ vertexai: true, project: config.projectId, location: config.location })
      : new GoogleGenAI({ apiKey: config.apiKey });
    logInfo('GenAI client initialized', { mode: config.mode });
    return client;
  } catch (err) {
    logError('Failed to initialize GenAI client', err, { mode: config.mode });
    return null;
  }
}
