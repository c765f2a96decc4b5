/**
 * Hybrid RAG API - HTTP Application
 *
 * Routes:
 *   GET  /health        store and model status
 *   POST /ingest        chunk, embed and index documents
 *   POST /query         hybrid retrieval plus a grounded answer
 *   GET  /cache/stats   retrieval cache counters
 *   POST /cache/clear   drop every cached retrieval
 */

import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { AppContext } from "./context";
import { IngestRequest, IngestRequestSchema, QueryRequest, QueryRequestSchema } from "./schemas";
import { validateBody } from "./middleware/validation";
import { asyncHandler, errorHandler, Errors, RetrievalFailedError } from "./errors";
import { DEFAULT_SAMPLE_TEXT, toParsedDocument } from "./ingestion";
import { RetrievalResponse } from "./types";
import { generateRequestId, logInfo, sanitizeForLogging, withRequestContext } from "./utils";

export const JSON_BODY_LIMIT = '5mb';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // ============================================
  // Global Middleware
  // ============================================

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));

  const origins = ctx.config.allowedOrigins;
  app.use(cors({
    origin: origins.includes('*') ? '*' : origins,
    maxAge: 86400,
  }));

  app.use(compression());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  // Request context middleware (for request ID correlation)
  app.use((req, res, next) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' && header ? header : generateRequestId();
    res.set('X-Request-Id', requestId);
    withRequestContext({ requestId, startTime: Date.now(), path: req.path }, () => next());
  });

  // ============================================
  // Health
  // ============================================

  app.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const health = await ctx.store.healthCheck();
    const healthy = health.status !== 'unavailable';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      store: {
        backend: ctx.store.getName(),
        index: ctx.config.store.index,
        status: health.status,
        ...(health.error && { error: health.error }),
      },
      models: {
        dense: ctx.embeddings.denseModelName ?? null,
        sparse: ctx.embeddings.sparseModelName ?? null,
        chat: ctx.generator.modelName,
      },
    });
  }));

  // ============================================
  // Ingestion
  // ============================================

  app.post('/ingest', validateBody(IngestRequestSchema), asyncHandler(async (req: Request, res: Response) => {
    const body: IngestRequest = req.body;

    const result = body.source === 'sample'
      ? await ctx.ingestion.ingestSampleText(body.sample_text || DEFAULT_SAMPLE_TEXT, body.filename)
      : await ctx.ingestion.ingestDocuments(body.documents.map(d => toParsedDocument({
          filename: d.filename,
          text: d.text,
          documentId: d.document_id,
          sourceUrl: d.source_url,
          charCount: d.char_count,
          extractionSuccess: d.extraction_success,
        })));

    // Every chunk failed to reach the store
    if (result.chunksCreated > 0 && result.indexed === 0) {
      throw Errors.serviceUnavailable('No chunks could be indexed', {
        source: body.source,
        chunksCreated: result.chunksCreated,
        errors: result.errors,
      });
    }

    res.status(200).json({ status: 'success', source: body.source, ...result });
  }));

  // ============================================
  // Query
  // ============================================

  app.post('/query', validateBody(QueryRequestSchema), asyncHandler(async (req: Request, res: Response) => {
    const { question, top_k: topK, search_mode: searchMode }: QueryRequest = req.body;

    let retrieval: RetrievalResponse;
    try {
      retrieval = await ctx.retriever.retrieve(question, topK, searchMode);
    } catch (err) {
      if (!(err instanceof RetrievalFailedError)) throw err;
      res.status(err.statusCode).json({
        status: 'error',
        question,
        searchMode,
        results: [],
        totalResults: 0,
        error: err.toBody(),
      });
      return;
    }

    const { answer, citations, model } = await ctx.generator.generate(question, retrieval.results);

    logInfo('Query answered', {
      question: sanitizeForLogging(question),
      searchMode,
      topK,
      results: retrieval.results.length,
      failedSignals: retrieval.failedSignals,
    });

    res.status(200).json({
      status: 'success',
      question,
      searchMode,
      results: retrieval.results,
      totalResults: retrieval.results.length,
      failedSignals: retrieval.failedSignals,
      answer,
      citations,
      model,
    });
  }));

  // ============================================
  // Cache
  // ============================================

  app.get('/cache/stats', (_req: Request, res: Response) => {
    res.status(200).json(ctx.retriever.getStats());
  });

  app.post('/cache/clear', (_req: Request, res: Response) => {
    ctx.retriever.clear();
    res.status(200).json({ status: 'cleared' });
  });

  app.use(errorHandler);
  return app;
}
