/**
 * Hybrid RAG API - Server entry point
 */

import { loadConfig } from "./config";
import { createAppContext } from "./context";
import { createApp } from "./app";
import { logError, logInfo } from "./utils";

const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const config = loadConfig();
  const ctx = await createAppContext(config);
  const app = createApp(ctx);

  const server = app.listen(config.port, () => {
    logInfo('hybrid-rag-api started', {
      port: config.port,
      store: ctx.store.getName(),
      index: config.store.index,
    });
  });

  function gracefulShutdown(signal: string): void {
    logInfo(`${signal} received, starting graceful shutdown`);
    ctx.retriever.stop();

    server.close((err) => {
      if (err) {
        logError('Error during server close', err);
        process.exit(1);
      }
      logInfo('Server closed gracefully');
      process.exit(0);
    });

    // Force shutdown if graceful close takes too long
    setTimeout(() => {
      logError('Graceful shutdown timeout, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logError('Failed to start server', err);
  process.exit(1);
});
