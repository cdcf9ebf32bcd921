import express from 'express';
import { BlastCommandRunner, BlastdbcmdFetcher } from './blast.js';
import { buildCatalogue } from './catalogue.js';
import { loadConfig } from './config.js';
import { HyperlinkResolver } from './hyperlink.js';
import { log, setLogLevel } from './log.js';
import { createApp } from './server.js';

/**
 * Start the server
 */
async function bootstrap() {
  const config = await loadConfig();
  setLogLevel(config.logLevel);

  const catalogue = buildCatalogue(config.databases);
  for (const entry of catalogue.byId.values()) {
    log.info(`Found ${entry.type} database: ${entry.title} at ${entry.name}`);
  }
  if (catalogue.errors.length > 0) {
    log.warn('Warnings:', catalogue.errors);
  }
  if (catalogue.byId.size === 0) {
    log.warn('No databases configured; searches will be rejected');
  }
  log.info(`Will use ${config.numThreads} threads to run BLAST.`);

  const commandOptions = { binDir: config.bin };
  const app = createApp({
    catalogue,
    runner: new BlastCommandRunner(commandOptions),
    fetcher: new BlastdbcmdFetcher(commandOptions),
    resolver: new HyperlinkResolver({ mountPath: config.mountPath }),
    numThreads: config.numThreads
  });

  const root = express();
  root.use(config.mountPath || '/', app);

  const server = root.listen(config.port, () => {
    log.info(`seqview listening on http://localhost:${config.port}${config.mountPath}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    log.info(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      log.info('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch(error => {
  log.error('Failed to start server', error);
  process.exit(1);
});
