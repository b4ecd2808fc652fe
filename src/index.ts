#!/usr/bin/env node
import { getConfig } from './config/config.js';
import { initLogger, getLogger } from './lib/logger.js';
import { PathInvalidError } from './lib/errors.js';
import { CleanupPipeline } from './services/CleanupPipeline.js';

async function main() {
  // Load configuration
  const config = getConfig();

  // Initialize logger
  initLogger(config.logging);
  const logger = getLogger();

  logger.info('Migration tree cleaner starting...');
  logger.info({ config: {
    sourceRoot: config.cleanup.sourceRoot,
    auditLogPath: config.cleanup.auditLogPath,
    maxPathLength: config.cleanup.maxPathLength,
    removeEmptyDirectories: config.cleanup.removeEmptyDirectories,
  }}, 'Configuration loaded');

  try {
    const pipeline = new CleanupPipeline(config.cleanup);
    const summary = await pipeline.run();

    for (const pass of summary.passes) {
      logger.info(
        { visited: pass.visited, changed: pass.changed, failed: pass.failed, durationMs: pass.durationMs },
        `Pass ${pass.pass}`
      );
    }
    logger.info({ auditLogPath: summary.auditLogPath, totals: summary.totals }, 'Cleanup finished');
  } catch (error) {
    if (error instanceof PathInvalidError) {
      logger.fatal({ sourceRoot: error.path, detail: error.detail }, error.message);
    } else {
      logger.fatal({ error }, 'Cleanup run aborted');
    }
    process.exitCode = 1;
  }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

// Start application
main().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
