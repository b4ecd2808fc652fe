import type { Logger } from 'pino';
import { AuditCode, PassName } from '../types/index.js';
import { CleanupError, UnreadableFileError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';
import { TreeWalker } from '../lib/walk.js';
import type { AuditLog } from './AuditLog.js';

export interface PassOptions {
  /** Absolute source root; never renamed or removed */
  root: string;
  audit: AuditLog;

  /** Paths every traversal leaves out, such as the audit log */
  exclude?: readonly string[];
}

export interface PassContext {
  root: string;
  audit: AuditLog;
  walker: TreeWalker;
}

export interface PassStats {
  visited: number;
  changed: number;
  failed: number;
}

export interface PassResult extends PassStats {
  pass: PassName;
  durationMs: number;
}

const SKIP_CODES: ReadonlySet<AuditCode> = new Set([
  AuditCode.UNREADABLE_FILE,
  AuditCode.DIRECTORY_UNREADABLE,
]);

/**
 * One full traversal of the tree. Per-entry errors are recorded in the audit
 * log and never end the pass.
 */
export abstract class CleanupPass {
  abstract readonly name: PassName;

  async run(options: PassOptions): Promise<PassResult> {
    const logger = this.createLogger();
    const stats: PassStats = { visited: 0, changed: 0, failed: 0 };
    const startTime = Date.now();

    const walker = new TreeWalker({
      exclude: options.exclude,
      onUnreadable: (error) => {
        stats.failed++;
        options.audit.skipped(error);
      },
    });
    const context: PassContext = { root: options.root, audit: options.audit, walker };

    logger.info({ root: context.root }, 'Pass started');
    await this.execute(context, stats, logger);

    const durationMs = Date.now() - startTime;
    logger.info({ ...stats, durationMs }, 'Pass complete');

    return { pass: this.name, ...stats, durationMs };
  }

  protected abstract execute(context: PassContext, stats: PassStats, logger: Logger): Promise<void>;

  /**
   * Record a per-entry error; anything that is not already a CleanupError is
   * treated as the entry being unreadable.
   */
  protected recordError(context: PassContext, stats: PassStats, error: unknown, path: string): void {
    const cleanupError = error instanceof CleanupError ? error : new UnreadableFileError(path, error);

    stats.failed++;
    if (SKIP_CODES.has(cleanupError.code)) {
      context.audit.skipped(cleanupError);
    } else {
      context.audit.failed(cleanupError);
    }
  }

  private createLogger(): Logger {
    return createChildLogger({ pass: this.name });
  }
}
