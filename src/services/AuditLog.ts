import { createWriteStream, type WriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { once } from 'events';
import { dirname, resolve } from 'path';
import { AuditAction, AuditCode } from '../types/index.js';
import { createAuditRecord, formatAuditRecord, type AuditRecord } from '../models/AuditRecord.js';
import type { CleanupError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

/**
 * Append-only audit trail of every mutation and every failure in a run.
 * The file is created or truncated on open; one line per record.
 */
export class AuditLog {
  private stream: WriteStream;
  private logger = getLogger();
  private counts: Map<AuditCode, number> = new Map();
  private streamError: Error | null = null;
  private closed = false;

  private constructor(readonly path: string, stream: WriteStream) {
    this.stream = stream;
    this.stream.on('error', (error) => {
      this.streamError = error;
      this.logger.error({ auditLogPath: path, error }, 'Audit log write failed');
    });
  }

  /**
   * Open (create or truncate) the audit log at the given path
   */
  static async open(filePath: string): Promise<AuditLog> {
    const absolutePath = resolve(filePath);
    await mkdir(dirname(absolutePath), { recursive: true });

    const stream = createWriteStream(absolutePath, { flags: 'w', encoding: 'utf8' });
    await once(stream, 'open');

    return new AuditLog(absolutePath, stream);
  }

  append(record: AuditRecord): void {
    if (this.closed) {
      throw new Error(`Audit log already closed: ${this.path}`);
    }

    this.stream.write(formatAuditRecord(record) + '\n');
    this.counts.set(record.code, (this.counts.get(record.code) ?? 0) + 1);

    const context = {
      action: record.action,
      code: record.code,
      path: record.path,
      target: record.target ?? undefined,
      detail: record.detail ?? undefined,
    };
    if (record.action === AuditAction.FAILED) {
      this.logger.warn(context, 'Action failed');
    } else {
      this.logger.debug(context, 'Action recorded');
    }
  }

  removed(code: AuditCode, path: string, target: string | null = null, detail: string | null = null): void {
    this.append(createAuditRecord(AuditAction.REMOVED, code, path, target, detail));
  }

  renamed(code: AuditCode, path: string, target: string): void {
    this.append(createAuditRecord(AuditAction.RENAMED, code, path, target));
  }

  cleared(code: AuditCode, path: string): void {
    this.append(createAuditRecord(AuditAction.CLEARED, code, path));
  }

  skipped(error: CleanupError): void {
    this.append(createAuditRecord(AuditAction.SKIPPED, error.code, error.path, targetOf(error), error.detail));
  }

  failed(error: CleanupError): void {
    this.append(createAuditRecord(AuditAction.FAILED, error.code, error.path, targetOf(error), error.detail));
  }

  /**
   * Records written so far, per code
   */
  summary(): Partial<Record<AuditCode, number>> {
    return Object.fromEntries(this.counts);
  }

  /**
   * Flush and close the underlying file
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await new Promise<void>((resolveEnd) => {
      this.stream.end(() => resolveEnd());
    });

    if (this.streamError) {
      throw this.streamError;
    }
  }
}

function targetOf(error: CleanupError): string | null {
  return 'target' in error && typeof error.target === 'string' ? error.target : null;
}

/**
 * Run work against an open audit log, closing it on every exit path
 */
export async function withAuditLog<T>(filePath: string, work: (log: AuditLog) => Promise<T>): Promise<T> {
  const log = await AuditLog.open(filePath);
  try {
    return await work(log);
  } finally {
    await log.close();
  }
}
