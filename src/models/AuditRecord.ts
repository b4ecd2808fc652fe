import { AuditAction, AuditCode } from '../types/index.js';

export interface AuditRecord {
  /** When the action was attempted */
  readonly timestamp: Date;

  /** Outcome verb */
  readonly action: AuditAction;

  /** Concrete outcome, e.g. DuplicateRemoved or NameCollision */
  readonly code: AuditCode;

  /** Subject path before the action */
  readonly path: string;

  /** New path for renames, retained copy for duplicates */
  readonly target: string | null;

  /** Error detail or context */
  readonly detail: string | null;
}

export function createAuditRecord(
  action: AuditAction,
  code: AuditCode,
  path: string,
  target: string | null = null,
  detail: string | null = null
): AuditRecord {
  return Object.freeze({
    timestamp: new Date(),
    action,
    code,
    path,
    target,
    detail,
  });
}

function escapeField(value: string): string {
  return value
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
}

/**
 * One tab-separated line: timestamp, action, code, path, target, detail
 */
export function formatAuditRecord(record: AuditRecord): string {
  return [
    record.timestamp.toISOString(),
    record.action,
    record.code,
    escapeField(record.path),
    escapeField(record.target ?? ''),
    escapeField(record.detail ?? ''),
  ].join('\t');
}
