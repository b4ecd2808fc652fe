import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { createWriteStream } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import archiver from 'archiver';
import type { HiddenAttributeStore } from '../src/lib/hiddenAttributes.js';
import { withAuditLog } from '../src/services/AuditLog.js';
import type { CleanupPass, PassResult } from '../src/services/CleanupPass.js';

export interface ParsedRecord {
  timestamp: string;
  action: string;
  code: string;
  path: string;
  target: string;
  detail: string;
}

/**
 * Tree description: relative path to file content, or null for a directory
 */
export type TreeSpec = Record<string, string | Buffer | null>;

/**
 * Create an empty temporary source root
 */
export async function createTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'tree-cleaner-'));
}

export function auditLogPathFor(root: string): string {
  return `${root}.audit.log`;
}

/**
 * Remove a temporary root and its sibling audit log
 */
export async function removeTempRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
  await rm(auditLogPathFor(root), { force: true });
}

export async function writeTree(root: string, tree: TreeSpec): Promise<void> {
  for (const [relativePath, content] of Object.entries(tree)) {
    const fullPath = join(root, ...relativePath.split('/'));
    if (content === null) {
      await mkdir(fullPath, { recursive: true });
    } else {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, content);
    }
  }
}

/**
 * Every entry under root as a '/'-separated relative path, directories with a
 * trailing '/', in ordinal order
 */
export async function listTree(root: string, prefix = ''): Promise<string[]> {
  const result: string[] = [];
  const entries = await readdir(join(root, prefix), { withFileTypes: true });

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      result.push(`${relativePath}/`);
      result.push(...(await listTree(root, relativePath)));
    } else {
      result.push(relativePath);
    }
  }

  return result.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function parseAuditLog(text: string): ParsedRecord[] {
  return text
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      const [timestamp, action, code, path, target, detail] = line.split('\t');
      return { timestamp, action, code, path, target, detail };
    });
}

export async function readAuditLog(logPath: string): Promise<ParsedRecord[]> {
  return parseAuditLog(await readFile(logPath, 'utf8'));
}

/**
 * Run one pass over root with an audit log beside it
 */
export async function runPass(
  pass: CleanupPass,
  root: string
): Promise<{ result: PassResult; records: ParsedRecord[] }> {
  const logPath = auditLogPathFor(root);

  const result = await withAuditLog(logPath, (audit) => pass.run({ root, audit, exclude: [audit.path] }));

  return { result, records: await readAuditLog(logPath) };
}

/**
 * Error shaped like the ones Node's fs rejects with
 */
export function osError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

/**
 * In-memory hidden attribute store keyed by absolute path
 */
export class FakeAttributeStore implements HiddenAttributeStore {
  readonly platform = 'fake';
  readonly hidden = new Set<string>();
  readonly denied = new Set<string>();
  /** Paths whose hidden marker survives clearHidden */
  readonly sticky = new Set<string>();

  async isHidden(filePath: string): Promise<boolean> {
    if (this.denied.has(filePath)) {
      throw new Error('Access is denied.');
    }
    return this.hidden.has(filePath);
  }

  async clearHidden(filePath: string): Promise<void> {
    if (this.sticky.has(filePath)) {
      return;
    }
    this.hidden.delete(filePath);
  }
}

/**
 * Create a ZIP archive with files
 */
export async function createZipArchive(
  outputPath: string,
  files: Array<{ name: string; content: string }>
): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });

  return new Promise((resolve, reject) => {
    const output = createWriteStream(outputPath);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve());
    archive.on('error', (err) => reject(err));

    archive.pipe(output);

    files.forEach((file) => {
      archive.append(file.content, { name: file.name });
    });

    archive.finalize().catch(reject);
  });
}
