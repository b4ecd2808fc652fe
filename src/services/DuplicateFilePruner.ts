import { lstat } from 'fs/promises';
import type { Logger } from 'pino';
import { AuditCode, EntryKind, PassName, type ContentDigest } from '../types/index.js';
import { sha256Hasher, type ContentHasher } from '../lib/checksum.js';
import { UnreadableFileError } from '../lib/errors.js';
import { removeEntry } from '../lib/fsOps.js';
import { compareOrdinal, toSortKey } from '../lib/paths.js';
import type { TreeEntry } from '../models/TreeEntry.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

interface SizedFile {
  entry: TreeEntry;
  sortKey: string;
  size: number;
}

/**
 * Removes files whose content matches an earlier file. Files are taken in
 * ordinal order of their root-relative path, so the retained copy of each
 * duplicate set is the one with the lexicographically first path.
 */
export class DuplicateFilePruner extends CleanupPass {
  readonly name = PassName.DUPLICATE_FILES;
  private hasher: ContentHasher;

  constructor(hasher?: ContentHasher) {
    super();
    this.hasher = hasher ?? sha256Hasher;
  }

  protected async execute(context: PassContext, stats: PassStats, logger: Logger): Promise<void> {
    const files = await this.collectSizedFiles(context, stats);
    files.sort((a, b) => compareOrdinal(a.sortKey, b.sortKey));

    // A file with a size no other file has cannot be a duplicate
    const filesPerSize = new Map<number, number>();
    for (const file of files) {
      filesPerSize.set(file.size, (filesPerSize.get(file.size) ?? 0) + 1);
    }

    const seen = new Map<ContentDigest, string>();
    let hashed = 0;

    for (const { entry, size } of files) {
      stats.visited++;

      if (filesPerSize.get(size) === 1) {
        continue;
      }

      let digest: ContentDigest;
      try {
        digest = await this.hasher.hashFile(entry.path);
        hashed++;
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
        continue;
      }

      const retained = seen.get(digest);
      if (retained === undefined) {
        seen.set(digest, entry.path);
        continue;
      }

      try {
        await removeEntry(entry.path, EntryKind.FILE);
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
        continue;
      }

      context.audit.removed(AuditCode.DUPLICATE_REMOVED, entry.path, retained);
      stats.changed++;
    }

    logger.info({ files: files.length, hashed, distinct: seen.size }, 'Duplicate scan finished');
  }

  private async collectSizedFiles(context: PassContext, stats: PassStats): Promise<SizedFile[]> {
    const entries = await context.walker.collectFiles(context.root);
    const files: SizedFile[] = [];

    for (const entry of entries) {
      try {
        const fileStats = await lstat(entry.path);
        files.push({ entry, sortKey: toSortKey(context.root, entry.path), size: fileStats.size });
      } catch (error) {
        this.recordError(context, stats, new UnreadableFileError(entry.path, error), entry.path);
      }
    }

    return files;
  }
}
