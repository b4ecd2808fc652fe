import { readdir } from 'fs/promises';
import { AuditCode, EntryKind, PassName } from '../types/index.js';
import { DirectoryUnreadableError, UnreadableFileError } from '../lib/errors.js';
import { removeEntry, statOrNull } from '../lib/fsOps.js';
import type { TreeEntry } from '../models/TreeEntry.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Removes zero-byte files. With removeEmptyDirectories, a directory is also
 * removed when this pass removed something from it and left it empty.
 */
export class EmptyItemPruner extends CleanupPass {
  readonly name = PassName.EMPTY_ITEMS;

  constructor(private readonly removeEmptyDirectories: boolean = true) {
    super();
  }

  protected async execute(context: PassContext, stats: PassStats): Promise<void> {
    // Directories that lost at least one entry during this pass
    const emptiedDirectories = new Set<string>();

    await context.walker.postOrder(context.root, async (entry) => {
      stats.visited++;

      try {
        const removedCode = await this.pruneIfEmpty(entry, emptiedDirectories);
        if (removedCode) {
          context.audit.removed(removedCode, entry.path);
          emptiedDirectories.add(entry.parent);
          stats.changed++;
        }
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
      }
    });
  }

  private async pruneIfEmpty(entry: TreeEntry, emptiedDirectories: Set<string>): Promise<AuditCode | null> {
    if (entry.kind === EntryKind.FILE) {
      let size: number | undefined;
      try {
        size = (await statOrNull(entry.path))?.size;
      } catch (error) {
        throw new UnreadableFileError(entry.path, error);
      }

      if (size !== 0) {
        return null;
      }
      await removeEntry(entry.path, EntryKind.FILE);
      return AuditCode.EMPTY_FILE_REMOVED;
    }

    if (entry.kind === EntryKind.DIRECTORY && this.removeEmptyDirectories && emptiedDirectories.has(entry.path)) {
      let remaining: string[];
      try {
        remaining = await readdir(entry.path);
      } catch (error) {
        throw new DirectoryUnreadableError(entry.path, error);
      }

      if (remaining.length > 0) {
        return null;
      }
      await removeEntry(entry.path, EntryKind.DIRECTORY);
      return AuditCode.EMPTY_DIRECTORY_REMOVED;
    }

    return null;
  }
}
