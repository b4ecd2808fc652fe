import { join } from 'path';
import { AuditCode, EntryKind, PassName, expandedNameCandidates, isArchiveFile } from '../types/index.js';
import { pathExists, removeEntry } from '../lib/fsOps.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Removes an archive when a sibling named like its expanded contents exists.
 * Only the sibling's existence is checked; the archive is never opened.
 */
export class DuplicateArchivePruner extends CleanupPass {
  readonly name = PassName.DUPLICATE_ARCHIVES;

  protected async execute(context: PassContext, stats: PassStats): Promise<void> {
    await context.walker.preOrder(context.root, async (entry) => {
      stats.visited++;

      if (entry.kind !== EntryKind.FILE || !isArchiveFile(entry.name)) {
        return;
      }

      try {
        const expanded = await this.findExpandedSibling(entry.parent, entry.name);
        if (expanded === null) {
          return;
        }

        await removeEntry(entry.path, EntryKind.FILE);
        context.audit.removed(AuditCode.ARCHIVE_REMOVED, entry.path, expanded, 'expanded copy exists');
        stats.changed++;
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
      }
    });
  }

  private async findExpandedSibling(parent: string, archiveName: string): Promise<string | null> {
    for (const candidate of expandedNameCandidates(archiveName)) {
      const candidatePath = join(parent, candidate);
      if (await pathExists(candidatePath)) {
        return candidatePath;
      }
    }
    return null;
  }
}
