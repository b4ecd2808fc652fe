import { join } from 'path';
import { AuditCode, NAME_PLACEHOLDER, PassName, RESERVED_NAME_PATTERN } from '../types/index.js';
import { renameEntry } from '../lib/fsOps.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Replace every reserved character with the placeholder. The result has the
 * same length as the input, so it is never empty.
 */
export function sanitizeName(name: string): string {
  return name.replace(RESERVED_NAME_PATTERN, NAME_PLACEHOLDER);
}

/**
 * Renames entries whose names contain reserved characters. Runs bottom-up so a
 * directory is renamed only after everything beneath it has been handled.
 */
export class NameSanitizer extends CleanupPass {
  readonly name = PassName.NAMES;

  protected async execute(context: PassContext, stats: PassStats): Promise<void> {
    await context.walker.postOrder(context.root, async (entry) => {
      stats.visited++;

      const sanitized = sanitizeName(entry.name);
      if (sanitized === entry.name) {
        return;
      }

      const target = join(entry.parent, sanitized);
      try {
        await renameEntry(entry.path, target);
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
        return;
      }

      context.audit.renamed(AuditCode.NAME_SANITIZED, entry.path, target);
      stats.changed++;
    });
  }
}
