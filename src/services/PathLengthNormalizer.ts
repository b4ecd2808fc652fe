import { join, sep } from 'path';
import {
  AuditCode,
  DEFAULT_MAX_PATH_LENGTH,
  DEFAULT_PATH_TAIL_LENGTH,
  EntryKind,
  PassName,
  TRUNCATION_MARKER,
} from '../types/index.js';
import { PathStillTooLongError } from '../lib/errors.js';
import { renameEntry } from '../lib/fsOps.js';
import { shortenName } from '../lib/paths.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Shortens names of entries whose full path is over the limit. Walks top-down
 * and builds each child path from its parent's current path, so a shortened
 * directory is measured at its new location before its children are.
 * Files fill the available length; directories take the shortest form (one
 * leading character, the marker and the tail) to leave room for their contents.
 */
export class PathLengthNormalizer extends CleanupPass {
  readonly name = PassName.PATH_LENGTH;

  constructor(
    private readonly maxPathLength: number = DEFAULT_MAX_PATH_LENGTH,
    private readonly tailLength: number = DEFAULT_PATH_TAIL_LENGTH
  ) {
    super();
  }

  protected async execute(context: PassContext, stats: PassStats): Promise<void> {
    await context.walker.preOrder(context.root, async (entry) => {
      stats.visited++;

      if (entry.path.length <= this.maxPathLength) {
        return;
      }

      try {
        const budget = this.maxPathLength - entry.parent.length - sep.length;
        const shortened = shortenName(entry.name, this.nameBudget(entry.kind, budget), this.tailLength);
        if (shortened === null) {
          throw new PathStillTooLongError(entry.path, this.maxPathLength);
        }

        const target = join(entry.parent, shortened);
        await renameEntry(entry.path, target);

        context.audit.renamed(AuditCode.PATH_SHORTENED, entry.path, target);
        stats.changed++;
        return target;
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
        return;
      }
    });
  }

  private nameBudget(kind: EntryKind, budget: number): number {
    if (kind !== EntryKind.DIRECTORY) {
      return budget;
    }
    return Math.min(budget, 1 + TRUNCATION_MARKER.length + this.tailLength);
  }
}
