import { AuditCode, EntryKind, matchesPruneRule, type PruneRule } from '../types/index.js';
import { removeEntry } from '../lib/fsOps.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Removes every file whose name matches a prune rule
 */
export abstract class ExtensionPruner extends CleanupPass {
  protected abstract readonly removedCode: AuditCode;

  constructor(protected readonly rule: PruneRule) {
    super();
  }

  protected async execute(context: PassContext, stats: PassStats): Promise<void> {
    await context.walker.preOrder(context.root, async (entry) => {
      stats.visited++;

      if (entry.kind !== EntryKind.FILE || !matchesPruneRule(entry.name, this.rule)) {
        return;
      }

      try {
        await removeEntry(entry.path, EntryKind.FILE);
      } catch (error) {
        this.recordError(context, stats, error, entry.path);
        return;
      }

      context.audit.removed(this.removedCode, entry.path);
      stats.changed++;
    });
  }
}
