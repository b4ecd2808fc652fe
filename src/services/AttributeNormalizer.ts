import type { Logger } from 'pino';
import { AuditCode, PassName } from '../types/index.js';
import { AttributeFailedError } from '../lib/errors.js';
import { createHiddenAttributeStore, type HiddenAttributeStore } from '../lib/hiddenAttributes.js';
import { CleanupPass, type PassContext, type PassStats } from './CleanupPass.js';

/**
 * Clears the hidden marker on every file and directory under the root
 */
export class AttributeNormalizer extends CleanupPass {
  readonly name = PassName.ATTRIBUTES;
  private store: HiddenAttributeStore;

  constructor(store?: HiddenAttributeStore) {
    super();
    this.store = store ?? createHiddenAttributeStore();
  }

  protected async execute(context: PassContext, stats: PassStats, logger: Logger): Promise<void> {
    logger.debug({ platform: this.store.platform }, 'Using hidden attribute store');

    await context.walker.preOrder(context.root, async (entry) => {
      stats.visited++;

      try {
        if (!(await this.store.isHidden(entry.path))) {
          return;
        }
        await this.store.clearHidden(entry.path);

        // attrib leaves H in place on system files and still exits cleanly
        if (await this.store.isHidden(entry.path)) {
          throw new Error('Hidden attribute still set after clearing');
        }
      } catch (error) {
        this.recordError(context, stats, new AttributeFailedError(entry.path, error), entry.path);
        return;
      }

      context.audit.cleared(AuditCode.HIDDEN_CLEARED, entry.path);
      stats.changed++;
    });
  }
}
