import { AuditCode, DEFAULT_UNSUPPORTED_RULE, PassName, type PruneRule } from '../types/index.js';
import { ExtensionPruner } from './ExtensionPruner.js';

/**
 * File types the destination library rejects, plus transient lock files
 */
export class UnsupportedTypePruner extends ExtensionPruner {
  readonly name = PassName.UNSUPPORTED_TYPES;
  protected readonly removedCode = AuditCode.UNSUPPORTED_TYPE_REMOVED;

  constructor(rule: PruneRule = DEFAULT_UNSUPPORTED_RULE) {
    super(rule);
  }
}
