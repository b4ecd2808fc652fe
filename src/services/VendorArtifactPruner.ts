import { AuditCode, DEFAULT_VENDOR_RULE, PassName, type PruneRule } from '../types/index.js';
import { ExtensionPruner } from './ExtensionPruner.js';

/**
 * Working files of the desktop accounting application
 */
export class VendorArtifactPruner extends ExtensionPruner {
  readonly name = PassName.VENDOR_ARTIFACTS;
  protected readonly removedCode = AuditCode.VENDOR_ARTIFACT_REMOVED;

  constructor(rule: PruneRule = DEFAULT_VENDOR_RULE) {
    super(rule);
  }
}
