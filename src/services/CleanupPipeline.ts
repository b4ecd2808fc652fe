import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { resolve } from 'path';
import { AuditCode, type CleanupConfig } from '../types/index.js';
import type { ContentHasher } from '../lib/checksum.js';
import { PathInvalidError } from '../lib/errors.js';
import type { HiddenAttributeStore } from '../lib/hiddenAttributes.js';
import { getLogger } from '../lib/logger.js';
import { withAuditLog, type AuditLog } from './AuditLog.js';
import type { CleanupPass, PassResult } from './CleanupPass.js';
import { AttributeNormalizer } from './AttributeNormalizer.js';
import { NameSanitizer } from './NameSanitizer.js';
import { EmptyItemPruner } from './EmptyItemPruner.js';
import { DuplicateArchivePruner } from './DuplicateArchivePruner.js';
import { DuplicateFilePruner } from './DuplicateFilePruner.js';
import { UnsupportedTypePruner } from './UnsupportedTypePruner.js';
import { VendorArtifactPruner } from './VendorArtifactPruner.js';
import { PathLengthNormalizer } from './PathLengthNormalizer.js';

export interface PipelineDependencies {
  attributeStore?: HiddenAttributeStore;
  hasher?: ContentHasher;
}

export interface PipelineSummary {
  root: string;
  auditLogPath: string;
  passes: PassResult[];
  totals: Partial<Record<AuditCode, number>>;
  durationMs: number;
}

/**
 * Source root must be an accessible directory
 * @throws PathInvalidError otherwise
 */
export async function assertUsableRoot(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
    await access(root, constants.R_OK | constants.W_OK);
  } catch (error) {
    throw new PathInvalidError(root, 'not accessible', error);
  }

  if (!isDirectory) {
    throw new PathInvalidError(root, 'not a directory');
  }
}

/**
 * Runs every pass, in order, over one source root, recording to one audit log
 */
export class CleanupPipeline {
  private config: CleanupConfig;
  private dependencies: PipelineDependencies;
  private logger = getLogger();

  constructor(config: CleanupConfig, dependencies: PipelineDependencies = {}) {
    this.config = config;
    this.dependencies = dependencies;
  }

  /**
   * Passes in execution order. Empty items are pruned before duplicates, so a
   * directory emptied by duplicate removal is kept.
   */
  createPasses(): CleanupPass[] {
    return [
      new AttributeNormalizer(this.dependencies.attributeStore),
      new NameSanitizer(),
      new EmptyItemPruner(this.config.removeEmptyDirectories),
      new DuplicateArchivePruner(),
      new DuplicateFilePruner(this.dependencies.hasher),
      new UnsupportedTypePruner(this.config.unsupported),
      new VendorArtifactPruner(this.config.vendor),
      new PathLengthNormalizer(this.config.maxPathLength, this.config.pathTailLength),
    ];
  }

  async run(): Promise<PipelineSummary> {
    const root = resolve(this.config.sourceRoot);
    const auditLogPath = resolve(this.config.auditLogPath);
    const startTime = Date.now();

    this.logger.info({ root, auditLogPath }, 'Cleanup run starting');

    // Checked before the log is opened: opening creates the log's directories
    let rootError: PathInvalidError | null = null;
    try {
      await assertUsableRoot(root);
    } catch (error) {
      if (!(error instanceof PathInvalidError)) {
        throw error;
      }
      rootError = error;
    }

    const summary = await withAuditLog(auditLogPath, async (audit): Promise<PipelineSummary> => {
      if (rootError) {
        audit.failed(rootError);
        throw rootError;
      }

      const passes = await this.runPasses(root, audit);

      return {
        root,
        auditLogPath: audit.path,
        passes,
        totals: audit.summary(),
        durationMs: Date.now() - startTime,
      };
    });

    this.logger.info({ totals: summary.totals, durationMs: summary.durationMs }, 'Cleanup run complete');
    return summary;
  }

  private async runPasses(root: string, audit: AuditLog): Promise<PassResult[]> {
    const results: PassResult[] = [];
    for (const pass of this.createPasses()) {
      results.push(await pass.run({ root, audit, exclude: [audit.path] }));
    }
    return results;
  }
}
