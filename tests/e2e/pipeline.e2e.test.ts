import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { join } from 'path';
import { CleanupPipeline } from '../../src/services/CleanupPipeline.js';
import { PathInvalidError } from '../../src/lib/errors.js';
import { calculateFileChecksum } from '../../src/lib/checksum.js';
import {
  DEFAULT_PATH_TAIL_LENGTH,
  DEFAULT_UNSUPPORTED_RULE,
  DEFAULT_VENDOR_RULE,
  PassName,
  type CleanupConfig,
} from '../../src/types/index.js';
import {
  FakeAttributeStore,
  auditLogPathFor,
  createTempRoot,
  createZipArchive,
  listTree,
  readAuditLog,
  removeTempRoot,
  writeTree,
} from '../helpers.js';

describe('Cleanup pipeline (e2e)', () => {
  let root: string;
  let config: CleanupConfig;
  let store: FakeAttributeStore;

  const longName = 'n'.repeat(80) + '.pdf';
  const shortenedName = 'n'.repeat(43) + '~nnnnnn.pdf';

  beforeEach(async () => {
    root = await createTempRoot();
    config = {
      sourceRoot: root,
      auditLogPath: join(root, '_audit', 'cleanup.log'),
      maxPathLength: root.length + 60,
      pathTailLength: DEFAULT_PATH_TAIL_LENGTH,
      removeEmptyDirectories: true,
      unsupported: DEFAULT_UNSUPPORTED_RULE,
      vendor: DEFAULT_VENDOR_RULE,
    };

    await writeTree(root, {
      'Reports/Q1:summary.docx': 'quarterly numbers',
      'Reports/Q1 copy.docx': 'quarterly numbers',
      'empty.txt': '',
      'archive/inside.txt': 'inside',
      '~$draft.docx': 'lock',
      'books/Company.QBW': 'company file',
      [`long/${longName}`]: 'pdf body',
    });
    await createZipArchive(join(root, 'archive.zip'), [{ name: 'inside.txt', content: 'inside' }]);
    await createZipArchive(join(root, 'solo.zip'), [{ name: 'solo.txt', content: 'only in the archive' }]);

    store = new FakeAttributeStore();
    store.hidden.add(join(root, 'Reports'));
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('should run every pass in order and record each change', async () => {
    const summary = await new CleanupPipeline(config, { attributeStore: store }).run();

    expect(summary.passes.map((p) => p.pass)).toEqual([
      PassName.ATTRIBUTES,
      PassName.NAMES,
      PassName.EMPTY_ITEMS,
      PassName.DUPLICATE_ARCHIVES,
      PassName.DUPLICATE_FILES,
      PassName.UNSUPPORTED_TYPES,
      PassName.VENDOR_ARTIFACTS,
      PassName.PATH_LENGTH,
    ]);
    expect(summary.totals).toEqual({
      HiddenCleared: 1,
      NameSanitized: 1,
      EmptyFileRemoved: 1,
      ArchiveRemoved: 1,
      DuplicateRemoved: 1,
      UnsupportedTypeRemoved: 1,
      VendorArtifactRemoved: 1,
      PathShortened: 1,
    });

    const records = await readAuditLog(config.auditLogPath);
    expect(records.map((r) => [r.action, r.code, r.path, r.target])).toEqual([
      ['cleared', 'HiddenCleared', join(root, 'Reports'), ''],
      ['renamed', 'NameSanitized', join(root, 'Reports', 'Q1:summary.docx'), join(root, 'Reports', 'Q1_summary.docx')],
      ['removed', 'EmptyFileRemoved', join(root, 'empty.txt'), ''],
      ['removed', 'ArchiveRemoved', join(root, 'archive.zip'), join(root, 'archive')],
      ['removed', 'DuplicateRemoved', join(root, 'Reports', 'Q1_summary.docx'), join(root, 'Reports', 'Q1 copy.docx')],
      ['removed', 'UnsupportedTypeRemoved', join(root, '~$draft.docx'), ''],
      ['removed', 'VendorArtifactRemoved', join(root, 'books', 'Company.QBW'), ''],
      ['renamed', 'PathShortened', join(root, 'long', longName), join(root, 'long', shortenedName)],
    ]);

    expect(await listTree(root)).toEqual([
      'Reports/',
      'Reports/Q1 copy.docx',
      '_audit/',
      '_audit/cleanup.log',
      'archive/',
      'archive/inside.txt',
      'books/',
      'long/',
      `long/${shortenedName}`,
      'solo.zip',
    ]);
  });

  it('should leave no two files with the same content', async () => {
    await new CleanupPipeline(config, { attributeStore: store }).run();

    const files = (await listTree(root))
      .filter((path) => !path.endsWith('/') && !path.startsWith('_audit/'))
      .map((path) => join(root, ...path.split('/')));
    const digests = await Promise.all(files.map((file) => calculateFileChecksum(file)));

    expect(new Set(digests).size).toBe(files.length);
  });

  it('should keep every path within the limit', async () => {
    await new CleanupPipeline(config, { attributeStore: store }).run();

    const paths = (await listTree(root)).map((path) => join(root, ...path.split('/')));
    for (const path of paths) {
      expect(path.length).toBeLessThanOrEqual(config.maxPathLength);
    }
  });

  it('should change nothing on a second run', async () => {
    await new CleanupPipeline(config, { attributeStore: store }).run();
    const treeAfterFirstRun = await listTree(root);

    const summary = await new CleanupPipeline(config, { attributeStore: store }).run();

    expect(summary.totals).toEqual({});
    expect(await readAuditLog(config.auditLogPath)).toEqual([]);
    expect(await listTree(root)).toEqual(treeAfterFirstRun);
  });

  it('should record PathInvalid and stop when the root does not exist', async () => {
    const missing = join(root, 'missing');
    const auditLogPath = auditLogPathFor(root);

    await expect(new CleanupPipeline({ ...config, sourceRoot: missing, auditLogPath }).run())
      .rejects.toBeInstanceOf(PathInvalidError);

    const records = await readAuditLog(auditLogPath);
    expect(records.map((r) => [r.action, r.code, r.path])).toEqual([['failed', 'PathInvalid', missing]]);
  });

  it('should record PathInvalid when the root is a file', async () => {
    const filePath = join(root, 'empty.txt');
    const auditLogPath = auditLogPathFor(root);

    await expect(new CleanupPipeline({ ...config, sourceRoot: filePath, auditLogPath }).run())
      .rejects.toThrow(`Source root is not usable: ${filePath} (not a directory)`);

    const records = await readAuditLog(auditLogPath);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      action: 'failed',
      code: 'PathInvalid',
      path: filePath,
      detail: `Source root is not usable: ${filePath} (not a directory)`,
    });
    expect(await listTree(root)).toContain('empty.txt');
  });
});
