import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { createHash } from 'crypto';
import { join } from 'path';
import { calculateFileChecksum } from '../../src/lib/checksum.js';
import { UnreadableFileError } from '../../src/lib/errors.js';
import { AuditCode } from '../../src/types/index.js';
import { createTempRoot, removeTempRoot, writeTree } from '../helpers.js';

describe('Checksum utilities', () => {
  describe('calculateFileChecksum', () => {
    let root: string;

    beforeAll(async () => {
      root = await createTempRoot();
      await writeTree(root, {
        'abc.txt': 'abc',
        'empty.txt': '',
        'first.txt': 'same bytes',
        'nested/second name.bin': 'same bytes',
        'large.bin': Buffer.alloc(3 * 1024 * 1024, 7),
      });
    });

    afterAll(async () => {
      await removeTempRoot(root);
    });

    it('should calculate the SHA256 checksum of a file', async () => {
      const checksum = await calculateFileChecksum(join(root, 'abc.txt'));

      expect(checksum).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should handle an empty file', async () => {
      const checksum = await calculateFileChecksum(join(root, 'empty.txt'));

      expect(checksum).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should not depend on the file name or location', async () => {
      const first = await calculateFileChecksum(join(root, 'first.txt'));
      const second = await calculateFileChecksum(join(root, 'nested', 'second name.bin'));

      expect(first).toBe(second);
    });

    it('should hash files larger than a single read chunk', async () => {
      const checksum = await calculateFileChecksum(join(root, 'large.bin'));

      expect(checksum).toBe(createHash('sha256').update(Buffer.alloc(3 * 1024 * 1024, 7)).digest('hex'));
    });

    it('should reject with UnreadableFileError for a missing file', async () => {
      const missing = join(root, 'missing.txt');

      await expect(calculateFileChecksum(missing)).rejects.toBeInstanceOf(UnreadableFileError);
      await expect(calculateFileChecksum(missing)).rejects.toMatchObject({
        code: AuditCode.UNREADABLE_FILE,
        path: missing,
      });
    });
  });
});
