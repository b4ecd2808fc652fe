import { describe, it, expect } from '@jest/globals';
import { join } from 'path';
import { compareOrdinal, shortenName, toExtendedPath, toSortKey } from '../../src/lib/paths.js';

describe('Path utilities', () => {
  describe('toExtendedPath', () => {
    const longName = 'a'.repeat(300);

    it('should leave short Windows paths unchanged', () => {
      expect(toExtendedPath('C:\\data\\file.txt', 'win32')).toBe('C:\\data\\file.txt');
    });

    it('should prefix long drive paths', () => {
      expect(toExtendedPath(`C:\\${longName}`, 'win32')).toBe(`\\\\?\\C:\\${longName}`);
    });

    it('should normalize forward slashes in long paths', () => {
      expect(toExtendedPath(`C:/${longName}`, 'win32')).toBe(`\\\\?\\C:\\${longName}`);
    });

    it('should use the UNC form for long network paths', () => {
      expect(toExtendedPath(`\\\\server\\share\\${longName}`, 'win32'))
        .toBe(`\\\\?\\UNC\\server\\share\\${longName}`);
    });

    it('should not prefix a path twice', () => {
      const extended = `\\\\?\\C:\\${longName}`;
      expect(toExtendedPath(extended, 'win32')).toBe(extended);
    });

    it('should leave paths unchanged on other platforms', () => {
      expect(toExtendedPath(`/srv/${longName}`, 'linux')).toBe(`/srv/${longName}`);
    });
  });

  describe('shortenName', () => {
    it('should return names that already fit', () => {
      expect(shortenName('report.docx', 20, 10)).toBe('report.docx');
    });

    it('should keep the head, the marker and the tail within the budget', () => {
      const shortened = shortenName('abcdefghijklmnopqrstuvwxyz.txt', 20, 8);

      expect(shortened).toBe('abcdefghijk~wxyz.txt');
      expect(shortened).toHaveLength(20);
    });

    it('should return null when the budget cannot hold the tail', () => {
      expect(shortenName('abcdefghijklmnop.txt', 9, 8)).toBeNull();
      expect(shortenName('abcdefghijklmnop.txt', -4, 8)).toBeNull();
    });

    it('should not split surrogate pairs', () => {
      const name = `a\u{1F600}${'x'.repeat(20)}.txt`;

      expect(shortenName(name, 7, 4)).toBe('a~.txt');
    });
  });

  describe('sorting', () => {
    it('should build root-relative keys with forward slashes', () => {
      const root = join('/', 'srv', 'share');

      expect(toSortKey(root, join(root, 'a', 'b.txt'))).toBe('a/b.txt');
    });

    it('should compare by code unit', () => {
      const sorted = ['b', 'a/b', 'a.txt', 'B'].sort(compareOrdinal);

      expect(sorted).toEqual(['B', 'a.txt', 'a/b', 'b']);
    });
  });
});
