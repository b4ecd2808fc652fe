import { execFile } from 'child_process';
import { promisify } from 'util';
import { toExtendedPath } from './paths.js';

const execFileAsync = promisify(execFile);

/**
 * Platform access to the filesystem-level hidden marker
 */
export interface HiddenAttributeStore {
  readonly platform: string;
  isHidden(filePath: string): Promise<boolean>;
  clearHidden(filePath: string): Promise<void>;
}

/**
 * Windows: the H attribute, read and cleared with attrib.exe
 */
export class WindowsAttributeStore implements HiddenAttributeStore {
  readonly platform = 'win32';

  async isHidden(filePath: string): Promise<boolean> {
    const { stdout } = await execFileAsync('attrib', [toExtendedPath(filePath)], { windowsHide: true });
    return parseAttribFlags(stdout).includes('H');
  }

  async clearHidden(filePath: string): Promise<void> {
    await execFileAsync('attrib', ['-H', toExtendedPath(filePath)], { windowsHide: true });
  }
}

/**
 * macOS: the UF_HIDDEN file flag, read with ls -O and cleared with chflags
 */
export class DarwinAttributeStore implements HiddenAttributeStore {
  readonly platform = 'darwin';

  async isHidden(filePath: string): Promise<boolean> {
    const { stdout } = await execFileAsync('ls', ['-ldO', filePath]);
    return parseLsFlags(stdout).includes('hidden');
  }

  async clearHidden(filePath: string): Promise<void> {
    await execFileAsync('chflags', ['-h', 'nohidden', filePath]);
  }
}

/**
 * Filesystems without a hidden attribute; dot-prefixed names are a naming
 * convention there and are left to the name passes.
 */
export class NoHiddenAttributeStore implements HiddenAttributeStore {
  readonly platform = 'none';

  async isHidden(): Promise<boolean> {
    return false;
  }

  async clearHidden(): Promise<void> {
    // nothing to clear
  }
}

/**
 * attrib prints the attribute letters, padded with spaces, before the path
 * (e.g. "A  SH        C:\data\file.txt").
 */
export function parseAttribFlags(output: string): string[] {
  const line = output.split(/\r?\n/).find((l) => l.trim().length > 0) ?? '';
  const pathStart = line.search(/[A-Za-z]:\\|\\\\/);
  const flagColumn = pathStart >= 0 ? line.slice(0, pathStart) : line;
  return flagColumn.replace(/\s+/g, '').split('').filter((flag) => /^[A-Z]$/.test(flag));
}

/**
 * ls -ldO prints the file flags as the fifth column ("-" when none are set)
 */
export function parseLsFlags(output: string): string[] {
  const columns = output.trim().split(/\s+/);
  const flags = columns[4] ?? '-';
  return flags === '-' ? [] : flags.split(',');
}

export function createHiddenAttributeStore(platform: NodeJS.Platform = process.platform): HiddenAttributeStore {
  switch (platform) {
    case 'win32':
      return new WindowsAttributeStore();
    case 'darwin':
      return new DarwinAttributeStore();
    default:
      return new NoHiddenAttributeStore();
  }
}
