import { lstat, rename, rmdir, unlink } from 'fs/promises';
import type { Stats } from 'fs';
import { EntryKind } from '../types/index.js';
import { NameCollisionError, RemovalFailedError, RenameFailedError, errorCode } from './errors.js';

/**
 * lstat that resolves to null when nothing exists at the path
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await lstat(filePath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await statOrNull(filePath)) !== null;
}

/**
 * Rename without ever replacing an existing entry
 * @throws NameCollisionError when the target is taken by another entry
 * @throws RenameFailedError on any OS failure
 */
export async function renameEntry(from: string, to: string): Promise<void> {
  let target: Stats | null;
  let source: Stats | null;
  try {
    target = await statOrNull(to);
    source = target ? await statOrNull(from) : null;
  } catch (error) {
    throw new RenameFailedError(from, to, error);
  }

  // A case-insensitive filesystem reports the source itself for a case-only rename
  const isSameEntry = target !== null && source !== null
    && target.dev === source.dev && target.ino === source.ino;
  if (target && !isSameEntry) {
    throw new NameCollisionError(from, to);
  }

  try {
    await rename(from, to);
  } catch (error) {
    throw new RenameFailedError(from, to, error);
  }
}

/**
 * Remove a file, or a directory that is already empty
 * @throws RemovalFailedError on any OS failure
 */
export async function removeEntry(filePath: string, kind: EntryKind): Promise<void> {
  try {
    if (kind === EntryKind.DIRECTORY) {
      await rmdir(filePath);
    } else {
      await unlink(filePath);
    }
  } catch (error) {
    throw new RemovalFailedError(filePath, error);
  }
}
