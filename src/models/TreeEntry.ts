import type { Dirent } from 'fs';
import { join } from 'path';
import { EntryKind } from '../types/index.js';

export interface TreeEntry {
  /** Entry name (last path segment) */
  name: string;

  /** Absolute path as of the moment the parent was listed */
  path: string;

  /** Absolute path of the containing directory */
  parent: string;

  /** Symbolic links and special files are OTHER and never followed */
  kind: EntryKind;
}

export function kindOf(dirent: Dirent): EntryKind {
  if (dirent.isFile()) {
    return EntryKind.FILE;
  }
  if (dirent.isDirectory()) {
    return EntryKind.DIRECTORY;
  }
  return EntryKind.OTHER;
}

export function createTreeEntry(parent: string, name: string, kind: EntryKind): TreeEntry {
  return {
    name,
    path: join(parent, name),
    parent,
    kind,
  };
}
