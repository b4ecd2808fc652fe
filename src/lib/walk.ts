import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { resolve } from 'path';
import { EntryKind } from '../types/index.js';
import { createTreeEntry, kindOf, type TreeEntry } from '../models/TreeEntry.js';
import { DirectoryUnreadableError } from './errors.js';
import { compareOrdinal } from './paths.js';

/**
 * Called once per entry. May return the entry's path after the visit (when it
 * was renamed) or null (when it was removed); a directory is descended into at
 * whatever path the visitor reports.
 */
export type EntryVisitor = (entry: TreeEntry) => Promise<string | null | void>;

export interface TreeWalkerOptions {
  /** Absolute paths left out of every listing */
  exclude?: Iterable<string>;

  /** Receives directories that cannot be listed; their subtree is skipped */
  onUnreadable?: (error: DirectoryUnreadableError) => void;
}

/**
 * Sequential directory traversal. Listings are sorted by ordinal name
 * comparison, and each directory is listed only when the walk reaches it, so
 * children are always resolved against the parent's current path.
 */
export class TreeWalker {
  private exclude: Set<string>;
  private onUnreadable: (error: DirectoryUnreadableError) => void;

  constructor(options: TreeWalkerOptions = {}) {
    this.exclude = new Set([...(options.exclude ?? [])].map((p) => resolve(p)));
    this.onUnreadable = options.onUnreadable ?? ((error) => {
      throw error;
    });
  }

  async listEntries(directory: string): Promise<TreeEntry[]> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new DirectoryUnreadableError(directory, error);
    }

    return dirents
      .map((dirent) => createTreeEntry(directory, dirent.name, kindOf(dirent)))
      .filter((entry) => !this.exclude.has(entry.path))
      .sort((a, b) => compareOrdinal(a.name, b.name));
  }

  /**
   * Visit each entry before its children
   */
  async preOrder(root: string, visit: EntryVisitor): Promise<void> {
    const entries = await this.tryList(root);

    for (const entry of entries) {
      const current = await visit(entry);

      if (entry.kind === EntryKind.DIRECTORY && current !== null) {
        await this.preOrder(typeof current === 'string' ? current : entry.path, visit);
      }
    }
  }

  /**
   * Visit each entry after its children
   */
  async postOrder(root: string, visit: EntryVisitor): Promise<void> {
    const entries = await this.tryList(root);

    for (const entry of entries) {
      if (entry.kind === EntryKind.DIRECTORY) {
        await this.postOrder(entry.path, visit);
      }
      await visit(entry);
    }
  }

  /**
   * All regular files under root
   */
  async collectFiles(root: string): Promise<TreeEntry[]> {
    const files: TreeEntry[] = [];

    await this.preOrder(root, async (entry) => {
      if (entry.kind === EntryKind.FILE) {
        files.push(entry);
      }
    });

    return files;
  }

  private async tryList(directory: string): Promise<TreeEntry[]> {
    try {
      return await this.listEntries(directory);
    } catch (error) {
      if (error instanceof DirectoryUnreadableError) {
        this.onUnreadable(error);
        return [];
      }
      throw error;
    }
  }
}
