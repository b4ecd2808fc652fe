import { relative, sep, win32 } from 'path';
import { TRUNCATION_MARKER } from '../types/index.js';

/** Longest path the Win32 API accepts without the extended-length prefix */
export const WINDOWS_MAX_PATH = 260;

/**
 * Address a path so a spawned Windows tool accepts it beyond the normal length
 * limit. Node's own fs calls already do this; other platforms get the path
 * back unchanged.
 */
export function toExtendedPath(filePath: string, platform: NodeJS.Platform = process.platform): string {
  if (platform !== 'win32' || filePath.length < WINDOWS_MAX_PATH) {
    return filePath;
  }
  return win32.toNamespacedPath(filePath);
}

/**
 * Root-relative path with '/' separators, used as the stable sort key
 */
export function toSortKey(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join('/');
}

/** Ordinal (code unit) comparison */
export function compareOrdinal(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Shorten a name to at most `budget` code units as `head + marker + tail`,
 * keeping the last `tailLength` code units. Returns null when the budget
 * cannot hold one head character, the marker and the tail.
 */
export function shortenName(name: string, budget: number, tailLength: number): string | null {
  if (name.length <= budget) {
    return name;
  }

  let tail = name.slice(-tailLength);
  if (tail.length > 0 && isLowSurrogate(tail.charCodeAt(0))) {
    tail = tail.slice(1);
  }

  const headLength = budget - TRUNCATION_MARKER.length - tail.length;
  if (headLength < 1) {
    return null;
  }

  let head = name.slice(0, headLength);
  if (isHighSurrogate(head.charCodeAt(head.length - 1))) {
    head = head.slice(0, -1);
  }
  if (head.length === 0) {
    return null;
  }

  return head + TRUNCATION_MARKER + tail;
}
