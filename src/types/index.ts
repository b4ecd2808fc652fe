// ============================================================================
// Enums
// ============================================================================

export enum EntryKind {
  FILE = 'file',
  DIRECTORY = 'directory',
  OTHER = 'other'
}

export enum AuditAction {
  REMOVED = 'removed',
  RENAMED = 'renamed',
  CLEARED = 'cleared',
  SKIPPED = 'skipped',
  FAILED = 'failed'
}

export enum AuditCode {
  HIDDEN_CLEARED = 'HiddenCleared',
  NAME_SANITIZED = 'NameSanitized',
  EMPTY_FILE_REMOVED = 'EmptyFileRemoved',
  EMPTY_DIRECTORY_REMOVED = 'EmptyDirectoryRemoved',
  ARCHIVE_REMOVED = 'ArchiveRemoved',
  DUPLICATE_REMOVED = 'DuplicateRemoved',
  UNSUPPORTED_TYPE_REMOVED = 'UnsupportedTypeRemoved',
  VENDOR_ARTIFACT_REMOVED = 'VendorArtifactRemoved',
  PATH_SHORTENED = 'PathShortened',
  PATH_INVALID = 'PathInvalid',
  UNREADABLE_FILE = 'UnreadableFile',
  DIRECTORY_UNREADABLE = 'DirectoryUnreadable',
  RENAME_FAILED = 'RenameFailed',
  REMOVAL_FAILED = 'RemovalFailed',
  ATTRIBUTE_FAILED = 'AttributeFailed',
  NAME_COLLISION = 'NameCollision',
  PATH_STILL_TOO_LONG = 'PathStillTooLong'
}

export enum PassName {
  ATTRIBUTES = 'attribute-normalizer',
  NAMES = 'name-sanitizer',
  EMPTY_ITEMS = 'empty-item-pruner',
  DUPLICATE_ARCHIVES = 'duplicate-archive-pruner',
  DUPLICATE_FILES = 'duplicate-file-pruner',
  UNSUPPORTED_TYPES = 'unsupported-type-pruner',
  VENDOR_ARTIFACTS = 'vendor-artifact-pruner',
  PATH_LENGTH = 'path-length-normalizer'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface PruneRule {
  /** Lowercase extensions including the leading dot */
  extensions: readonly string[];

  /** Lowercase name prefixes */
  namePrefixes: readonly string[];

  /** Lowercase exact names */
  names: readonly string[];
}

export interface CleanupConfig {
  sourceRoot: string;
  auditLogPath: string;
  maxPathLength: number;
  pathTailLength: number;
  removeEmptyDirectories: boolean;
  unsupported: PruneRule;
  vendor: PruneRule;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
}

export interface AppConfig {
  cleanup: CleanupConfig;
  logging: LoggingConfig;
}

/** Lowercase hex SHA-256 of a file's bytes */
export type ContentDigest = string;

// ============================================================================
// Extension Tables
// ============================================================================

export const ARCHIVE_EXTENSIONS = [
  '.zip',
  '.7z',
  '.rar',
  '.tar',
  '.gz',
  '.tgz',
  '.bz2',
  '.xz',
  '.tar.gz',
  '.tar.bz2',
  '.tar.xz'
] as const;

// * : " < > ? | / \
export const RESERVED_NAME_PATTERN = /[*:"<>?|/\\]/g;

export const NAME_PLACEHOLDER = '_';

export const TRUNCATION_MARKER = '~';

export const DEFAULT_MAX_PATH_LENGTH = 260;

export const DEFAULT_PATH_TAIL_LENGTH = 10;

export const DEFAULT_UNSUPPORTED_RULE: PruneRule = {
  extensions: ['.tmp', '.temp', '.lnk', '.url', '.part', '.partial', '.crdownload'],
  namePrefixes: ['~$'],
  names: ['thumbs.db', 'desktop.ini', '.ds_store'],
};

// Desktop accounting application company files, backups, logs and templates
export const DEFAULT_VENDOR_RULE: PruneRule = {
  extensions: [
    '.qbw', '.qbb', '.qbm', '.qbx', '.qba', '.qby', '.qbr', '.qbt',
    '.tlg', '.nd', '.dsn', '.ecml', '.des', '.adr', '.aif'
  ],
  namePrefixes: [],
  names: [],
};

// ============================================================================
// Type Guards
// ============================================================================

export function isArchiveFile(filename: string): boolean {
  const lowerName = filename.toLowerCase();
  return ARCHIVE_EXTENSIONS.some(ext => lowerName.endsWith(ext));
}

/**
 * Names the archive could have been expanded to, one per recognised suffix
 * ('report.tar.gz' gives 'report' and 'report.tar'), longest suffix first.
 */
export function expandedNameCandidates(filename: string): string[] {
  const lowerName = filename.toLowerCase();
  const candidates: string[] = [];

  const bySuffixLength = [...ARCHIVE_EXTENSIONS].sort((a, b) => b.length - a.length);
  for (const ext of bySuffixLength) {
    if (lowerName.endsWith(ext) && filename.length > ext.length) {
      const candidate = filename.slice(0, filename.length - ext.length);
      if (!candidates.includes(candidate)) {
        candidates.push(candidate);
      }
    }
  }

  return candidates;
}

export function matchesPruneRule(filename: string, rule: PruneRule): boolean {
  const lowerName = filename.toLowerCase();

  if (rule.names.includes(lowerName)) {
    return true;
  }
  if (rule.namePrefixes.some(prefix => lowerName.startsWith(prefix))) {
    return true;
  }
  return rule.extensions.some(ext => lowerName.endsWith(ext) && lowerName.length > ext.length);
}
