/**
 * Document Types
 *
 * Type definitions for document discovery and loading.
 */

/**
 * A loaded source document. Immutable once loaded.
 */
export interface Document {
  /** POSIX-style path relative to the documents directory; unique per load */
  readonly id: string;

  /** Absolute path on disk */
  readonly sourcePath: string;

  /** Extension without the dot, lower-cased (e.g. 'md') */
  readonly extension: string;

  /** Full text content */
  readonly rawText: string;
}

/**
 * Anything that can produce the documents to ingest.
 */
export interface DocumentSource {
  /** Human-readable description for logs (e.g. the directory path) */
  readonly description: string;
  /** Skipped files are reported through onWarning, when given */
  load(onWarning?: (message: string, context?: string) => void): Promise<Document[]>;
}

/**
 * Options for loading documents from a directory.
 */
export interface DirectoryLoadOptions {
  /** Extensions to load, without the dot (default: txt, md) */
  extensions?: string[];

  /** Descend into subdirectories (default: false) */
  recursive?: boolean;

  /** Additional gitignore-style patterns to skip */
  ignorePatterns?: string[];

  /** Called for files that are skipped (empty, unreadable) */
  onWarning?: (message: string, context?: string) => void;
}

/**
 * Default extensions for plain-text documents.
 */
export const DEFAULT_DOCUMENT_EXTENSIONS = ['txt', 'md'];

/**
 * Patterns that are never loaded.
 */
export const DEFAULT_IGNORE_PATTERNS = ['node_modules/', '.git/', '.DS_Store'];

/**
 * Summary of a directory's contents.
 */
export interface DirectoryStats {
  /** Number of regular files (all extensions) */
  fileCount: number;

  /** Sum of file sizes in bytes */
  totalSize: number;

  /** File count per extension ('(none)' for files without one) */
  fileTypes: Record<string, number>;

  /** Files that would be loaded as documents */
  documentCount: number;
}
