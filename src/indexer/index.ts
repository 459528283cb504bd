/**
 * Document Indexer Module
 *
 * Loads plain-text documents from a directory and splits them into
 * overlapping chunks ready for embedding.
 *
 * @example
 * ```ts
 * import { DirectoryDocumentSource, chunkDocuments } from './indexer/index.js';
 *
 * const documents = await new DirectoryDocumentSource('./data').load();
 * const chunks = chunkDocuments(documents, { chunkSize: 512, chunkOverlap: 20 });
 * ```
 */

// Document loading
export {
  DirectoryDocumentSource,
  loadDocumentsFromDirectory,
  getDirectoryStats,
  createSampleDocument,
  normalizeExtensions,
  SAMPLE_DOCUMENT,
  SAMPLE_DOCUMENT_NAME,
} from './loader.js';

// Ignore pattern utilities
export {
  createIgnoreFilter,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

// Types and constants
export {
  type Document,
  type DocumentSource,
  type DirectoryLoadOptions,
  type DirectoryStats,
  DEFAULT_DOCUMENT_EXTENSIONS,
  DEFAULT_IGNORE_PATTERNS,
} from './types.js';

// Chunker module
export {
  chunkDocument,
  chunkDocuments,
  validateChunkOptions,
  DEFAULT_CHUNK_OPTIONS,
  type ChunkOptions,
  type Chunk,
} from './chunker/index.js';
