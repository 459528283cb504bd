/**
 * Document Loader
 *
 * Discovers plain-text documents in a directory with fast-glob, applies
 * gitignore-style filtering, and reads them into Document objects.
 * Also provides the directory statistics and sample document used by the
 * `docs` and `init` commands.
 */

import { existsSync, mkdirSync, statSync, writeFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import {
  DEFAULT_DOCUMENT_EXTENSIONS,
  type DirectoryLoadOptions,
  type DirectoryStats,
  type Document,
  type DocumentSource,
} from './types.js';

/**
 * Normalize user-supplied extensions: lower-case, no leading dot.
 */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  return [...new Set(extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()))].filter(
    (ext) => ext !== ''
  );
}

function extensionOf(path: string): string {
  return extname(path).replace(/^\./, '').toLowerCase();
}

/**
 * List matching files under root, relative paths with forward slashes,
 * sorted so document order is stable across platforms.
 */
async function findDocumentPaths(
  root: string,
  extensions: readonly string[],
  recursive: boolean,
  ignorePatterns: string[]
): Promise<string[]> {
  const entries = await fg('**/*', {
    cwd: root,
    absolute: false,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    deep: recursive ? Infinity : 1,
    suppressErrors: true,
    caseSensitiveMatch: false,
  });

  const shouldIgnore = createIgnoreFilter({ rootPath: root, additionalPatterns: ignorePatterns });
  const wanted = new Set(extensions);

  return entries
    .filter((entry) => wanted.has(extensionOf(entry)) && !shouldIgnore(entry))
    .sort();
}

/**
 * Load every supported document in a directory.
 *
 * Empty (or whitespace-only) and unreadable files are skipped with a
 * warning. An empty
 * result is not an error here; the pipeline decides what "no documents"
 * means.
 *
 * @throws FileNotFoundError if the directory does not exist
 */
export async function loadDocumentsFromDirectory(
  directory: string,
  options: DirectoryLoadOptions = {}
): Promise<Document[]> {
  const root = resolve(directory);

  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new FileNotFoundError(root, 'Create the directory or run: docqa init');
  }

  const extensions = normalizeExtensions(options.extensions ?? DEFAULT_DOCUMENT_EXTENSIONS);
  const paths = await findDocumentPaths(
    root,
    extensions,
    options.recursive ?? false,
    options.ignorePatterns ?? []
  );

  const documents: Document[] = [];

  for (const relativePath of paths) {
    const sourcePath = join(root, relativePath);

    let rawText: string;
    try {
      rawText = await readFile(sourcePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      options.onWarning?.(`Skipping unreadable document: ${reason}`, relativePath);
      continue;
    }

    if (rawText.trim() === '') {
      options.onWarning?.('Skipping empty document', relativePath);
      continue;
    }

    documents.push({
      id: relativePath,
      sourcePath,
      extension: extensionOf(relativePath),
      rawText,
    });
  }

  return documents;
}

/**
 * DocumentSource reading a directory on each load().
 */
export class DirectoryDocumentSource implements DocumentSource {
  readonly description: string;
  private readonly directory: string;
  private readonly options: DirectoryLoadOptions;

  constructor(directory: string, options: DirectoryLoadOptions = {}) {
    this.directory = directory;
    this.options = options;
    this.description = resolve(directory);
  }

  load(onWarning?: (message: string, context?: string) => void): Promise<Document[]> {
    return loadDocumentsFromDirectory(
      this.directory,
      onWarning ? { ...this.options, onWarning } : this.options
    );
  }
}

/**
 * Count files, total size and extensions in a directory.
 *
 * @throws FileNotFoundError if the directory does not exist
 */
export async function getDirectoryStats(
  directory: string,
  options: Pick<DirectoryLoadOptions, 'extensions' | 'recursive' | 'ignorePatterns'> = {}
): Promise<DirectoryStats> {
  const root = resolve(directory);

  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new FileNotFoundError(root);
  }

  const recursive = options.recursive ?? false;
  const entries = await fg('**/*', {
    cwd: root,
    onlyFiles: true,
    dot: false,
    deep: recursive ? Infinity : 1,
    suppressErrors: true,
    stats: true,
  });

  const fileTypes: Record<string, number> = {};
  let totalSize = 0;

  for (const entry of entries) {
    const ext = extensionOf(entry.path);
    const key = ext === '' ? '(none)' : `.${ext}`;
    fileTypes[key] = (fileTypes[key] ?? 0) + 1;
    totalSize += entry.stats?.size ?? 0;
  }

  const documentPaths = await findDocumentPaths(
    root,
    normalizeExtensions(options.extensions ?? DEFAULT_DOCUMENT_EXTENSIONS),
    recursive,
    options.ignorePatterns ?? []
  );

  return {
    fileCount: entries.length,
    totalSize,
    fileTypes,
    documentCount: documentPaths.length,
  };
}

/** File name of the sample document written by `docqa init` */
export const SAMPLE_DOCUMENT_NAME = 'sample.txt';

/** Content of the sample document */
export const SAMPLE_DOCUMENT = `AWS Bedrock Overview

Amazon Bedrock is a fully managed service that offers a choice of foundation
models from leading AI companies through a single API. It lets you build
generative AI applications without managing infrastructure.

Key features:
- Access to foundation models such as Claude and Amazon Titan
- Text embeddings for semantic search and retrieval
- Serverless usage billed per request
- Private customization of models with your own data

Retrieval-augmented generation (RAG) combines a vector index of your documents
with a language model: the most relevant passages are retrieved for each
question and passed to the model as context, so answers are grounded in your
own content.
`;

/**
 * Create the documents directory (if needed) and write the sample document
 * unless a file with that name already exists.
 *
 * @returns Path of the sample document, or null if it already existed
 */
export function createSampleDocument(directory: string): string | null {
  const root = resolve(directory);
  mkdirSync(root, { recursive: true });

  const samplePath = join(root, SAMPLE_DOCUMENT_NAME);
  if (existsSync(samplePath)) {
    return null;
  }

  writeFileSync(samplePath, SAMPLE_DOCUMENT, 'utf-8');
  return samplePath;
}
