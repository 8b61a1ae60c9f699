import fs from 'fs/promises';
import { logLifecycle } from './lifecycle.js';
import { discoverFiles } from './discovery.js';
import { ExtractionError, errorMessage } from './errors.js';
import type { DiscoveredFile, Document, IndexConfig } from './types.js';

export interface TextExtractor {
  supports(ext: string): boolean;
  extract(file: DiscoveredFile): Promise<string>;
}

/**
 * Whitespace inside a paragraph collapses to one space; paragraphs are kept,
 * separated by a single blank line.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/^\uFEFF/, '')
    .replace(/\r\n?/g, '\n')
    .split(/\n[^\S\n]*\n\s*/)
    .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n\n');
}

export class PlainTextExtractor implements TextExtractor {
  constructor(private readonly extensions: string[]) {}

  supports(ext: string) {
    return this.extensions.includes(ext);
  }

  async extract(file: DiscoveredFile) {
    try {
      const raw = await fs.readFile(file.absPath, 'utf8');
      return normalizeWhitespace(raw);
    } catch (err) {
      throw new ExtractionError(file.relPath, err);
    }
  }
}

export type ExtractionFailure = { sourcePath: string; message: string };

export type LoadResult = {
  root: string;
  documents: Document[];
  failures: ExtractionFailure[];
};

/**
 * Discovers and extracts every indexable file under `startPath`. A file that
 * cannot be read is reported in `failures`; the rest still load.
 */
export async function loadDocuments(
  startPath: string,
  config: Pick<IndexConfig, 'includes' | 'excludes'>,
  extractors: TextExtractor[] = [new PlainTextExtractor(config.includes)],
): Promise<LoadResult> {
  const { root, files } = await discoverFiles(startPath, config);
  const documents: Document[] = [];
  const failures: ExtractionFailure[] = [];

  for (const file of files) {
    const extractor = extractors.find((candidate) => candidate.supports(file.ext));
    if (!extractor) continue;
    try {
      const [rawText, stat] = await Promise.all([
        extractor.extract(file),
        fs.stat(file.absPath),
      ]);
      if (!rawText) continue;
      documents.push({
        id: file.relPath,
        sourcePath: file.relPath,
        fileType: file.ext,
        rawText,
        lastModified: stat.mtime,
      });
    } catch (err) {
      failures.push({ sourcePath: file.relPath, message: errorMessage(err) });
    }
  }

  if (failures.length > 0) {
    logLifecycle('warn', 'documents skipped during extraction', {
      root,
      failed: failures.length,
      loaded: documents.length,
    });
  }
  return { root, documents, failures };
}
