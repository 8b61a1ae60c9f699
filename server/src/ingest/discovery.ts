import fs from 'fs/promises';
import path from 'path';
import { baseLogger } from '../logger.js';
import type { DiscoveredFile, IndexConfig } from './types.js';

type DiscoveryConfig = Pick<IndexConfig, 'includes' | 'excludes'>;

function matchesExclude(relPath: string, excludes: string[]): boolean {
  const segments = relPath.split('/');
  const base = segments[segments.length - 1];
  return excludes.some((pattern) => {
    if (!pattern) return false;
    if (pattern.startsWith('*')) {
      return base.endsWith(pattern.slice(1));
    }
    return segments.includes(pattern);
  });
}

function extensionOf(relPath: string) {
  return path.extname(relPath).replace('.', '').toLowerCase();
}

async function isLikelyText(filePath: string): Promise<boolean> {
  const sampleSize = 2048;
  const fd = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(sampleSize);
    const { bytesRead } = await fd.read(buffer, 0, sampleSize, 0);
    return !buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await fd.close();
  }
}

async function walkDir(root: string, excludes: string[]): Promise<string[]> {
  const results: string[] = [];
  async function walk(current: string) {
    const entries = await fs.readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const abs = path.join(current, entry.name);
      const rel = path.relative(root, abs).split(path.sep).join('/');
      if (matchesExclude(rel, excludes)) continue;
      if (entry.isDirectory()) {
        await walk(abs);
      } else if (entry.isFile()) {
        results.push(rel);
      }
    }
  }
  await walk(root);
  return results;
}

/**
 * Lists indexable files under `startPath` in a stable order. `relPath` always
 * uses `/` so it can serve as a document id on any platform.
 */
export async function discoverFiles(
  startPath: string,
  config: DiscoveryConfig,
): Promise<{ root: string; files: DiscoveredFile[] }> {
  const root = path.resolve(startPath);
  const relPaths = await walkDir(root, config.excludes);
  const files: DiscoveredFile[] = [];

  for (const relPath of relPaths) {
    const ext = extensionOf(relPath);
    if (!config.includes.includes(ext)) continue;
    const absPath = path.join(root, ...relPath.split('/'));
    const textual = await isLikelyText(absPath).catch((err: unknown) => {
      baseLogger.warn({ absPath, err }, 'skipping unreadable file');
      return false;
    });
    if (!textual) continue;
    files.push({ absPath, relPath, ext });
  }

  return { root, files };
}
