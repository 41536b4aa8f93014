import fs from 'fs/promises';
import path from 'path';
import { isDeepStrictEqual } from 'util';
import type { LibrarySignature, SignatureEntry } from '@libris/shared';
import { expandHome, parsePathList } from './config';

/** Extensions recognised as e-books during discovery. */
export const SUPPORTED_EXTENSIONS = new Set(['.epub', '.mobi', '.azw3', '.azw']);
/** Subset that the extractor can actually read; the rest are skipped. */
export const EXTRACTABLE_EXTENSIONS = new Set(['.epub']);

export function normalizeRoots(roots?: string[]): string[] {
  const raw = roots && roots.length ? roots : parsePathList(process.env.LIBRARY_PATHS);
  return raw.filter(Boolean).map(p => path.resolve(expandHome(p)));
}

async function walk(dir: string, acc: string[]): Promise<void> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    console.warn(`[scanner] cannot read ${dir}:`, err);
    return;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, acc);
    } else if (entry.isFile()) {
      const ext = path.extname(entry.name).toLowerCase();
      if (!SUPPORTED_EXTENSIONS.has(ext)) continue;
      if (!EXTRACTABLE_EXTENSIONS.has(ext)) continue;
      acc.push(full);
    }
  }
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively lists the extractable books under `roots`. Missing roots are
 * skipped. Returns absolute paths in sorted order.
 */
export async function discoverBooks(roots: string[]): Promise<string[]> {
  const paths: string[] = [];
  for (const root of roots) {
    if (!(await isDirectory(root))) continue;
    await walk(path.resolve(root), paths);
  }
  if (!paths.length) {
    console.warn(`[scanner] no books found in search paths: ${roots.join(', ')}`);
  }
  return paths.sort();
}

export async function statEntries(paths: string[]): Promise<SignatureEntry[]> {
  const entries: SignatureEntry[] = [];
  for (const p of paths) {
    try {
      const stat = await fs.stat(p);
      entries.push({ path: p, mtime: stat.mtimeMs, size: stat.size });
    } catch {
      continue;
    }
  }
  return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

export async function librarySignature(paths: string[], roots: string[]): Promise<LibrarySignature> {
  const entries = await statEntries(paths);
  return { roots: [...roots], count: entries.length, entries };
}

export function signaturesEqual<T extends object>(a: T | undefined, b: T | undefined): boolean {
  if (!a || !b) return false;
  return isDeepStrictEqual(a, b);
}
