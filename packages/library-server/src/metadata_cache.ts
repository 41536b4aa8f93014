import path from 'path';
import type { BookRecord, LibrarySignature, SignatureEntry, TocEntry } from '@libris/shared';
import type { ContentExtractor } from './epub';
import { isRecord, isStringArray } from './guards';
import { discoverBooks, librarySignature, normalizeRoots, signaturesEqual } from './scanner';
import { readJson, writeJsonAtomic } from './storage';
import { startTimer } from './telemetry';

export type BookMap = Map<string, BookRecord>;

type TocTuple = [string, string, number];

interface CachedBook {
  title: string;
  author: string | null;
  published: string | null;
  path: string;
  toc: TocTuple[];
}

export interface MetadataCachePayload {
  roots: string[];
  signature: LibrarySignature;
  generatedAt: string;
  books: CachedBook[];
}

export interface LoadResult {
  books: BookMap;
  fromCache: boolean;
  /** When the cached payload was last rebuilt; absent on a miss. */
  generatedAt?: Date;
}

function toSignatureEntry(value: unknown): SignatureEntry | undefined {
  if (!isRecord(value) || typeof value.path !== 'string') return undefined;
  const mtime = typeof value.mtime === 'number' ? value.mtime : null;
  const size = typeof value.size === 'number' ? value.size : null;
  return { path: value.path, mtime, size };
}

function toSignature(value: unknown): LibrarySignature | undefined {
  if (!isRecord(value) || !isStringArray(value.roots) || !Array.isArray(value.entries)) return undefined;
  const entries: SignatureEntry[] = [];
  for (const raw of value.entries) {
    const entry = toSignatureEntry(raw);
    if (!entry) return undefined;
    entries.push(entry);
  }
  return { roots: value.roots, count: typeof value.count === 'number' ? value.count : entries.length, entries };
}

function toToc(value: unknown): TocEntry[] {
  if (!Array.isArray(value)) return [];
  const toc: TocEntry[] = [];
  for (const entry of value) {
    if (!Array.isArray(entry) || entry.length < 1) continue;
    const depth = typeof entry[2] === 'number' ? entry[2] : 0;
    toc.push({ label: String(entry[0]), anchorId: entry.length > 1 ? String(entry[1]) : '', depth });
  }
  return toc;
}

function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

export function booksFromPayload(books: unknown): BookMap {
  const map: BookMap = new Map();
  if (!Array.isArray(books)) return map;
  for (const item of books) {
    if (!isRecord(item) || typeof item.title !== 'string') continue;
    map.set(item.title, {
      title: item.title,
      author: optionalText(item.author),
      published: optionalText(item.published),
      path: typeof item.path === 'string' ? item.path : '',
      toc: toToc(item.toc),
      text: '',
    });
  }
  return map;
}

function toCachedBook(book: BookRecord): CachedBook {
  return {
    title: book.title,
    author: book.author ?? null,
    published: book.published ?? null,
    path: book.path,
    toc: book.toc.map((t): TocTuple => [t.label, t.anchorId, t.depth]),
  };
}

/**
 * Persisted title -> metadata map keyed to a library signature. Bodies are
 * never stored here.
 */
export class MetadataCache {
  constructor(private readonly cachePath: string, private readonly extractor: ContentExtractor) {}

  get path(): string {
    return this.cachePath;
  }

  private async readPayload(): Promise<Record<string, unknown> | undefined> {
    const parsed = await readJson(this.cachePath);
    return isRecord(parsed) ? parsed : undefined;
  }

  /** Serves the persisted records when they were built for the same roots. Performs no scan. */
  async load(roots?: string[]): Promise<LoadResult> {
    const requested = normalizeRoots(roots);
    const cached = await this.readPayload();
    if (!cached || !isStringArray(cached.roots) || !signaturesEqual(cached.roots, requested)) {
      return { books: new Map(), fromCache: false };
    }
    const books = booksFromPayload(cached.books);
    const generated = typeof cached.generatedAt === 'string' ? new Date(cached.generatedAt) : undefined;
    console.info(`[metadata-cache] loaded metadata cache for ${books.size} books`);
    return {
      books,
      fromCache: true,
      generatedAt: generated && !Number.isNaN(generated.getTime()) ? generated : undefined,
    };
  }

  /**
   * Rescans the library and re-parses every book unless the fresh signature
   * matches the stored one.
   */
  async refresh(roots?: string[]): Promise<BookMap> {
    const normalized = normalizeRoots(roots);
    if (!normalized.length) {
      console.error('[metadata-cache] no library paths configured; set LIBRARY_PATHS or pass paths in config');
      return new Map();
    }
    const paths = await discoverBooks(normalized);
    const signature = await librarySignature(paths, normalized);

    const cached = await this.readPayload();
    if (cached && signaturesEqual(toSignature(cached.signature), signature)) {
      console.info('[metadata-cache] metadata cache is up to date');
      return booksFromPayload(cached.books);
    }

    const stop = startTimer('metadata_refresh', { source: 'metadata-cache' });
    const books: BookMap = new Map();
    for (const filePath of paths) {
      console.info(`[metadata-cache] parsing metadata: ${path.basename(filePath)}`);
      try {
        const meta = this.extractor.extractMetadata(filePath);
        if (meta) books.set(meta.title, { ...meta, text: '' });
      } catch (err) {
        console.error(`[metadata-cache] skipping ${path.basename(filePath)}:`, err instanceof Error ? err.message : err);
      }
    }

    const payload: MetadataCachePayload = {
      roots: normalized,
      signature,
      generatedAt: new Date().toISOString(),
      books: [...books.values()].map(toCachedBook),
    };
    try {
      await writeJsonAtomic(this.cachePath, payload);
    } catch (err) {
      console.error(`[metadata-cache] failed to persist ${this.cachePath}:`, err);
    }
    stop({ books: books.size, files: paths.length });
    console.info(`[metadata-cache] rebuilt metadata cache for ${books.size} books`);
    return books;
  }

  /** Trusts the cache when present, otherwise falls back to `refresh`. */
  async get(roots?: string[]): Promise<LoadResult> {
    const loaded = await this.load(roots);
    if (loaded.books.size) return loaded;
    return { books: await this.refresh(roots), fromCache: false };
  }
}
