import fs from 'fs/promises';
import path from 'path';
import { setImmediate as yieldToLoop } from 'timers/promises';
import { Worker } from 'worker_threads';
import Database from 'better-sqlite3';
import type { BookRecord, ContentSignature, SignatureEntry } from '@libris/shared';
import { errorMessage, IndexBuildError } from './errors';
import { isRecord } from './guards';
import {
  FTS_TABLE,
  isIndexCounts,
  type IndexBuildRequest,
  type IndexCounts,
  type IndexDocument,
} from './index_writer';
import { signaturesEqual } from './scanner';
import { readJson, tempPathFor, writeJsonAtomic } from './storage';
import { startTimer } from './telemetry';
import type { TextProvider } from './text_cache';

export { FTS_TABLE, paragraphEntries, splitParagraphs } from './index_writer';

export interface EnsureIndexOptions {
  forceRebuild?: boolean;
}

export interface EnsureIndexResult extends IndexCounts {
  rebuilt: boolean;
}

export function sidecarPath(indexPath: string): string {
  return `${indexPath}.signature.json`;
}

/**
 * Fingerprint of the books fed to a build. Books whose file cannot be stat-ed
 * keep their path with a null mtime and the loaded text length as size.
 */
export async function contentSignature(books: Iterable<BookRecord>): Promise<ContentSignature> {
  const entries: SignatureEntry[] = [];
  for (const book of books) {
    try {
      const stat = await fs.stat(book.path);
      entries.push({ path: book.path, mtime: stat.mtimeMs, size: stat.size });
    } catch {
      entries.push({ path: book.path, mtime: null, size: book.text ? book.text.length : null });
    }
  }
  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { count: entries.length, entries };
}

function toContentSignature(value: unknown): ContentSignature | undefined {
  if (!isRecord(value) || typeof value.count !== 'number' || !Array.isArray(value.entries)) return undefined;
  const entries: SignatureEntry[] = [];
  for (const e of value.entries) {
    if (!isRecord(e) || typeof e.path !== 'string') return undefined;
    entries.push({
      path: e.path,
      mtime: typeof e.mtime === 'number' ? e.mtime : null,
      size: typeof e.size === 'number' ? e.size : null,
    });
  }
  return { count: value.count, entries };
}

// TypeScript sources (under the test runner) need a loader inside the thread
const TS_BOOTSTRAP = "const { workerData } = require('worker_threads'); require(workerData.loader).register(); require(workerData.entry);";

function spawnIndexWorker(request: IndexBuildRequest): Worker {
  const entry = path.join(__dirname, `index_worker${path.extname(__filename)}`);
  if (entry.endsWith('.ts')) {
    return new Worker(TS_BOOTSTRAP, { eval: true, workerData: { ...request, entry, loader: require.resolve('tsx/cjs/api') } });
  }
  return new Worker(entry, { workerData: request });
}

/** Writes the FTS table on a worker thread so queries keep being served. */
export function buildIndexInWorker(dbPath: string, documents: IndexDocument[]): Promise<IndexCounts> {
  return new Promise((resolve, reject) => {
    const worker = spawnIndexWorker({ dbPath, documents });
    let counts: IndexCounts | undefined;
    worker.on('message', (message: unknown) => {
      if (isIndexCounts(message)) counts = message;
    });
    worker.once('error', reject);
    worker.once('exit', code => {
      if (counts) resolve(counts);
      else reject(new Error(`index worker exited with code ${code} before reporting`));
    });
  });
}

/** Bodies for the build; extraction yields to the event loop between books. */
async function collectDocuments(books: BookRecord[], textProvider?: TextProvider): Promise<IndexDocument[]> {
  const documents: IndexDocument[] = [];
  for (const book of books) {
    let text = book.text;
    if (!text && textProvider) {
      text = textProvider(book);
      await yieldToLoop();
    }
    if (text) documents.push({ book: { title: book.title, author: book.author, toc: book.toc }, text });
  }
  return documents;
}

/** False when the index file is missing, corrupt or lacks the FTS table. */
export function indexIsReadable(indexPath: string): boolean {
  try {
    const db = openIndex(indexPath);
    try {
      db.prepare(`SELECT 1 FROM ${FTS_TABLE} LIMIT 1`).get();
    } finally {
      db.close();
    }
    return true;
  } catch (err) {
    console.warn(`[index] ${path.basename(indexPath)} is not usable: ${errorMessage(err)}`);
    return false;
  }
}

/**
 * Makes sure a queryable index reflecting `books` exists at `indexPath`.
 * The whole index is rebuilt on a worker thread when the content signature
 * differs from the stored sidecar, the index file is unreadable, or
 * `forceRebuild` is set; otherwise nothing is done.
 */
export async function ensureIndex(
  books: Iterable<BookRecord>,
  textProvider: TextProvider | undefined,
  indexPath: string,
  options: EnsureIndexOptions = {},
): Promise<EnsureIndexResult> {
  const bookList = [...books];
  const signature = await contentSignature(bookList);
  const sidecar = sidecarPath(indexPath);

  if (!options.forceRebuild) {
    const stored = toContentSignature(await readJson(sidecar));
    if (signaturesEqual(stored, signature) && indexIsReadable(indexPath)) {
      return { rebuilt: false, books: 0, paragraphs: 0 };
    }
  }

  const stop = startTimer('index_build', { source: 'search-index' });
  const tmp = tempPathFor(indexPath);
  let counts: IndexCounts;
  try {
    await fs.mkdir(path.dirname(indexPath), { recursive: true });
    counts = await buildIndexInWorker(tmp, await collectDocuments(bookList, textProvider));
    await fs.rename(tmp, indexPath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw new IndexBuildError(`failed to build search index at ${indexPath}`, err, { indexPath });
  }

  try {
    await writeJsonAtomic(sidecar, signature);
  } catch (err) {
    // the index is usable; it will simply be rebuilt on the next call
    console.error(`[index] failed to write ${path.basename(sidecar)}:`, err);
  }
  stop({ ...counts });
  console.info(`[index] built FTS index with ${counts.paragraphs} paragraphs from ${counts.books} books`);
  return { rebuilt: true, ...counts };
}

export function openIndex(indexPath: string): Database.Database {
  return new Database(indexPath, { readonly: true, fileMustExist: true });
}
