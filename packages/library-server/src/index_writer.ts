import Database from 'better-sqlite3';
import type { BookRecord, IndexEntry } from '@libris/shared';
import { isRecord } from './guards';

export const UNKNOWN_SECTION = 'Unknown section';
export const UNKNOWN_AUTHOR = 'Unknown';
export const FTS_TABLE = 'paragraphs_fts';

export type IndexedBook = Pick<BookRecord, 'title' | 'author' | 'toc'>;

/** One book body handed to an index build. */
export interface IndexDocument {
  book: IndexedBook;
  text: string;
}

export interface IndexCounts {
  books: number;
  paragraphs: number;
}

export interface IndexBuildRequest {
  dbPath: string;
  documents: IndexDocument[];
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Blank-line delimited, trimmed, non-empty runs of text. */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n[ \t\r\f\v]*\n/)
    .map(p => p.trim())
    .filter(Boolean);
}

export function paragraphEntries(book: IndexedBook, text: string): IndexEntry[] {
  const paragraphs = splitParagraphs(text).map(normalizeWhitespace);
  const location = book.toc.length ? book.toc[0].label : UNKNOWN_SECTION;
  const author = book.author || UNKNOWN_AUTHOR;
  return paragraphs.map((paragraph, i) => ({
    text: paragraph,
    bookTitle: book.title,
    author,
    location,
    contextBefore: i > 0 ? paragraphs[i - 1] : '',
    contextAfter: i + 1 < paragraphs.length ? paragraphs[i + 1] : '',
  }));
}

/** Creates a fresh FTS5 table at `dbPath` and fills it in one transaction. */
export function writeIndexFile(dbPath: string, documents: IndexDocument[]): IndexCounts {
  const db = new Database(dbPath);
  try {
    db.exec(`
      DROP TABLE IF EXISTS ${FTS_TABLE};
      CREATE VIRTUAL TABLE ${FTS_TABLE} USING fts5(
        text,
        book_title UNINDEXED,
        author UNINDEXED,
        location UNINDEXED,
        context_before UNINDEXED,
        context_after UNINDEXED
      );
    `);
    const insert = db.prepare(
      `INSERT INTO ${FTS_TABLE} (text, book_title, author, location, context_before, context_after) VALUES (?, ?, ?, ?, ?, ?)`,
    );
    let books = 0;
    let paragraphs = 0;
    const insertAll = db.transaction(() => {
      for (const doc of documents) {
        const entries = paragraphEntries(doc.book, doc.text);
        if (!entries.length) continue;
        for (const e of entries) {
          insert.run(e.text, e.bookTitle, e.author, e.location, e.contextBefore, e.contextAfter);
        }
        books++;
        paragraphs += entries.length;
      }
    });
    insertAll();
    return { books, paragraphs };
  } finally {
    db.close();
  }
}

function isIndexDocument(value: unknown): value is IndexDocument {
  if (!isRecord(value) || typeof value.text !== 'string' || !isRecord(value.book)) return false;
  const { title, author, toc } = value.book;
  return typeof title === 'string' && (author === undefined || typeof author === 'string') && Array.isArray(toc);
}

export function isIndexBuildRequest(value: unknown): value is IndexBuildRequest {
  return isRecord(value) && typeof value.dbPath === 'string' && Array.isArray(value.documents) && value.documents.every(isIndexDocument);
}

export function isIndexCounts(value: unknown): value is IndexCounts {
  return isRecord(value) && typeof value.books === 'number' && typeof value.paragraphs === 'number';
}
