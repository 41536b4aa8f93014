import type { BookRecord } from '@libris/shared';
import type { ContentExtractor } from './epub';

export type TextProvider = (book: BookRecord) => string;

/**
 * In-memory LRU of parsed book bodies keyed by file path. Map insertion
 * order doubles as recency order: the first key is the eviction candidate.
 */
export class TextCache {
  private readonly entries = new Map<string, string>();
  readonly capacity: number;

  constructor(capacity = 8) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): string | undefined {
    const text = this.entries.get(key);
    if (text === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, text);
    return text;
  }

  set(key: string, text: string): void {
    this.entries.delete(key);
    this.entries.set(key, text);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Keys from least to most recently used. */
  keys(): string[] {
    return [...this.entries.keys()];
  }
}

export function createTextProvider(cache: TextCache, extractor: ContentExtractor): TextProvider {
  return book => {
    if (!book.path) return '';
    const cached = cache.get(book.path);
    if (cached !== undefined) return cached;
    const text = extractor.extractBody(book.path);
    if (text) cache.set(book.path, text);
    return text;
  };
}
