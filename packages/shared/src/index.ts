export interface TocEntry {
  label: string;
  anchorId: string;
  depth: number;
}

/**
 * Metadata of a single book plus its lazily loaded body. An empty `text` is
 * the metadata-only state; `title` is the library-wide key.
 */
export interface BookRecord {
  title: string;
  author?: string;
  published?: string;
  path: string;
  toc: TocEntry[];
  text: string;
}

export type BookMetadata = Omit<BookRecord, 'text'>;

export interface SignatureEntry {
  path: string;
  /**
   * Modification time in milliseconds since epoch. `null` when the file
   * could not be stat-ed (content signatures only).
   */
  mtime: number | null;
  size: number | null;
}

export interface ContentSignature {
  count: number;
  entries: SignatureEntry[];
}

export interface LibrarySignature extends ContentSignature {
  roots: string[];
}

export interface IndexEntry {
  text: string;
  bookTitle: string;
  author: string;
  location: string;
  contextBefore: string;
  contextAfter: string;
}

export type MatchType = 'exact' | 'fuzzy';

export interface MetadataSearchResult {
  title: string;
  author: string;
  published: string;
  chapters: string[];
}

export interface TopicSearchHit {
  text: string;
  book_title: string;
  author: string;
  location: string;
  context_before: string;
  context_after: string;
  relevance_score: number;
}

export interface TopicSearchResult {
  total_results: number;
  offset: number;
  limit: number;
  results: TopicSearchHit[];
}
