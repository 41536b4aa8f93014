import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import path from 'path';
import { MetadataCache } from '../src/metadata_cache';
import { LibraryOrchestrator } from '../src/orchestrator';
import { call_tool, find_topic, list_books, search_books } from '../src/tools';
import { bookMap, FakeExtractor, makeTempDir, record, removeDir } from './helpers';

describe('library tools', () => {
  let dir: string;
  let orchestrator: LibraryOrchestrator;

  beforeEach(() => {
    dir = makeTempDir();
    const extractor = new FakeExtractor();
    orchestrator = new LibraryOrchestrator({
      libraryPaths: [dir],
      metadataCache: new MetadataCache(path.join(dir, 'metadata.json'), extractor),
      extractor,
      indexPath: path.join(dir, 'index.sqlite'),
    });
    orchestrator.swapSnapshot(
      bookMap(
        record('walden', { author: 'H. D. Thoreau', published: '1854', path: '/lib/walden.epub', text: 'Simplify, simplify.\n\nThe woods were quiet.' }),
        record('Emma', { author: 'Jane Austen', path: '/lib/emma.epub', text: 'Emma Woodhouse, handsome, clever, and rich.' }),
        record('Dune', { published: '1965', path: '/lib/dune.epub', text: 'Fear is the mind-killer.' }),
      ),
    );
  });

  afterEach(() => removeDir(dir));

  describe('list_books', () => {
    it('sorts by lower-cased title and paginates', () => {
      expect(list_books(orchestrator, { limit: 2 })).toEqual({
        total: 3,
        offset: 0,
        limit: 2,
        books: [{ title: 'Dune' }, { title: 'Emma' }],
      });
      expect(list_books(orchestrator, { offset: 2 })).toEqual({ total: 3, offset: 2, limit: 50, books: [{ title: 'walden' }] });
    });

    it('returns everything for limit 0', () => {
      const result = list_books(orchestrator, { limit: 0, offset: 1 });
      expect('books' in result && result.books.map(b => b.title)).toEqual(['Emma', 'walden']);
    });

    it('adds requested fields with defaults', () => {
      const result = list_books(orchestrator, { limit: 1, include_fields: ['author', 'published', 'path', 'toc'] });
      expect('books' in result && result.books).toEqual([
        { title: 'Dune', author: 'Unknown', published: '1965', path: '/lib/dune.epub' },
      ]);
    });
  });

  it('search_books returns the matching metadata list', () => {
    expect(search_books(orchestrator, { query: 'austen' })).toEqual([
      { title: 'Emma', author: 'Jane Austen', published: 'Unknown', chapters: [] },
    ]);
  });

  it('search_books reports an empty library', () => {
    orchestrator.swapSnapshot(new Map());
    expect(search_books(orchestrator, { query: 'austen' })).toEqual({ error: 'Books not loaded yet' });
  });

  it('find_topic searches paragraph text', async () => {
    const result = await find_topic(orchestrator, { topic: 'woods', author_filter: 'thoreau' });
    expect('results' in result && result.results.map(r => [r.book_title, r.text, r.context_before])).toEqual([
      ['walden', 'The woods were quiet.', 'Simplify, simplify.'],
    ]);
  });

  describe('call_tool validation', () => {
    it.each<{ name: string; args: Record<string, unknown>; error: string }>([
      { name: 'list_books', args: { limit: -1 }, error: 'limit must be a non-negative integer' },
      { name: 'list_books', args: { limit: 2.5 }, error: 'limit must be a non-negative integer' },
      { name: 'list_books', args: { offset: '3' }, error: 'offset must be a non-negative integer' },
      { name: 'list_books', args: { limit: 501 }, error: 'limit must be <= 500' },
      { name: 'find_topic', args: {}, error: 'topic or topics is required' },
      { name: 'find_topic', args: { topics: [] }, error: 'topic or topics is required' },
      { name: 'find_topic', args: { topic: 'woods', limit: 1000 }, error: 'limit must be <= 500' },
      { name: 'find_topic', args: { topic: 'woods', offset: -2 }, error: 'offset must be a non-negative integer' },
      { name: 'find_topic', args: { topic: 'woods', match_type: 'loose' }, error: "match_type must be 'exact' or 'fuzzy'" },
      { name: 'read_book', args: {}, error: 'Unknown tool: read_book' },
    ])('$name rejects $args', async ({ name, args, error }) => {
      expect(await call_tool(orchestrator, name, args)).toEqual({ error });
    });

    it('reports an empty library', async () => {
      orchestrator.swapSnapshot(new Map());
      expect(await call_tool(orchestrator, 'list_books', {})).toEqual({ error: 'Books not loaded yet' });
      expect(await call_tool(orchestrator, 'find_topic', { topic: 'woods' })).toEqual({ error: 'Books not loaded yet' });
    });

    it('treats missing arguments as empty', async () => {
      const result = await call_tool(orchestrator, 'list_books', undefined);
      expect(result).toMatchObject({ total: 3, offset: 0, limit: 50 });
    });

    it('returns unexpected failures as errors', async () => {
      vi.spyOn(orchestrator, 'findTopic').mockRejectedValue(new Error('disk unavailable'));
      expect(await call_tool(orchestrator, 'find_topic', { topic: 'woods' })).toEqual({ error: 'disk unavailable' });
    });
  });
});
