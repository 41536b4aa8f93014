import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { MetadataCache } from '../src/metadata_cache';
import { LibraryOrchestrator, type IndexBuilder, type OrchestratorOptions } from '../src/orchestrator';
import { bookMap, FakeExtractor, makeTempDir, record, removeDir, writeFile } from './helpers';

describe('LibraryOrchestrator', () => {
  let root: string;
  let dataDir: string;
  let extractor: FakeExtractor;
  let cache: MetadataCache;

  const create = (overrides: Partial<OrchestratorOptions> = {}) =>
    new LibraryOrchestrator({
      libraryPaths: [root],
      metadataCache: cache,
      extractor,
      indexPath: path.join(dataDir, 'index.sqlite'),
      ...overrides,
    });

  beforeEach(() => {
    root = makeTempDir('libris-lib-');
    dataDir = makeTempDir('libris-data-');
    writeFile(path.join(root, 'walden.epub'), 'w');
    writeFile(path.join(root, 'emma.epub'), 'e');
    extractor = new FakeExtractor({
      'walden.epub': { title: 'Walden', author: 'H. D. Thoreau', body: 'Simplify, simplify.\n\nThe woods were quiet.' },
      'emma.epub': { title: 'Emma', author: 'Jane Austen', body: 'Emma Woodhouse, handsome, clever, and rich.' },
    });
    cache = new MetadataCache(path.join(dataDir, 'metadata.json'), extractor);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(root);
    removeDir(dataDir);
  });

  it('scans the library when no cache exists', async () => {
    const orchestrator = create();
    const snapshot = await orchestrator.init();
    expect(snapshot.fromCache).toBe(false);
    expect([...snapshot.books.keys()].sort()).toEqual(['Emma', 'Walden']);
    expect(orchestrator.isRefreshing).toBe(false);
  });

  it('serves the cache first and revalidates in the background', async () => {
    await cache.refresh([root]);
    const refresh = vi.spyOn(cache, 'refresh');
    const orchestrator = create();

    const snapshot = await orchestrator.init();
    expect(snapshot.fromCache).toBe(true);
    expect(orchestrator.isRefreshing).toBe(true);

    await orchestrator.refreshInBackground();
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(orchestrator.current.fromCache).toBe(false);
    expect(orchestrator.current).not.toBe(snapshot);
    expect(orchestrator.isRefreshing).toBe(false);
  });

  it('runs one background refresh at a time', async () => {
    const refresh = vi.spyOn(cache, 'refresh');
    const orchestrator = create();
    const first = orchestrator.refreshInBackground();
    const second = orchestrator.refreshInBackground();
    expect(second).toBe(first);
    await first;
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('keeps the current snapshot when a background refresh fails', async () => {
    const orchestrator = create();
    await orchestrator.init();
    const before = orchestrator.current;
    vi.spyOn(cache, 'refresh').mockRejectedValue(new Error('scan failed'));

    await expect(orchestrator.refreshInBackground()).resolves.toBeUndefined();
    expect(orchestrator.current).toBe(before);
  });

  it('answers a query from the snapshot current when it started', async () => {
    const orchestrator = create();
    await orchestrator.init();
    const pending = orchestrator.findTopic({ topic: 'woods' });
    orchestrator.swapSnapshot(bookMap(record('Other', { text: 'Nothing relevant.' })));

    const result = await pending;
    expect(result.total_results).toBe(1);
    expect(result.results[0].book_title).toBe('Walden');
    expect(orchestrator.listBooks().map(b => b.title)).toEqual(['Other']);
  });

  it('loads bodies lazily for topic search', async () => {
    const orchestrator = create();
    await orchestrator.init();
    expect(extractor.bodyCalls).toEqual([]);

    await orchestrator.findTopic({ topic: 'rich' });
    expect(extractor.bodyCalls.map(p => path.basename(p)).sort()).toEqual(['emma.epub', 'walden.epub']);
  });

  it('refreshes a stale cached snapshot on query', () => {
    const now = new Date('2026-01-02T00:00:00Z');
    const orchestrator = create({ maxStalenessMs: 60_000, now: () => now });
    const refresh = vi.spyOn(cache, 'refresh').mockResolvedValue(new Map());
    orchestrator.swapSnapshot(bookMap(record('Walden')), { fromCache: true, generatedAt: new Date('2026-01-01T00:00:00Z') });

    orchestrator.listBooks();
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('leaves fresh or uncached snapshots alone', () => {
    const now = new Date('2026-01-02T00:00:00Z');
    const refresh = vi.spyOn(cache, 'refresh').mockResolvedValue(new Map());
    const orchestrator = create({ maxStalenessMs: 0, now: () => now });
    orchestrator.swapSnapshot(bookMap(record('Walden')), { fromCache: true, generatedAt: new Date('2020-01-01T00:00:00Z') });
    orchestrator.searchBooks('walden');

    const tracking = create({ maxStalenessMs: 60_000, now: () => now });
    tracking.swapSnapshot(bookMap(record('Walden')), { fromCache: false, generatedAt: new Date('2020-01-01T00:00:00Z') });
    tracking.listBooks();
    tracking.swapSnapshot(bookMap(record('Walden')), { fromCache: true, generatedAt: new Date('2026-01-01T23:59:30Z') });
    tracking.listBooks();

    expect(refresh).not.toHaveBeenCalled();
  });

  it('shares one index build between concurrent callers', async () => {
    const orchestrator = create();
    await orchestrator.init();
    const a = orchestrator.buildIndex();
    const b = orchestrator.buildIndex();
    expect(b).toBe(a);
    expect((await a).rebuilt).toBe(true);
    expect((await orchestrator.buildIndex()).rebuilt).toBe(false);
  });

  it('forces only the first build', async () => {
    const orchestrator = create();
    await orchestrator.init();
    await orchestrator.buildIndex();

    const forced = create({ forceRebuild: true });
    await forced.init();
    expect((await forced.buildIndex()).rebuilt).toBe(true);
    expect((await forced.buildIndex()).rebuilt).toBe(false);
    await forced.refreshInBackground();
  });

  it('keeps a forced rebuild pending until a build succeeds', async () => {
    const indexBuilder = vi
      .fn<IndexBuilder>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValue({ rebuilt: true, books: 2, paragraphs: 3 });
    const orchestrator = create({ forceRebuild: true, indexBuilder });
    await orchestrator.init();

    await expect(orchestrator.buildIndex()).rejects.toThrow('disk full');
    await orchestrator.buildIndex();
    await orchestrator.buildIndex();
    expect(indexBuilder.mock.calls.map(([, options]) => options.forceRebuild)).toEqual([true, true, false]);
  });

  it('leaves index writing to an injected builder', async () => {
    const indexBuilder = vi.fn<IndexBuilder>().mockResolvedValue({ rebuilt: true, books: 2, paragraphs: 3 });
    const orchestrator = create({ indexBuilder });
    const snapshot = await orchestrator.init();

    expect(await orchestrator.buildIndex()).toEqual({ rebuilt: true, books: 2, paragraphs: 3 });
    expect(indexBuilder).toHaveBeenCalledTimes(1);
    expect(indexBuilder.mock.calls[0][0]).toBe(snapshot.books);
    expect(fs.existsSync(path.join(dataDir, 'index.sqlite'))).toBe(false);
  });

  it('builds from configuration', async () => {
    const orchestrator = LibraryOrchestrator.fromConfig(
      {
        libraryPaths: [root],
        dataDir,
        metadataCachePath: path.join(dataDir, 'metadata.json'),
        index: { path: path.join(dataDir, 'index.sqlite'), forceRebuild: false },
        fuzzy: { enabled: false, threshold: 80 },
        textCacheSize: 2,
        maxStalenessMs: 0,
        watchLibrary: false,
        logDir: path.join(dataDir, 'logs'),
      },
      extractor,
    );
    await orchestrator.init();
    expect(orchestrator.indexPath).toBe(path.join(dataDir, 'index.sqlite'));
    expect(orchestrator.searchBooks('thoreau').map(r => r.title)).toEqual(['Walden']);
    expect(orchestrator.searchBooks('simplify walden')).toEqual([]);
  });
});
