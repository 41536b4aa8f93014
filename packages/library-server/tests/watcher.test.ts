import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { MetadataCache } from '../src/metadata_cache';
import { LibraryOrchestrator } from '../src/orchestrator';
import { createRefreshScheduler, debounce, isBookFile } from '../src/watcher';
import { FakeExtractor, makeTempDir, removeDir, writeFile } from './helpers';

describe('watcher', () => {
  let root: string;
  let dataDir: string;
  let extractor: FakeExtractor;
  let orchestrator: LibraryOrchestrator;

  beforeEach(() => {
    root = makeTempDir('libris-lib-');
    dataDir = makeTempDir('libris-data-');
    writeFile(path.join(root, 'walden.epub'), 'w');
    writeFile(path.join(root, 'emma.epub'), 'e');
    extractor = new FakeExtractor({
      'walden.epub': { title: 'Walden', body: 'Simplify, simplify.\n\nThe woods were quiet.' },
      'emma.epub': { title: 'Emma', body: 'Handsome, clever, and rich.' },
    });
    orchestrator = new LibraryOrchestrator({
      libraryPaths: [root],
      metadataCache: new MetadataCache(path.join(dataDir, 'metadata.json'), extractor),
      extractor,
      indexPath: path.join(dataDir, 'index.sqlite'),
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    removeDir(root);
    removeDir(dataDir);
  });

  it('recognises book files by extension', () => {
    expect(isBookFile('/lib/a.EPUB')).toBe(true);
    expect(isBookFile('/lib/b.azw3')).toBe(true);
    expect(isBookFile('/lib/notes.txt')).toBe(false);
  });

  it('debounces bursts of changes', () => {
    vi.useFakeTimers();
    const fn = vi.fn(async () => undefined);
    const schedule = debounce(fn, 500);
    schedule();
    schedule();
    vi.advanceTimersByTime(499);
    expect(fn).not.toHaveBeenCalled();
    schedule();
    vi.advanceTimersByTime(500);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('republishes the snapshot without touching the index', async () => {
    await createRefreshScheduler(orchestrator)();
    expect([...orchestrator.current.books.keys()].sort()).toEqual(['Emma', 'Walden']);
    expect(fs.existsSync(path.join(dataDir, 'index.sqlite'))).toBe(false);
  });

  it('keeps running when a refresh fails', async () => {
    vi.spyOn(orchestrator, 'refreshInBackground').mockRejectedValueOnce(new Error('scan failed'));
    vi.useFakeTimers();
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    debounce(createRefreshScheduler(orchestrator), 10)();
    await vi.advanceTimersByTimeAsync(10);
    await vi.waitFor(() => expect(error).toHaveBeenCalledWith('[watch] scheduled refresh failed:', 'scan failed'));
    error.mockRestore();
  });
});
