import chokidar, { type FSWatcher } from 'chokidar';
import path from 'path';
import { errorMessage } from './errors';
import type { LibraryOrchestrator } from './orchestrator';
import { SUPPORTED_EXTENSIONS } from './scanner';

export interface WatcherOptions {
  debounceMs?: number;
}

export function isBookFile(file: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/**
 * Republishes the library snapshot after files under the roots change. The
 * index catches up on the next topic query.
 */
export function createRefreshScheduler(orchestrator: LibraryOrchestrator): () => Promise<void> {
  return async () => {
    await orchestrator.refreshInBackground();
    console.log('[watch] library snapshot refreshed');
  };
}

export function startWatcher(orchestrator: LibraryOrchestrator, options: WatcherOptions = {}): FSWatcher {
  const roots = orchestrator.libraryRoots;
  const watcher = chokidar.watch(roots, {
    ignored: /(^|[/\\])\../,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 1000 },
  });
  const schedule = debounce(createRefreshScheduler(orchestrator), options.debounceMs ?? 500);
  const onChange = (file: string) => {
    if (isBookFile(file)) schedule();
  };
  watcher.on('add', onChange).on('change', onChange).on('unlink', onChange);
  watcher.on('error', e => console.error('[watch] watcher error:', errorMessage(e)));
  return watcher;
}

export function debounce(fn: () => Promise<void>, ms: number): () => void {
  let t: NodeJS.Timeout | undefined;
  return () => {
    if (t) clearTimeout(t);
    t = setTimeout(() => {
      t = undefined;
      fn().catch(e => console.error('[watch] scheduled refresh failed:', errorMessage(e)));
    }, ms);
  };
}
