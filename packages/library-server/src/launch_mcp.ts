#!/usr/bin/env node
import type { FSWatcher } from 'chokidar';
import type { QueueEvents } from 'bullmq';
import { loadConfig } from './config';
import { EpubExtractor } from './epub';
import { errorMessage } from './errors';
import { createQueue, createQueueEvents, createQueuedIndexBuilder, type BuildIndexQueue } from './job_queue';
import { startAdapter } from './mcp_adapter';
import { LibraryOrchestrator, type OrchestratorOptions } from './orchestrator';
import { normalizeRoots } from './scanner';
import { configureTelemetry } from './telemetry';
import { startWatcher } from './watcher';

// stdout carries protocol frames only
function routeConsoleToStderr() {
  const passThrough = (stream: 'log' | 'info' | 'warn') => (...args: unknown[]) =>
    console.error(`[${stream}]`, ...args);
  console.log = passThrough('log');
  console.info = passThrough('info');
  console.warn = passThrough('warn');
}

async function main() {
  if (process.env.LIBRIS_STDOUT_LOGS !== '1') routeConsoleToStderr();

  const config = loadConfig(process.argv[2]);
  configureTelemetry({ logDir: config.logDir });
  console.info(`[mcp] dataDir=${config.dataDir} index=${config.index.path}`);

  let queue: BuildIndexQueue | undefined;
  let events: QueueEvents | undefined;
  const overrides: Partial<OrchestratorOptions> = {};
  if (config.redisUrl) {
    queue = createQueue(undefined, config.redisUrl);
    events = createQueueEvents(undefined, config.redisUrl);
    overrides.indexBuilder = createQueuedIndexBuilder(queue, events, {
      roots: normalizeRoots(config.libraryPaths),
      metadataCachePath: config.metadataCachePath,
      indexPath: config.index.path,
      textCacheSize: config.textCacheSize,
    });
    console.info('[mcp] index builds run on the job queue worker');
  }

  const orchestrator = LibraryOrchestrator.fromConfig(config, new EpubExtractor(), overrides);
  const snapshot = await orchestrator.init();
  console.info(`[mcp] loaded ${snapshot.books.size} books${snapshot.fromCache ? ' from cache' : ''}`);

  let watcher: FSWatcher | undefined;
  if (config.watchLibrary && orchestrator.libraryRoots.length) {
    watcher = startWatcher(orchestrator);
  }

  const rl = startAdapter(orchestrator);
  console.info('[mcp] library server ready on stdio');

  let closing = false;
  const shutdown = () => {
    if (closing) return;
    closing = true;
    rl.close();
    Promise.all([watcher?.close(), events?.close(), queue?.close()]).then(
      () => process.exit(0),
      e => {
        console.error('[mcp] shutdown failed:', errorMessage(e));
        process.exit(1);
      },
    );
  };
  rl.on('close', shutdown);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(e => {
  console.error('[mcp] failed to start:', errorMessage(e));
  process.exit(1);
});
