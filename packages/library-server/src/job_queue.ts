import { Queue, QueueEvents, Worker, type JobsOptions } from 'bullmq';
import IORedis from 'ioredis';
import { loadConfig } from './config';
import { EpubExtractor, type ContentExtractor } from './epub';
import { errorMessage } from './errors';
import { MetadataCache } from './metadata_cache';
import type { IndexBuilder } from './orchestrator';
import { ensureIndex, type EnsureIndexResult } from './search_index';
import { createTextProvider, TextCache } from './text_cache';

export const QUEUE_NAME = 'libris-jobs';
export const BUILD_INDEX_JOB = 'build-index';

export interface BuildIndexPayload {
  roots: string[];
  metadataCachePath: string;
  indexPath: string;
  forceRebuild?: boolean;
  textCacheSize?: number;
}

export type BuildIndexQueue = Queue<BuildIndexPayload, EnsureIndexResult>;

// completed jobs stay readable for waitUntilFinished
const JOB_OPTIONS: JobsOptions = { removeOnComplete: { age: 3600, count: 100 }, removeOnFail: 50 };

function connect(url?: string): IORedis {
  // blocking worker commands require maxRetriesPerRequest to be null
  return url ? new IORedis(url, { maxRetriesPerRequest: null }) : new IORedis({ maxRetriesPerRequest: null });
}

export function createQueue(name = QUEUE_NAME, connection?: string): BuildIndexQueue {
  return new Queue<BuildIndexPayload, EnsureIndexResult>(name, { connection: connect(connection) });
}

export function createQueueEvents(name = QUEUE_NAME, connection?: string): QueueEvents {
  return new QueueEvents(name, { connection: connect(connection) });
}

/** Adds a build job and resolves with the worker's result. */
export async function enqueueBuildIndex(
  queue: BuildIndexQueue,
  events: QueueEvents,
  payload: BuildIndexPayload,
  opts?: JobsOptions,
): Promise<EnsureIndexResult> {
  const job = await queue.add(BUILD_INDEX_JOB, payload, { ...JOB_OPTIONS, ...opts });
  return job.waitUntilFinished(events);
}

/**
 * Index builder for a server backed by the queue: every build runs on the
 * worker, which is then the single writer of the index and its sidecar. The
 * worker reads the metadata cache the server persisted for the same books.
 */
export function createQueuedIndexBuilder(
  queue: BuildIndexQueue,
  events: QueueEvents,
  base: Omit<BuildIndexPayload, 'forceRebuild'>,
): IndexBuilder {
  return (_books, { forceRebuild }) => enqueueBuildIndex(queue, events, { ...base, forceRebuild });
}

/**
 * Rebuilds the search index from the persisted metadata. The metadata cache
 * itself is only read here; the server process owns writing it.
 */
export async function runBuildIndex(payload: BuildIndexPayload, extractor: ContentExtractor = new EpubExtractor()): Promise<EnsureIndexResult> {
  const cache = new MetadataCache(payload.metadataCachePath, extractor);
  const { books } = await cache.load(payload.roots);
  const textProvider = createTextProvider(new TextCache(payload.textCacheSize), extractor);
  return ensureIndex(books.values(), textProvider, payload.indexPath, { forceRebuild: payload.forceRebuild });
}

export function startWorker(name = QUEUE_NAME, connection?: string): Worker<BuildIndexPayload, EnsureIndexResult> {
  const worker = new Worker<BuildIndexPayload, EnsureIndexResult>(
    name,
    async job => {
      if (job.name !== BUILD_INDEX_JOB) throw new Error(`unknown job ${job.name}`);
      return runBuildIndex(job.data);
    },
    { connection: connect(connection), concurrency: 1 },
  );
  worker.on('failed', (job, e) => console.error(`[jobs] ${job?.name ?? 'job'} failed:`, errorMessage(e)));
  worker.on('completed', (job, result) => console.info(`[jobs] ${job.name} done: rebuilt=${result.rebuilt} paragraphs=${result.paragraphs}`));
  return worker;
}

if (require.main === module) {
  const config = loadConfig();
  const url = config.redisUrl;
  console.log(`[jobs] worker listening on ${QUEUE_NAME}${url ? ` (${url})` : ''}`);
  const worker = startWorker(QUEUE_NAME, url);
  const shutdown = () => {
    worker.close().then(
      () => process.exit(0),
      e => {
        console.error('[jobs] worker close failed:', errorMessage(e));
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
