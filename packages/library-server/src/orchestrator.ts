import type { BookRecord, MetadataSearchResult, TopicSearchResult } from '@libris/shared';
import type { AppConfig } from './config';
import { EpubExtractor, type ContentExtractor } from './epub';
import { errorMessage } from './errors';
import { createMatcher, type Matcher } from './matching';
import { MetadataCache } from './metadata_cache';
import { normalizeRoots } from './scanner';
import { searchMetadata, searchTopic, type TopicSearchRequest } from './search';
import { ensureIndex, type EnsureIndexOptions, type EnsureIndexResult } from './search_index';
import { startTimer } from './telemetry';
import { createTextProvider, TextCache, type TextProvider } from './text_cache';

/** Immutable view of the library published to queries. */
export interface LibrarySnapshot {
  readonly books: ReadonlyMap<string, BookRecord>;
  readonly loadedAt: Date;
  readonly fromCache: boolean;
  readonly generatedAt?: Date;
}

/** Brings the index at the orchestrator's `indexPath` up to date with `books`. */
export type IndexBuilder = (books: ReadonlyMap<string, BookRecord>, options: EnsureIndexOptions) => Promise<EnsureIndexResult>;

export interface OrchestratorOptions {
  libraryPaths: string[];
  metadataCache: MetadataCache;
  extractor: ContentExtractor;
  indexPath: string;
  matcher?: Matcher;
  textCache?: TextCache;
  /** Replaces the in-process build, e.g. with a queue job; it is then the only index writer. */
  indexBuilder?: IndexBuilder;
  /** Forces index builds until one succeeds. */
  forceRebuild?: boolean;
  maxStalenessMs?: number;
  now?: () => Date;
}

const EMPTY_SNAPSHOT: LibrarySnapshot = { books: new Map(), loadedAt: new Date(0), fromCache: false };

export class LibraryOrchestrator {
  private snapshot: LibrarySnapshot = EMPTY_SNAPSHOT;
  private refreshing?: Promise<void>;
  private indexing?: Promise<EnsureIndexResult>;
  private indexedFor?: ReadonlyMap<string, BookRecord>;
  private pendingForce: boolean;
  private readonly roots: string[];
  private readonly matcher: Matcher;
  private readonly textProvider: TextProvider;
  private readonly indexBuilder: IndexBuilder;
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.roots = normalizeRoots(options.libraryPaths);
    this.matcher = options.matcher ?? createMatcher({ fuzzy: true });
    this.textProvider = createTextProvider(options.textCache ?? new TextCache(), options.extractor);
    this.indexBuilder = options.indexBuilder ?? ((books, opts) => ensureIndex(books.values(), this.textProvider, options.indexPath, opts));
    this.pendingForce = !!options.forceRebuild;
    this.now = options.now ?? (() => new Date());
  }

  static fromConfig(
    config: AppConfig,
    extractor: ContentExtractor = new EpubExtractor(),
    overrides: Partial<OrchestratorOptions> = {},
  ): LibraryOrchestrator {
    return new LibraryOrchestrator({
      libraryPaths: config.libraryPaths,
      metadataCache: new MetadataCache(config.metadataCachePath, extractor),
      extractor,
      indexPath: config.index.path,
      matcher: createMatcher({ fuzzy: config.fuzzy.enabled, threshold: config.fuzzy.threshold }),
      textCache: new TextCache(config.textCacheSize),
      forceRebuild: config.index.forceRebuild,
      maxStalenessMs: config.maxStalenessMs,
      ...overrides,
    });
  }

  get libraryRoots(): string[] {
    return [...this.roots];
  }

  get indexPath(): string {
    return this.options.indexPath;
  }

  get current(): LibrarySnapshot {
    return this.snapshot;
  }

  get isRefreshing(): boolean {
    return this.refreshing !== undefined;
  }

  /**
   * Serves the persisted metadata immediately when it exists and revalidates
   * it in the background; otherwise performs a blocking refresh.
   */
  async init(): Promise<LibrarySnapshot> {
    const loaded = await this.options.metadataCache.load(this.roots);
    if (loaded.books.size) {
      this.swapSnapshot(loaded.books, { fromCache: true, generatedAt: loaded.generatedAt });
      void this.refreshInBackground();
      return this.snapshot;
    }
    const books = await this.options.metadataCache.refresh(this.roots);
    this.swapSnapshot(books);
    return this.snapshot;
  }

  /** Blocking rescan; publishes and returns the new snapshot. */
  async refresh(): Promise<LibrarySnapshot> {
    const books = await this.options.metadataCache.refresh(this.roots);
    this.swapSnapshot(books);
    return this.snapshot;
  }

  /**
   * Starts a rescan unless one is already running. The returned promise
   * settles when it finishes and never rejects; a failed refresh keeps the
   * current snapshot.
   */
  refreshInBackground(): Promise<void> {
    if (this.refreshing) return this.refreshing;
    const run = this.options.metadataCache
      .refresh(this.roots)
      .then(
        books => {
          this.swapSnapshot(books);
          console.info(`[orchestrator] background refresh published ${books.size} books`);
        },
        err => {
          console.error('[orchestrator] background refresh failed; keeping current snapshot:', errorMessage(err));
        },
      )
      .finally(() => {
        this.refreshing = undefined;
      });
    this.refreshing = run;
    return run;
  }

  swapSnapshot(books: ReadonlyMap<string, BookRecord>, meta: { fromCache?: boolean; generatedAt?: Date } = {}): void {
    this.snapshot = {
      books: new Map(books),
      loadedAt: this.now(),
      fromCache: !!meta.fromCache,
      generatedAt: meta.generatedAt,
    };
  }

  private isStale(snapshot: LibrarySnapshot): boolean {
    const maxAge = this.options.maxStalenessMs ?? 0;
    if (!snapshot.fromCache || maxAge <= 0 || !snapshot.generatedAt) return false;
    return this.now().getTime() - snapshot.generatedAt.getTime() > maxAge;
  }

  /** Captures the snapshot a query works against and schedules revalidation when it is stale. */
  private acquire(): LibrarySnapshot {
    const snapshot = this.snapshot;
    if (this.isStale(snapshot) && !this.refreshing) {
      console.info('[orchestrator] metadata snapshot is stale; refreshing in background');
      void this.refreshInBackground();
    }
    return snapshot;
  }

  /** One index build at a time; callers for the same snapshot share it. */
  private prepareIndex(books: ReadonlyMap<string, BookRecord>): Promise<EnsureIndexResult> {
    if (this.indexing && this.indexedFor === books) return this.indexing;
    const previous = this.indexing ?? Promise.resolve();
    const run = previous
      // a failed build was already reported to its own callers
      .catch(() => undefined)
      .then(async () => {
        const forceRebuild = this.pendingForce;
        const result = await this.indexBuilder(books, { forceRebuild });
        if (forceRebuild) this.pendingForce = false;
        return result;
      });
    this.indexing = run;
    this.indexedFor = books;
    const clear = () => {
      if (this.indexing === run) {
        this.indexing = undefined;
        this.indexedFor = undefined;
      }
    };
    void run.then(clear, clear);
    return run;
  }

  listBooks(): BookRecord[] {
    return [...this.acquire().books.values()];
  }

  searchBooks(query: string): MetadataSearchResult[] {
    return searchMetadata(query, this.acquire().books, this.matcher);
  }

  async findTopic(request: TopicSearchRequest): Promise<TopicSearchResult> {
    const books = this.acquire().books;
    const stop = startTimer('find_topic', { source: 'orchestrator' });
    const result = await searchTopic(request, books, {
      indexPath: this.options.indexPath,
      textProvider: this.textProvider,
      prepareIndex: () => this.prepareIndex(books),
    });
    stop({ total: result.total_results });
    return result;
  }

  /** Rebuilds the index for the current snapshot when it is out of date. */
  buildIndex(): Promise<EnsureIndexResult> {
    return this.prepareIndex(this.snapshot.books);
  }
}
