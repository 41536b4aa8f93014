import fs from 'fs';
import os from 'os';
import path from 'path';
import { isRecord } from './guards';

export interface FuzzyConfig {
  enabled: boolean;
  threshold: number;
}

export interface IndexConfig {
  path: string;
  forceRebuild: boolean;
}

export interface AppConfig {
  libraryPaths: string[];
  dataDir: string;
  metadataCachePath: string;
  index: IndexConfig;
  fuzzy: FuzzyConfig;
  textCacheSize: number;
  /** Age after which a snapshot served from the metadata cache is refreshed in the background. `0` disables. */
  maxStalenessMs: number;
  watchLibrary: boolean;
  redisUrl?: string;
  logDir: string;
}

interface FileConfig {
  libraryPaths?: string[];
  dataDir?: string;
  indexPath?: string;
  rebuildIndex?: boolean;
  fuzzy?: Partial<FuzzyConfig>;
  textCacheSize?: number;
  maxStalenessMs?: number;
  watchLibrary?: boolean;
  redisUrl?: string;
  logDir?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const defaults = {
  fuzzy: { enabled: true, threshold: 80 },
  textCacheSize: 8,
  maxStalenessMs: DAY_MS,
  watchLibrary: true,
};

function resolveConfigPath(custom?: string): string | undefined {
  if (custom && fs.existsSync(custom)) return custom;
  const envPath = process.env.LIBRIS_CONFIG_PATH;
  if (envPath && fs.existsSync(envPath)) return envPath;
  const defaultPath = path.join(process.cwd(), 'config', 'libris_config.json');
  if (fs.existsSync(defaultPath)) return defaultPath;
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function toFileConfig(raw: Record<string, unknown>): FileConfig {
  const fuzzy = isRecord(raw.fuzzy) ? raw.fuzzy : {};
  return {
    libraryPaths: Array.isArray(raw.libraryPaths)
      ? raw.libraryPaths.filter((p): p is string => typeof p === 'string' && p.length > 0)
      : undefined,
    dataDir: optionalString(raw.dataDir),
    indexPath: optionalString(raw.indexPath),
    rebuildIndex: optionalBoolean(raw.rebuildIndex),
    fuzzy: { enabled: optionalBoolean(fuzzy.enabled), threshold: optionalNumber(fuzzy.threshold) },
    textCacheSize: optionalNumber(raw.textCacheSize),
    maxStalenessMs: optionalNumber(raw.maxStalenessMs),
    watchLibrary: optionalBoolean(raw.watchLibrary),
    redisUrl: optionalString(raw.redisUrl),
    logDir: optionalString(raw.logDir),
  };
}

function readFileConfig(cfgPath: string | undefined): FileConfig {
  if (!cfgPath) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(cfgPath, 'utf8'));
    return isRecord(parsed) ? toFileConfig(parsed) : {};
  } catch (err) {
    console.warn(`[config] ignoring unreadable config ${cfgPath}:`, err);
    return {};
  }
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function parsePathList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(path.delimiter).map(p => p.trim()).filter(Boolean);
}

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw.toLowerCase() === 'true';
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Resolves configuration from defaults, an optional JSON file and the
 * environment, in increasing order of precedence.
 */
export function loadConfig(customPath?: string): AppConfig {
  const file = readFileConfig(resolveConfigPath(customPath));
  const envPaths = parsePathList(process.env.LIBRARY_PATHS);
  const libraryPaths = envPaths.length ? envPaths : file.libraryPaths ?? [];

  const dataDirRaw = process.env.DATA_DIR || file.dataDir || path.join(process.cwd(), 'data');
  const dataDir = path.resolve(expandHome(dataDirRaw));
  const indexRaw = process.env.INDEX_PATH || file.indexPath;
  const indexPath = indexRaw ? path.resolve(expandHome(indexRaw)) : path.join(dataDir, 'index.sqlite');

  const textCacheSize = envNumber('TEXT_CACHE_SIZE') ?? file.textCacheSize ?? defaults.textCacheSize;
  const redisUrl = process.env.REDIS_URL || file.redisUrl || undefined;
  const logDirRaw = process.env.LOG_DIR || file.logDir;

  return {
    libraryPaths,
    dataDir,
    metadataCachePath: path.join(dataDir, 'metadata.json'),
    index: {
      path: indexPath,
      forceRebuild: envFlag('REBUILD_INDEX') ?? file.rebuildIndex ?? false,
    },
    fuzzy: {
      enabled: envFlag('FUZZY_MATCHING') ?? file.fuzzy?.enabled ?? defaults.fuzzy.enabled,
      threshold: envNumber('FUZZY_THRESHOLD') ?? file.fuzzy?.threshold ?? defaults.fuzzy.threshold,
    },
    textCacheSize: Math.max(1, Math.floor(textCacheSize)),
    maxStalenessMs: Math.max(0, envNumber('MAX_STALENESS_MS') ?? file.maxStalenessMs ?? defaults.maxStalenessMs),
    watchLibrary: envFlag('WATCH_LIBRARY') ?? file.watchLibrary ?? defaults.watchLibrary,
    redisUrl,
    logDir: logDirRaw ? path.resolve(expandHome(logDirRaw)) : path.join(dataDir, 'logs'),
  };
}
