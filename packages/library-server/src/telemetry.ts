import fs from 'fs';
import path from 'path';

type MetricPayload = Record<string, unknown> & {
  name: string;
  duration_ms: number;
  ts: string;
};

export interface MetricAggregate {
  name: string;
  source: string;
  count: number;
  total: number;
  avg: number;
  max: number;
  min: number;
}

type AggregateKey = string;

const aggregates = new Map<AggregateKey, { count: number; total: number; max: number; min: number }>();
// metrics stay in memory until a log directory is configured
let logDir: string | undefined;
let promEnabled = true;
let jsonSnapshotEnabled = true;

export function configureTelemetry(options: { logDir?: string; disableProm?: boolean; disableSnapshot?: boolean } = {}) {
  if (options.logDir) logDir = path.resolve(options.logDir);
  if (typeof options.disableProm === 'boolean') promEnabled = !options.disableProm;
  if (typeof options.disableSnapshot === 'boolean') jsonSnapshotEnabled = !options.disableSnapshot;
}

export function resetTelemetry() {
  aggregates.clear();
  logDir = undefined;
  promEnabled = true;
  jsonSnapshotEnabled = true;
}

export function startTimer(name: string, attributes: Record<string, unknown> = {}) {
  const start = Date.now();
  return (extra: Record<string, unknown> = {}) => {
    const dur = Date.now() - start;
    const payload: MetricPayload = {
      ...attributes,
      ...extra,
      name,
      duration_ms: dur,
      ts: new Date().toISOString(),
    };
    writeMetric(payload);
  };
}

export function telemetrySnapshot(): MetricAggregate[] {
  return Array.from(aggregates.entries()).map(([key, stats]) => {
    const [name, source] = splitKey(key);
    const avg = stats.count ? stats.total / stats.count : 0;
    return { name, source, count: stats.count, total: stats.total, avg, max: stats.max, min: stats.min };
  });
}

function splitKey(key: AggregateKey): [string, string] {
  const idx = key.indexOf(':');
  return idx < 0 ? [key, 'unknown'] : [key.slice(0, idx), key.slice(idx + 1)];
}

function reportFailure(what: string, err: unknown) {
  if (process.env.DEBUG_TELEMETRY) {
    console.warn(`[telemetry] failed to write ${what}`, err);
  }
}

function writeMetric(m: MetricPayload) {
  updateAggregates(m);
  if (!logDir) return;
  try {
    fs.mkdirSync(logDir, { recursive: true });
    fs.appendFileSync(path.join(logDir, 'telemetry.log'), JSON.stringify(m) + '\n', 'utf8');
  } catch (err) {
    reportFailure('JSON log', err);
  }
  if (promEnabled) emitPrometheus(logDir);
  if (jsonSnapshotEnabled) emitJsonSnapshot(logDir);
}

function aggregateKey(m: MetricPayload): AggregateKey {
  const source = typeof m.source === 'string' ? m.source : 'unknown';
  return `${m.name}:${source}`;
}

function updateAggregates(m: MetricPayload) {
  const key = aggregateKey(m);
  const entry = aggregates.get(key) ?? { count: 0, total: 0, max: Number.MIN_SAFE_INTEGER, min: Number.MAX_SAFE_INTEGER };
  entry.count += 1;
  entry.total += m.duration_ms;
  entry.max = Math.max(entry.max, m.duration_ms);
  entry.min = Math.min(entry.min, m.duration_ms);
  aggregates.set(key, entry);
}

function emitPrometheus(dir: string) {
  try {
    const lines: string[] = [
      '# HELP libris_operation_duration_ms Library operation durations in milliseconds.',
      '# TYPE libris_operation_duration_ms summary',
    ];
    for (const m of telemetrySnapshot()) {
      const labels = `name="${m.name}",source="${m.source}"`;
      lines.push(`libris_operation_duration_ms_count{${labels}} ${m.count}`);
      lines.push(`libris_operation_duration_ms_sum{${labels}} ${m.total}`);
      lines.push(`libris_operation_duration_ms_avg{${labels}} ${m.avg.toFixed(2)}`);
      lines.push(`libris_operation_duration_ms_max{${labels}} ${m.max}`);
      lines.push(`libris_operation_duration_ms_min{${labels}} ${m.min}`);
    }
    fs.writeFileSync(path.join(dir, 'telemetry.prom'), lines.join('\n') + '\n', 'utf8');
  } catch (err) {
    reportFailure('Prometheus output', err);
  }
}

function emitJsonSnapshot(dir: string) {
  try {
    fs.writeFileSync(path.join(dir, 'telemetry_latest.json'), JSON.stringify(telemetrySnapshot(), null, 2), 'utf8');
  } catch (err) {
    reportFailure('JSON snapshot', err);
  }
}
