/*
 * Leveled logger for the dataset tools. One line per event, named with dotted
 * keys (`detect.start`, `run.video.done`); JSON by default, colored text with
 * LOG_FORMAT=pretty. Long loops report through `startStep`.
 */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, { rank: number; ansi: string }> = {
  debug: { rank: 10, ansi: '\u001b[90m' },
  info: { rank: 20, ansi: '\u001b[36m' },
  warn: { rank: 30, ansi: '\u001b[33m' },
  error: { rank: 40, ansi: '\u001b[31m' },
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && v in LEVELS;
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const pretty = process.env.LOG_FORMAT === 'pretty';
const progressEveryMs = Number(process.env.PROGRESS_INTERVAL_MS || 1500);

let fileFd: number | null = null;
const lastProgressAt = new Map<string, number>();

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

/** Appends every emitted event as JSON to `filePath`, in addition to stdout. */
export function setLogFile(filePath: string) {
  try {
    if (fileFd !== null) fs.closeSync(fileFd);
    fileFd = null;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fileFd = fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVELS[level].rank < LEVELS[threshold].rank) return;
  const event = { t: new Date().toISOString(), level, msg, ...meta };
  const json = JSON.stringify(event);
  if (pretty) {
    const head = `${LEVELS[level].ansi}${event.t} ${level.toUpperCase()} ${msg}\u001b[0m`;
    const tail = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    // eslint-disable-next-line no-console
    console.log(head + tail);
  } else {
    // eslint-disable-next-line no-console
    console.log(json);
  }
  if (fileFd !== null) fs.writeSync(fileFd, json + '\n');
}

export const debug = (msg: string, meta?: LogMeta) => emit('debug', msg, meta);
export const info = (msg: string, meta?: LogMeta) => emit('info', msg, meta);
export const warn = (msg: string, meta?: LogMeta) => emit('warn', msg, meta);
export const error = (msg: string, meta?: LogMeta) => emit('error', msg, meta);

function progressDue(key: string): boolean {
  const now = performance.now();
  if (now - (lastProgressAt.get(key) ?? 0) < progressEveryMs) return false;
  lastProgressAt.set(key, now);
  return true;
}

export interface StepTimer {
  /** Logs `end:<name>` with the elapsed milliseconds. */
  end: (meta?: LogMeta) => void;
  /** Logs `progress:<name>` with an ETA, at most once per PROGRESS_INTERVAL_MS. */
  eta: (done: number, total: number) => void;
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const startedAt = performance.now();
  info(`start:${name}`, meta);
  return {
    end(endMeta) {
      info(`end:${name}`, { ms: Math.round(performance.now() - startedAt), ...meta, ...endMeta });
    },
    eta(done, total) {
      if (total <= 0 || !progressDue(name)) return;
      const perItem = done > 0 ? (performance.now() - startedAt) / done : 0;
      info(`progress:${name}`, {
        done,
        total,
        pct: Number(((done / total) * 100).toFixed(2)),
        etaMs: Math.round(perItem * (total - done)),
      });
    },
  };
}
