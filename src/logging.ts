import pino from 'pino';
import { LogLevel } from './types.js';

export type Entry = { level: LogLevel; msg: string; time: number };

const RING_MAX = 2000;

export interface RunLoggerOptions {
  level?: LogLevel;
  /** Log file, appended to. Ignored when `stream` is given. */
  logPath?: string;
  stream?: pino.DestinationStream;
}

/**
 * One logger per run. Lines go to the pino sink as
 * `{"level":"info","time":"<iso>","msg":"..."}`; entries that pass the level
 * threshold are also kept in a ring buffer; the CLI reads the errors back from
 * it for its end-of-run report.
 */
export class RunLogger {
  private readonly logger: pino.Logger;
  private readonly ring: Entry[] = [];
  private readonly closeSink: () => void;
  private closed = false;

  constructor(opts: RunLoggerOptions = {}) {
    let stream: pino.DestinationStream;
    if (opts.stream) {
      stream = opts.stream;
      this.closeSink = () => {};
    } else {
      // sync: entries are on disk as soon as log() returns
      const dest = pino.destination({ dest: opts.logPath ?? 'renaming.log', append: true, sync: true, mkdir: true });
      stream = dest;
      this.closeSink = () => dest.end();
    }
    this.logger = pino({
      level: opts.level ?? 'info',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: { level: (label) => ({ level: label }) },
    }, stream);
  }

  log(level: LogLevel, msg: string) {
    if (this.closed || !this.logger.isLevelEnabled(level)) return;
    this.ring.push({ level, msg, time: Date.now() });
    if (this.ring.length > RING_MAX) this.ring.splice(0, this.ring.length - RING_MAX);
    this.logger[level](msg);
  }

  info(msg: string) { this.log('info', msg); }
  warn(msg: string) { this.log('warn', msg); }
  error(msg: string) { this.log('error', msg); }
  debug(msg: string) { this.log('debug', msg); }

  getLogs(level?: LogLevel): Entry[] {
    return this.ring.filter(e => !level || e.level === level);
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    this.closeSink();
  }
}

export function isLogLevel(s: string): s is LogLevel {
  return s === 'debug' || s === 'info' || s === 'warn' || s === 'error';
}

export function normalizeError(err: unknown): { code: string; message: string } {
  if (err && typeof err === 'object') {
    const code = 'code' in err && typeof err.code === 'string' ? err.code
      : 'name' in err && typeof err.name === 'string' ? err.name : 'ERROR';
    const message = 'message' in err && typeof err.message === 'string' ? err.message : String(err);
    return { code, message };
  }
  return { code: 'ERROR', message: String(err) };
}
