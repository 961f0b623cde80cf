import fs from 'node:fs/promises';
import path from 'node:path';
import { isoNow } from '../utils/time.js';
import { toJsonSafe } from '../utils/json.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  data: unknown;
}

/**
 * Append-only NDJSON event log. Without a file it keeps the most recent
 * entries in memory only.
 */
export class EventLogger {
  private queue: Promise<void> = Promise.resolve();
  private readonly recent: LogEntry[] = [];
  private failedWrites = 0;

  constructor(
    private readonly logFile?: string,
    private readonly recentLimit = 200,
  ) {}

  async init(): Promise<void> {
    if (!this.logFile) return;
    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
  }

  async log(level: LogLevel, event: string, data: unknown = {}): Promise<void> {
    const entry: LogEntry = { ts: isoNow(), level, event, data: toJsonSafe(data) };
    this.recent.push(entry);
    if (this.recent.length > this.recentLimit) this.recent.shift();

    const file = this.logFile;
    if (!file) return;

    const line = `${JSON.stringify(entry)}\n`;
    const write = this.queue.then(() => fs.appendFile(file, line));
    // The failure reaches this caller and is counted; later writes still run.
    this.queue = write.catch(() => {
      this.failedWrites += 1;
    });
    await write;
  }

  /** File appends that failed since start. Their entries remain in the in-memory tail. */
  get writeFailures(): number {
    return this.failedWrites;
  }

  /** Newest first. */
  tail(limit = 50): LogEntry[] {
    return this.recent.slice(-limit).reverse();
  }
}
