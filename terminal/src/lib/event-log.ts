/**
 * Diagnostic event log.
 *
 * Appends one `<ISO-8601 UTC> - <message>` line per event. Writes are chained
 * so lines land in call order, and a failed write never reaches the UI.
 */

import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export interface EventSink {
  write(message: string): void;
}

// biome-ignore lint/suspicious/noEmptyBlockStatements: log failures are dropped
const noop = () => {};

export function formatLogLine(message: string, at: Date = new Date()): string {
  return `${at.toISOString()} - ${message}\n`;
}

export class FileEventLog implements EventSink {
  readonly filePath: string;
  private readonly now: () => Date;
  private queue: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(filePath: string, opts: { now?: () => Date } = {}) {
    this.filePath = path.resolve(filePath);
    this.now = opts.now ?? (() => new Date());
  }

  write(message: string): void {
    const line = formatLogLine(message, this.now());
    this.queue = this.queue
      .then(async () => {
        if (!this.dirReady) {
          await mkdir(path.dirname(this.filePath), { recursive: true });
          this.dirReady = true;
        }
        await appendFile(this.filePath, line, "utf8");
      })
      .catch(noop);
  }

  /** Resolves once every queued line has been written (or dropped). */
  flush(): Promise<void> {
    return this.queue;
  }
}

export const silentEventLog: EventSink = {
  write: noop,
};
