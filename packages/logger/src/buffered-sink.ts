import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before eviction starts. Default 1000. */
  maxBuffer?: number | undefined;
}

const isProblem = (entry: LogEntry) => entry.level === 'warn' || entry.level === 'error';

/**
 * Queues entries for `target` and hands them over on the next macrotask, so
 * a consumer logging from inside an update loop never waits on output.
 *
 * When the queue is full, the oldest routine entry (trace to info) is evicted
 * first; warnings and errors such as consumer failures only go once nothing
 * else is left. One warning reports the evictions on the next hand-over.
 */
export class BufferedSink implements Sink {
  private queue: LogEntry[] = [];
  private evicted = 0;
  private handle: NodeJS.Immediate | undefined;
  private readonly maxBuffer: number;

  constructor(
    private readonly target: Sink,
    options: BufferedSinkOptions = {}
  ) {
    this.maxBuffer = options.maxBuffer ?? 1000;
  }

  write(entry: LogEntry): void {
    this.queue.push(entry);
    if (this.queue.length > this.maxBuffer) {
      const routine = this.queue.findIndex((queued) => !isProblem(queued));
      this.queue.splice(routine === -1 ? 0 : routine, 1);
      this.evicted++;
    }
    this.handle ??= setImmediate(() => this.handOver());
  }

  /** Hand everything over now and flush the target. Call before exit. */
  flush(): void {
    this.handOver();
    this.target.flush();
  }

  private handOver(): void {
    if (this.handle) {
      clearImmediate(this.handle);
      this.handle = undefined;
    }

    const batch = this.queue;
    this.queue = [];
    if (this.evicted > 0) {
      this.target.write({
        category: 'logger',
        context: { evicted: this.evicted },
        level: 'warn',
        msg: `Dropped ${this.evicted} log entries (buffer overflow)`,
        timestamp: new Date(),
      });
      this.evicted = 0;
    }
    batch.forEach((entry) => this.target.write(entry));
  }
}
