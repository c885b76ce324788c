import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { TraceEvent, TraceSink } from "../types/Events.js";
import { createLogger, type Logger } from "./Logger.js";

export interface JsonlTraceSinkOptions {
  logger?: Logger;
}

/**
 * Appends one JSON line per event to a file.
 * Writes go through a single queue, so records from concurrent sessions
 * never interleave.
 */
export class JsonlTraceSink implements TraceSink {
  private queue: Promise<void>;
  private written = 0;
  private failed = 0;
  private readonly logger: Logger;

  constructor(
    readonly filePath: string,
    options: JsonlTraceSinkOptions = {},
  ) {
    this.logger = options.logger ?? createLogger();
    this.queue = mkdir(dirname(filePath), { recursive: true }).then(
      () => undefined,
      (err: unknown) => this.onError(err),
    );
  }

  record(event: TraceEvent): void {
    const line = `${JSON.stringify(event)}\n`;
    this.queue = this.queue
      .then(() => appendFile(this.filePath, line, "utf8"))
      .then(
        () => {
          this.written++;
        },
        (err: unknown) => this.onError(err),
      );
  }

  /**
   * Resolves once every recorded event has been written (or has failed).
   */
  async flush(): Promise<void> {
    await this.queue;
  }

  get stats(): { written: number; failed: number } {
    return { written: this.written, failed: this.failed };
  }

  /** The first failure is logged at warn level, later ones at debug. */
  private onError(err: unknown): void {
    this.failed++;
    const meta = {
      file: this.filePath,
      failed: this.failed,
      error: err instanceof Error ? err.message : String(err),
    };
    if (this.failed === 1) this.logger.warn("trace.jsonl.write_failed", meta);
    else this.logger.debug("trace.jsonl.write_failed", meta);
  }
}

