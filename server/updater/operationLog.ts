import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export interface OperationLogSink {
  append(message: string): Promise<void>;
}

export interface OperationLogOptions {
  now?: () => Date;
  /** Called with every message after it is written; used for `--verbose` echo. */
  onMessage?: (message: string) => void;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLogLine(message: string, date: Date): string {
  return `[${formatLogTimestamp(date)}] ${message.replace(/\r?\n/g, " ")}\n`;
}

/**
 * Append-only, human-readable run log. Appends are chained so lines from
 * concurrent checks land whole and in call order.
 */
export class OperationLog implements OperationLogSink {
  private tail: Promise<void> = Promise.resolve();
  private directoryReady = false;
  private readonly now: () => Date;

  constructor(
    private readonly filePath: string,
    private readonly options: OperationLogOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.filePath;
  }

  append(message: string): Promise<void> {
    const line = formatLogLine(message, this.now());
    const write = this.tail.then(async () => {
      if (!this.directoryReady) {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        this.directoryReady = true;
      }
      await appendFile(this.filePath, line, "utf8");
      this.options.onMessage?.(message);
    });

    // A failed write is reported here and must not wedge every later one.
    this.tail = write.catch((error: unknown) => {
      console.error("[operation-log-error]", error);
    });
    return this.tail;
  }

  async flush(): Promise<void> {
    await this.tail;
  }
}
