import { closeSync, openSync, writeSync } from "node:fs";

/**
 * Synchronous destination for rendered markup. A `write` that throws
 * aborts the render in progress; the error reaches the caller unchanged.
 */
export interface OutputSink {
  write(chunk: string): void;
}

/** Collects output in memory */
export class StringSink implements OutputSink {
  private parts: string[] = [];

  write(chunk: string): void {
    this.parts.push(chunk);
  }

  toString(): string {
    return this.parts.join("");
  }
}

/** Writes straight to a file; each write is complete before it returns */
export class FileSink implements OutputSink {
  private closed = false;

  private constructor(private readonly fd: number) {}

  /** Create (or truncate) `path` for writing */
  static open(path: string): FileSink {
    return new FileSink(openSync(path, "w"));
  }

  write(chunk: string): void {
    if (this.closed) {
      throw new Error("FileSink is closed");
    }
    const bytes = Buffer.from(chunk, "utf-8");
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    closeSync(this.fd);
  }
}
