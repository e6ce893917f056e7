import * as fs from "node:fs";

/**
 * Where rendered DOT text goes. `write` is synchronous and reports failure by
 * throwing.
 */
export interface OutputSink {
  write(chunk: string): void;
}

export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  public write(chunk: string): void {
    this.chunks.push(chunk);
  }

  public toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Writes UTF-8 text straight to a file descriptor. The descriptor must be
 * blocking: a non-blocking one (a stdout some parent made non-blocking) fails
 * with `EAGAIN`. Use `StreamSink` for `process.stdout`.
 */
export class FileSink implements OutputSink {
  private closed = false;

  public constructor(
    public readonly fd: number,
    private readonly ownsFd = false
  ) {}

  /** Creates or truncates `filePath`; `close()` releases it. */
  public static open(filePath: string): FileSink {
    return new FileSink(fs.openSync(filePath, "w"), true);
  }

  public write(chunk: string): void {
    if (this.closed) throw new Error("FileSink is closed");

    const buf = Buffer.from(chunk, "utf8");
    let offset = 0;
    // writeSync may accept fewer bytes than asked for (pipes, ttys).
    while (offset < buf.length) {
      const written = this.writeBytes(buf, offset, buf.length - offset);
      if (written <= 0) {
        throw new Error(`FileSink wrote no bytes to fd ${this.fd} (${buf.length - offset} pending)`);
      }
      offset += written;
    }
  }

  protected writeBytes(buf: Buffer, offset: number, length: number): number {
    return fs.writeSync(this.fd, buf, offset, length);
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsFd) fs.closeSync(this.fd);
  }
}

/** The part of a Node `Writable` a `StreamSink` needs. */
export interface TextStream {
  write(chunk: string): unknown;
}

/**
 * Hands each chunk to a stream such as `process.stdout`, which buffers when
 * the underlying descriptor is busy. Errors the stream reports later, on its
 * `error` event, are not seen by the renderer.
 */
export class StreamSink implements OutputSink {
  public constructor(private readonly stream: TextStream) {}

  public write(chunk: string): void {
    this.stream.write(chunk);
  }
}
