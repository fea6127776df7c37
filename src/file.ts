import { once } from "node:events";
import { PassThrough, type Readable } from "node:stream";
import { DriveError } from "./errors.js";
import type { DriveNode } from "./node.js";

/** `create` writes, creating the file on close if it does not exist yet. */
export type OpenMode = "read" | "write" | "create";

const DEFAULT_READ_SIZE = 64 * 1024;

/**
 * An open remote file. Transfers run against the store while the caller
 * reads or writes; `close` must always be awaited.
 */
export interface FileHandle {
  /** Null for a create handle until its upload has finished. */
  readonly node: DriveNode | null;
  /** Up to `length` bytes, or null at end of file. */
  read(length?: number): Promise<Buffer | null>;
  /** Resolves with the number of bytes accepted. */
  write(chunk: Uint8Array | string): Promise<number>;
  close(): Promise<void>;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  throw new TypeError(`Unexpected chunk type from download stream: ${typeof chunk}`);
}

/**
 * Read side. The download is requested on the first `read` or `close`,
 * never at open time, and only once.
 */
export class ReadHandle implements FileHandle {
  private stream: Promise<Readable> | null = null;
  private chunks: AsyncIterator<unknown> | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private closed = false;

  constructor(
    readonly node: DriveNode,
    private download: () => Promise<Readable>,
  ) {}

  private acquire(): Promise<Readable> {
    this.stream ??= this.download();
    return this.stream;
  }

  async read(length = DEFAULT_READ_SIZE): Promise<Buffer | null> {
    if (this.closed) {
      throw new DriveError("EBADF", "file is closed");
    }
    const stream = await this.acquire();
    this.chunks ??= stream[Symbol.asyncIterator]();

    while (this.pending.byteLength === 0) {
      const next = await this.chunks.next();
      if (next.done) return null;
      this.pending = toBuffer(next.value);
    }

    const out = this.pending.subarray(0, length);
    this.pending = this.pending.subarray(out.byteLength);
    return out;
  }

  async write(): Promise<number> {
    throw new DriveError("EBADF", "open the file in write mode to write to it");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const stream = await this.acquire();
    stream.destroy();
  }
}

interface Upload {
  pipe: PassThrough;
  /** Settles when the background upload does; never rejects. */
  done: Promise<void>;
  failure: { error: unknown } | null;
}

/**
 * Write side. The first `write` (or a `close` with no writes) opens a pipe
 * and starts one background upload that consumes it. `close` ends the
 * pipe and waits for that upload, rethrowing its error.
 */
export class WriteHandle implements FileHandle {
  private upload: Upload | null = null;
  private closed = false;

  constructor(
    private current: DriveNode | null,
    private send: (content: Readable) => Promise<DriveNode>,
  ) {}

  get node(): DriveNode | null {
    return this.current;
  }

  private start(): Upload {
    if (this.upload) return this.upload;

    const pipe = new PassThrough();
    const upload: Upload = { pipe, done: Promise.resolve(), failure: null };
    const fail = (error: unknown) => {
      upload.failure ??= { error };
    };
    // The consumer may destroy the pipe when it gives up.
    pipe.on("error", fail);
    upload.done = this.send(pipe).then((node) => {
      this.current = node;
    }, fail);

    this.upload = upload;
    return upload;
  }

  private check(upload: Upload): void {
    if (upload.failure) throw upload.failure.error;
  }

  async read(): Promise<Buffer | null> {
    throw new DriveError("EBADF", "open the file in read mode to read from it");
  }

  async write(chunk: Uint8Array | string): Promise<number> {
    if (this.closed) {
      throw new DriveError("EBADF", "file is closed");
    }
    const upload = this.start();
    this.check(upload);

    const data = toBuffer(chunk);
    if (!upload.pipe.write(data)) {
      const abort = new AbortController();
      try {
        await Promise.race([
          once(upload.pipe, "drain", { signal: abort.signal }),
          upload.done,
        ]);
      } finally {
        abort.abort();
      }
    }
    this.check(upload);
    return data.byteLength;
  }

  async close(): Promise<void> {
    const upload = this.start();
    if (!this.closed) {
      this.closed = true;
      upload.pipe.end();
    }
    await upload.done;
    this.check(upload);
  }
}
