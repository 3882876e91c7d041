/**
 * Length-prefixed framing over a byte stream.
 *
 * Frame format:
 *   | length: uint32 little-endian | message: length bytes |
 *
 * Zero-length and oversized frames are rejected as soon as the header is
 * read. Every read and write carries its own deadline; expiry, EOF before
 * the full count, and socket errors all surface as FrameError and are
 * fatal for the connection.
 */

import type { Readable, Writable } from "node:stream";

// --- Constants ---

/** Size of the length prefix. */
export const HEADER_SIZE = 4;

/** Largest message accepted or written (32 MiB). */
export const MAX_MESSAGE_LENGTH = 32 * 1024 * 1024;

/** Per-call deadline for reads on an unresponsive connection (ms). */
export const DEFAULT_READ_TIMEOUT_MS = 10_000;

/** Per-call deadline for writes on an unresponsive connection (ms). */
export const DEFAULT_WRITE_TIMEOUT_MS = 10_000;

/** Buffered bytes above which the source is paused until a read drains it. */
const HIGH_WATER_MARK = HEADER_SIZE + MAX_MESSAGE_LENGTH;

// --- Errors ---

export type FrameErrorKind =
  | "oversized-message"
  | "empty-message"
  | "short-read"
  | "timeout"
  | "io";

export class FrameError extends Error {
  readonly kind: FrameErrorKind;

  constructor(kind: FrameErrorKind, message: string) {
    super(message);
    this.name = "FrameError";
    this.kind = kind;
  }
}

function checkLength(length: number): void {
  if (length === 0) {
    throw new FrameError("empty-message", "zero length message");
  }
  if (length > MAX_MESSAGE_LENGTH) {
    throw new FrameError(
      "oversized-message",
      `message length ${length} exceeds maximum ${MAX_MESSAGE_LENGTH}`,
    );
  }
}

// --- Writing ---

/**
 * Write one frame. Header and body go out in a single corked write, so
 * nothing else can interleave as long as there is one writer per socket.
 */
export async function writeMessage(
  conn: Writable,
  payload: Buffer,
  timeoutMs = DEFAULT_WRITE_TIMEOUT_MS,
): Promise<void> {
  checkLength(payload.length);

  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt32LE(payload.length, 0);

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new FrameError("timeout", `write timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    conn.cork();
    conn.write(header);
    conn.write(payload, (err) => {
      clearTimeout(timer);
      if (err) {
        reject(new FrameError("io", `write failed: ${err.message}`));
      } else {
        resolve();
      }
    });
    conn.uncork();
  });
}

// --- Reading ---

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Buffers a readable stream and hands out exact byte counts.
 * One read may be outstanding at a time.
 */
export class FrameReader {
  private source: Readable;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private pending: PendingRead | null = null;
  private ended = false;
  private failure: Error | null = null;

  constructor(source: Readable) {
    this.source = source;

    source.on("data", (chunk: Buffer | string) => {
      const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      this.chunks.push(data);
      this.buffered += data.length;
      if (this.buffered > HIGH_WATER_MARK) source.pause();
      this.flush();
    });

    source.on("error", (err: Error) => {
      this.failure = err;
      this.finish();
    });
    source.on("end", () => this.finish());
    source.on("close", () => this.finish());
  }

  get bufferedBytes(): number {
    return this.buffered;
  }

  readExact(size: number, timeoutMs = DEFAULT_READ_TIMEOUT_MS): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error("a read is already in progress"));
    }
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.ended) {
      return Promise.reject(this.shortRead(size));
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new FrameError("timeout", `read timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.pending = { size, resolve, reject, timer };
      if (this.source.isPaused()) this.source.resume();
    });
  }

  private flush(): void {
    const pending = this.pending;
    if (!pending || this.buffered < pending.size) return;

    clearTimeout(pending.timer);
    this.pending = null;
    pending.resolve(this.take(pending.size));
  }

  private finish(): void {
    this.ended = true;
    const pending = this.pending;
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(this.shortRead(pending.size));
  }

  private take(size: number): Buffer {
    const joined = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
    const out = joined.subarray(0, size);
    const rest = joined.subarray(size);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    if (this.source.isPaused() && this.buffered <= HIGH_WATER_MARK) {
      this.source.resume();
    }
    return out;
  }

  private shortRead(size: number): FrameError {
    const cause = this.failure ? `: ${this.failure.message}` : "";
    return new FrameError(
      "short-read",
      `connection ended with ${this.buffered} of ${size} bytes${cause}`,
    );
  }
}

/**
 * Read one frame: the length prefix, then exactly that many bytes.
 */
export async function readMessage(
  reader: FrameReader,
  timeoutMs = DEFAULT_READ_TIMEOUT_MS,
): Promise<Buffer> {
  const header = await reader.readExact(HEADER_SIZE, timeoutMs);
  const length = header.readUInt32LE(0);
  checkLength(length);
  return reader.readExact(length, timeoutMs);
}
