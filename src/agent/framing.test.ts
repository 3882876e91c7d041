import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import {
  FrameError,
  FrameReader,
  HEADER_SIZE,
  MAX_MESSAGE_LENGTH,
  readMessage,
  writeMessage,
} from "./framing.js";

function header(length: number): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  buf.writeUInt32LE(length, 0);
  return buf;
}

function pipePair(): { stream: PassThrough; reader: FrameReader } {
  const stream = new PassThrough();
  return { stream, reader: new FrameReader(stream) };
}

async function expectFrameError(promise: Promise<unknown>, kind: FrameError["kind"]): Promise<void> {
  const err = await promise.then(
    () => null,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(FrameError);
  if (err instanceof FrameError) expect(err.kind).toBe(kind);
}

describe("writeMessage", () => {
  it("prefixes the payload with its little-endian length", async () => {
    const stream = new PassThrough();
    const received: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => received.push(chunk));

    await writeMessage(stream, Buffer.from("abc"));

    expect(Buffer.concat(received)).toEqual(Buffer.from([3, 0, 0, 0, 0x61, 0x62, 0x63]));
  });

  it("rejects an empty payload without writing", async () => {
    const stream = new PassThrough();
    await expectFrameError(writeMessage(stream, Buffer.alloc(0)), "empty-message");
    expect(stream.readableLength).toBe(0);
  });

  it("rejects a payload over the maximum", async () => {
    const stream = new PassThrough();
    await expectFrameError(
      writeMessage(stream, Buffer.alloc(MAX_MESSAGE_LENGTH + 1)),
      "oversized-message",
    );
  });

  it("fails with an io error on a destroyed stream", async () => {
    const stream = new PassThrough();
    stream.on("error", () => {});
    stream.destroy();
    await expectFrameError(writeMessage(stream, Buffer.from("late")), "io");
  });

  it("times out when the stream stops draining", async () => {
    // Nothing reads the PassThrough, so a 1 MiB body is never flushed.
    const stream = new PassThrough();
    await expectFrameError(writeMessage(stream, Buffer.alloc(1024 * 1024), 50), "timeout");
  });
});

describe("readMessage", () => {
  it("round-trips a single message", async () => {
    const { stream, reader } = pipePair();
    const payload = Buffer.from("consensus round 7");

    await writeMessage(stream, payload);

    expect(await readMessage(reader)).toEqual(payload);
  });

  it("reads consecutive messages in order", async () => {
    const { stream, reader } = pipePair();

    await writeMessage(stream, Buffer.from("one"));
    await writeMessage(stream, Buffer.from("two"));
    await writeMessage(stream, Buffer.from("three"));

    expect((await readMessage(reader)).toString()).toBe("one");
    expect((await readMessage(reader)).toString()).toBe("two");
    expect((await readMessage(reader)).toString()).toBe("three");
  });

  it("reassembles a frame split across chunks", async () => {
    const { stream, reader } = pipePair();
    const pending = readMessage(reader);

    stream.write(Buffer.from([5, 0]));
    stream.write(Buffer.from([0, 0, 0x68, 0x65]));
    stream.write(Buffer.from("llo"));

    expect((await pending).toString()).toBe("hello");
  });

  it("round-trips single-byte and maximum-size messages", async () => {
    const { stream, reader } = pipePair();
    const tiny = Buffer.from([0xff]);
    const largest = Buffer.alloc(MAX_MESSAGE_LENGTH, 0xab);
    largest[largest.length - 1] = 0x01;

    await writeMessage(stream, tiny);
    expect(await readMessage(reader)).toEqual(tiny);

    const written = writeMessage(stream, largest);
    const read = await readMessage(reader);
    await written;

    expect(read.length).toBe(MAX_MESSAGE_LENGTH);
    expect(read[0]).toBe(0xab);
    expect(read[read.length - 1]).toBe(0x01);
  });

  it("rejects a zero length header", async () => {
    const { stream, reader } = pipePair();
    stream.write(header(0));
    await expectFrameError(readMessage(reader), "empty-message");
  });

  it("rejects an oversized header without waiting for the body", async () => {
    const { stream, reader } = pipePair();
    stream.write(header(MAX_MESSAGE_LENGTH + 1));
    await expectFrameError(readMessage(reader, 60_000), "oversized-message");
  });

  it("fails with short-read when the stream ends mid-frame", async () => {
    const { stream, reader } = pipePair();
    stream.write(header(10));
    stream.end(Buffer.from("abc"));
    await expectFrameError(readMessage(reader), "short-read");
  });

  it("fails with short-read when reading after the stream ended", async () => {
    const { stream, reader } = pipePair();
    stream.end();
    await new Promise((resolve) => setImmediate(resolve));
    await expectFrameError(readMessage(reader), "short-read");
  });

  it("times out on an idle stream", async () => {
    const { reader } = pipePair();
    await expectFrameError(readMessage(reader, 20), "timeout");
  });

  it("refuses concurrent reads", async () => {
    const { stream, reader } = pipePair();
    const first = reader.readExact(4, 1_000);

    await expect(reader.readExact(4, 1_000)).rejects.toThrow("a read is already in progress");

    stream.write(header(1));
    expect((await first).readUInt32LE(0)).toBe(1);
  });
});
