import { describe, expect, it, vi } from "vitest";
import { UnexpectedEOFError } from "./errors";
import { MemorySink, MemorySource, SourceCursor } from "./io";
import { NOOP_LOGGER } from "./logger";
import type { ByteSource, CodecLogger } from "./types";

const bytes = (...values: number[]) => new Uint8Array(values);

function streamOf(data: Uint8Array): ByteSource {
  const inner = new MemorySource(data);
  return { read: (size) => inner.read(size) };
}

describe("MemorySource", () => {
  it("reads short at the end and seeks within bounds", () => {
    const source = new MemorySource(bytes(1, 2, 3));
    expect(Array.from(source.read(2))).toEqual([1, 2]);
    expect(Array.from(source.read(5))).toEqual([3]);
    expect(source.remaining).toBe(0);
    source.seek(1);
    expect(source.tell()).toBe(1);
    expect(() => source.seek(4)).toThrow(RangeError);
  });
});

describe("MemorySink", () => {
  it("keeps copies of what was written", () => {
    const sink = new MemorySink();
    const chunk = bytes(1, 2);
    expect(sink.write(chunk)).toBe(2);
    chunk[0] = 9;
    sink.write(bytes(3));
    expect(sink.length).toBe(3);
    expect(Array.from(sink.getBytes())).toEqual([1, 2, 3]);
  });
});

describe("SourceCursor", () => {
  it("peeks without consuming", () => {
    const cursor = SourceCursor.from(bytes(1, 2, 3));
    expect(Array.from(cursor.peek(2))).toEqual([1, 2]);
    expect(cursor.position).toBe(0);
    expect(Array.from(cursor.read(1))).toEqual([1]);
    expect(cursor.position).toBe(1);
    expect(cursor.atEnd()).toBe(false);
  });

  it("rewinds to a checkpoint", () => {
    const cursor = SourceCursor.from(bytes(1, 2, 3));
    cursor.read(1);
    const checkpoint = cursor.checkpoint();
    cursor.read(2);
    expect(cursor.atEnd()).toBe(true);
    cursor.restore(checkpoint);
    expect(cursor.position).toBe(1);
    expect(Array.from(cursor.read(2))).toEqual([2, 3]);
  });

  it("unwinds nested checkpoints in order", () => {
    const cursor = SourceCursor.from(streamOf(bytes(1, 2, 3)));
    const outer = cursor.checkpoint();
    cursor.read(1);
    const inner = cursor.checkpoint();
    cursor.read(1);
    cursor.restore(inner);
    expect(cursor.position).toBe(1);
    cursor.restore(outer);
    expect(cursor.position).toBe(0);
    expect(Array.from(cursor.read(3))).toEqual([1, 2, 3]);
  });

  it("keeps consumed bytes after a release", () => {
    const cursor = SourceCursor.from(bytes(1, 2, 3));
    const checkpoint = cursor.checkpoint();
    cursor.read(2);
    cursor.release(checkpoint);
    expect(cursor.position).toBe(2);
    expect(Array.from(cursor.read(1))).toEqual([3]);
  });

  it("reports where input ran out", () => {
    const cursor = SourceCursor.from(bytes(1, 2, 3));
    cursor.read(3);
    try {
      cursor.readExact(1, "tail");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnexpectedEOFError);
      if (error instanceof UnexpectedEOFError) {
        expect(error.details).toEqual({ field: "tail", size: 1, offset: 3 });
      }
    }
  });

  it("hands peeked bytes back to a seekable source", () => {
    const source = new MemorySource(bytes(1, 2, 3, 4));
    const cursor = new SourceCursor(source);
    cursor.read(1);
    cursor.peek(2);
    expect(source.tell()).toBe(3);
    cursor.settle(NOOP_LOGGER);
    expect(source.tell()).toBe(1);
  });

  it("warns when peeked bytes cannot be returned", () => {
    const logger: CodecLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cursor = new SourceCursor(streamOf(bytes(1, 2, 3)));
    cursor.peek(2);
    cursor.settle(logger);
    expect(logger.warn).toHaveBeenCalledWith("Source is not seekable; peeked bytes stay consumed", { bytes: 2 });
  });
});
