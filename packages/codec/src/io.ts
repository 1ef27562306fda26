import { concatBytes } from "@bytecraft/helpers";
import { UnexpectedEOFError } from "./errors";
import type { ByteSink, ByteSource, CodecLogger, PeekableSource } from "./types";

export class MemorySource implements ByteSource {
  private offset = 0;

  constructor(private readonly data: Uint8Array) {}

  read(size: number): Uint8Array {
    const end = Math.min(this.offset + Math.max(size, 0), this.data.length);
    const chunk = this.data.slice(this.offset, end);
    this.offset = end;
    return chunk;
  }

  tell(): number {
    return this.offset;
  }

  seek(position: number): void {
    if (position < 0 || position > this.data.length) {
      throw new RangeError(`Seek position ${position} outside 0..${this.data.length}`);
    }
    this.offset = position;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }
}

export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private total = 0;

  write(bytes: Uint8Array): number {
    this.chunks.push(bytes.slice());
    this.total += bytes.length;
    return bytes.length;
  }

  get length(): number {
    return this.total;
  }

  getBytes(): Uint8Array {
    return concatBytes(this.chunks);
  }
}

export interface Checkpoint {
  readonly position: number;
  readonly historyLength: number;
}

/**
 * Wraps a caller's source with a pushback buffer so fields can peek ahead and
 * unions can rewind without requiring a seekable source.
 */
export class SourceCursor implements PeekableSource {
  private pending: Uint8Array = new Uint8Array();
  private history: Uint8Array[] = [];
  private depth = 0;
  private offset = 0;

  constructor(private readonly source: ByteSource) {}

  static from(input: ByteSource | Uint8Array): SourceCursor {
    if (input instanceof SourceCursor) return input;
    return new SourceCursor(input instanceof Uint8Array ? new MemorySource(input) : input);
  }

  get position(): number {
    return this.offset;
  }

  read(size: number): Uint8Array {
    if (size <= 0) return new Uint8Array();
    let chunk: Uint8Array;
    if (this.pending.length >= size) {
      chunk = this.pending.slice(0, size);
      this.pending = this.pending.slice(size);
    } else {
      const head = this.pending;
      this.pending = new Uint8Array();
      chunk = head.length > 0 ? concatBytes([head, this.source.read(size - head.length)]) : this.source.read(size);
    }
    this.offset += chunk.length;
    if (this.depth > 0 && chunk.length > 0) {
      this.history.push(chunk);
    }
    return chunk;
  }

  readExact(size: number, field?: string): Uint8Array {
    const offset = this.offset;
    const chunk = this.read(size);
    if (chunk.length < size) {
      throw new UnexpectedEOFError(`Expected ${size} byte(s) at offset ${offset}, got ${chunk.length}`, {
        field,
        size,
        offset,
      });
    }
    return chunk;
  }

  peek(size: number): Uint8Array {
    const chunk = this.read(size);
    this.unread(chunk);
    return chunk;
  }

  atEnd(): boolean {
    return this.peek(1).length === 0;
  }

  tell(): number {
    return this.offset;
  }

  /** Pushes consumed bytes back in front of the stream. */
  unread(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    this.pending = this.pending.length > 0 ? concatBytes([bytes, this.pending]) : bytes.slice();
    this.offset -= bytes.length;
    if (this.depth > 0) {
      this.dropHistory(bytes.length);
    }
  }

  checkpoint(): Checkpoint {
    this.depth += 1;
    return { position: this.offset, historyLength: this.history.length };
  }

  restore(checkpoint: Checkpoint): void {
    const consumed = this.history.splice(checkpoint.historyLength);
    this.depth -= 1;
    const bytes = concatBytes(consumed);
    this.pending = this.pending.length > 0 ? concatBytes([bytes, this.pending]) : bytes;
    this.offset -= bytes.length;
    if (this.depth === 0) this.history = [];
  }

  release(_checkpoint: Checkpoint): void {
    this.depth -= 1;
    if (this.depth === 0) this.history = [];
  }

  /**
   * Returns peeked-but-unconsumed bytes to the underlying source. Sources
   * without seek keep them consumed.
   */
  settle(logger: CodecLogger): void {
    if (this.pending.length === 0) return;
    const { tell, seek } = this.source;
    if (tell && seek) {
      seek.call(this.source, tell.call(this.source) - this.pending.length);
      this.pending = new Uint8Array();
      return;
    }
    logger.warn("Source is not seekable; peeked bytes stay consumed", { bytes: this.pending.length });
  }

  private dropHistory(size: number): void {
    let remaining = size;
    while (remaining > 0 && this.history.length > 0) {
      const last = this.history[this.history.length - 1];
      if (last.length <= remaining) {
        this.history.pop();
        remaining -= last.length;
      } else {
        this.history[this.history.length - 1] = last.slice(0, last.length - remaining);
        remaining = 0;
      }
    }
  }
}
