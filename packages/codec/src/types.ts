export type Endian = "little" | "big";

export type TextEncoding = "utf8" | "utf16le" | "latin1" | "ascii";

export type IntegerValue = number | bigint;

/** Resolved sibling values of the record being processed, keyed by field name. */
export type FieldValues = Readonly<Record<string, unknown>>;

export interface CodecLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Anything bytes can be pulled from. `read` returns fewer bytes than asked
 * only at end of input. `tell`/`seek` are optional; operations that must
 * restore a position require them.
 */
export interface ByteSource {
  read(size: number): Uint8Array;
  tell?(): number;
  seek?(position: number): void;
}

export interface ByteSink {
  write(bytes: Uint8Array): number;
}

/** Source handed to halting predicates and load deciders. Peeking never consumes. */
export interface PeekableSource extends ByteSource {
  readonly position: number;
  peek(size: number): Uint8Array;
}

export interface DumpOptions {
  /** Opaque value passed through to every callback of one operation. */
  context?: unknown;
  logger?: CodecLogger;
}

export interface LoadOptions extends DumpOptions {
  /** Fail with ExtraneousDataError when bytes remain after the record. */
  exact?: boolean;
  /** Decode limit for varint fields that set no `maxBytes` of their own. */
  maxVarintBytes?: number;
}

export interface PartialOptions {
  lastField?: string;
  count?: number;
}

export type PartialLoadOptions = LoadOptions & PartialOptions;

export type PartialDumpOptions = DumpOptions & PartialOptions;
