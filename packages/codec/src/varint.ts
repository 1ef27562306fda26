import { SourceCursor } from "./io";
import { UnexpectedEOFError, UnserializableValueError, VarIntOverflowError } from "./errors";
import type { ByteSource, IntegerValue } from "./types";

export type VarIntScheme = "uleb128" | "leb128" | "vlq" | "compact";

export const VARINT_SCHEMES: readonly VarIntScheme[] = ["uleb128", "leb128", "vlq", "compact"];

export interface VarIntDecodeOptions {
  /** Maximum number of bytes one value may occupy. */
  maxBytes?: number;
  /** Return the partial value instead of failing when input ends mid-value. */
  allowShortRead?: boolean;
}

export interface VarIntDecodeResult {
  value: bigint;
  bytesRead: number;
  /** False only for a short read accepted through `allowShortRead`. */
  complete: boolean;
}

export function isSignedScheme(scheme: VarIntScheme): boolean {
  return scheme === "leb128" || scheme === "compact";
}

export function encodeVarInt(scheme: VarIntScheme, value: IntegerValue): Uint8Array {
  const big = toInteger(value);
  switch (scheme) {
    case "uleb128":
      return encodeUleb128(big);
    case "leb128":
      return encodeLeb128(big);
    case "vlq":
      return encodeVlq(big);
    case "compact":
      return encodeCompact(big);
    default:
      scheme satisfies never;
      throw new UnserializableValueError(`Unknown varint scheme '${String(scheme)}'`);
  }
}

export function decodeVarInt(
  scheme: VarIntScheme,
  input: ByteSource | Uint8Array,
  options: VarIntDecodeOptions = {},
): VarIntDecodeResult {
  const groups = readGroups(SourceCursor.from(input), options);
  switch (scheme) {
    case "uleb128":
      return finish(groups, combineLittleEndian(groups.bytes));
    case "leb128": {
      let value = combineLittleEndian(groups.bytes);
      const last = groups.bytes[groups.bytes.length - 1];
      if (groups.complete && last !== undefined && (last & 0x40) !== 0) {
        value -= 1n << BigInt(7 * groups.bytes.length);
      }
      return finish(groups, value);
    }
    case "vlq":
      return finish(groups, combineBigEndian(groups.bytes, 0));
    case "compact": {
      const first = groups.bytes[0];
      if (first === undefined) return finish(groups, 0n);
      const magnitude = combineBigEndian(groups.bytes.slice(1), first & 0x3f);
      return finish(groups, (first & 0x40) !== 0 ? -magnitude : magnitude);
    }
    default:
      scheme satisfies never;
      throw new UnserializableValueError(`Unknown varint scheme '${String(scheme)}'`);
  }
}

export function encodeUleb128(value: IntegerValue): Uint8Array {
  let remaining = toInteger(value);
  if (remaining < 0n) {
    throw new UnserializableValueError(`ULEB128 cannot encode negative value ${remaining}`, { value: remaining });
  }
  const out: number[] = [];
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) byte |= 0x80;
    out.push(byte);
  } while (remaining !== 0n);
  return Uint8Array.from(out);
}

export function encodeLeb128(value: IntegerValue): Uint8Array {
  let remaining = toInteger(value);
  const out: number[] = [];
  for (;;) {
    const byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    const signBitSet = (byte & 0x40) !== 0;
    if ((remaining === 0n && !signBitSet) || (remaining === -1n && signBitSet)) {
      out.push(byte);
      return Uint8Array.from(out);
    }
    out.push(byte | 0x80);
  }
}

export function encodeVlq(value: IntegerValue): Uint8Array {
  let remaining = toInteger(value);
  if (remaining < 0n) {
    throw new UnserializableValueError(`VLQ cannot encode negative value ${remaining}`, { value: remaining });
  }
  const out: number[] = [Number(remaining & 0x7fn)];
  remaining >>= 7n;
  while (remaining > 0n) {
    out.unshift(Number(remaining & 0x7fn) | 0x80);
    remaining >>= 7n;
  }
  return Uint8Array.from(out);
}

/** Lead byte: continuation, sign flag, six payload bits. Later bytes carry seven. */
export function encodeCompact(value: IntegerValue): Uint8Array {
  const signed = toInteger(value);
  const sign = signed < 0n ? 0x40 : 0;
  let magnitude = signed < 0n ? -signed : signed;
  const tail: number[] = [];
  while (magnitude > 0x3fn) {
    tail.unshift(Number(magnitude & 0x7fn));
    magnitude >>= 7n;
  }
  const out = [sign | Number(magnitude), ...tail];
  for (let i = 0; i < out.length - 1; i++) {
    out[i] |= 0x80;
  }
  return Uint8Array.from(out);
}

export function decodeUleb128(input: ByteSource | Uint8Array, options?: VarIntDecodeOptions): VarIntDecodeResult {
  return decodeVarInt("uleb128", input, options);
}

export function decodeLeb128(input: ByteSource | Uint8Array, options?: VarIntDecodeOptions): VarIntDecodeResult {
  return decodeVarInt("leb128", input, options);
}

export function decodeVlq(input: ByteSource | Uint8Array, options?: VarIntDecodeOptions): VarIntDecodeResult {
  return decodeVarInt("vlq", input, options);
}

export function decodeCompact(input: ByteSource | Uint8Array, options?: VarIntDecodeOptions): VarIntDecodeResult {
  return decodeVarInt("compact", input, options);
}

interface ByteGroups {
  bytes: number[];
  complete: boolean;
}

function readGroups(cursor: SourceCursor, options: VarIntDecodeOptions): ByteGroups {
  const start = cursor.position;
  const bytes: number[] = [];
  for (;;) {
    if (options.maxBytes !== undefined && bytes.length >= options.maxBytes) {
      throw new VarIntOverflowError(`Varint exceeds ${options.maxBytes} byte(s)`, {
        offset: start,
        maxBytes: options.maxBytes,
      });
    }
    const chunk = cursor.read(1);
    const byte = chunk[0];
    if (byte === undefined) {
      if (options.allowShortRead) return { bytes, complete: false };
      throw new UnexpectedEOFError(`Input ended inside a varint after ${bytes.length} byte(s)`, {
        size: 1,
        offset: cursor.position,
      });
    }
    bytes.push(byte);
    if ((byte & 0x80) === 0) return { bytes, complete: true };
  }
}

function combineLittleEndian(bytes: readonly number[]): bigint {
  let value = 0n;
  bytes.forEach((byte, index) => {
    value |= BigInt(byte & 0x7f) << BigInt(7 * index);
  });
  return value;
}

function combineBigEndian(bytes: readonly number[], initial: number): bigint {
  let value = BigInt(initial);
  for (const byte of bytes) {
    value = (value << 7n) | BigInt(byte & 0x7f);
  }
  return value;
}

function finish(groups: ByteGroups, value: bigint): VarIntDecodeResult {
  return { value, bytesRead: groups.bytes.length, complete: groups.complete };
}

function toInteger(value: IntegerValue): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) {
    throw new UnserializableValueError(`Varint value must be an integer, got ${value}`, { value });
  }
  return BigInt(value);
}
