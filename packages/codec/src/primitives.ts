import { UnserializableValueError, ValueSizeError } from "./errors";
import type { Endian, IntegerValue, TextEncoding } from "./types";

export type FloatWidth = 2 | 4 | 8;

export function integerRange(byteLength: number, signed: boolean): { min: bigint; max: bigint } {
  const bits = BigInt(byteLength * 8);
  return signed
    ? { min: -(1n << (bits - 1n)), max: (1n << (bits - 1n)) - 1n }
    : { min: 0n, max: (1n << bits) - 1n };
}

export function toBigInt(value: IntegerValue): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isInteger(value)) {
    throw new UnserializableValueError(`Expected an integer, got ${value}`, { value });
  }
  return BigInt(value);
}

export function encodeInteger(value: IntegerValue, byteLength: number, signed: boolean, endian: Endian): Uint8Array {
  const big = toBigInt(value);
  const { min, max } = integerRange(byteLength, signed);
  if (big < min || big > max) {
    throw new ValueSizeError(
      `${big} does not fit in ${byteLength} byte(s) as ${signed ? "a signed" : "an unsigned"} integer`,
      { value: big, byteLength },
    );
  }
  let bits = big < 0n ? (1n << BigInt(byteLength * 8)) + big : big;
  const out = new Uint8Array(byteLength);
  for (let i = 0; i < byteLength; i++) {
    const index = endian === "little" ? i : byteLength - 1 - i;
    out[index] = Number(bits & 0xffn);
    bits >>= 8n;
  }
  return out;
}

export function decodeInteger(bytes: Uint8Array, signed: boolean, endian: Endian): bigint {
  let value = 0n;
  for (let i = 0; i < bytes.length; i++) {
    const byte = endian === "little" ? bytes[bytes.length - 1 - i] : bytes[i];
    value = (value << 8n) | BigInt(byte);
  }
  if (signed && bytes.length > 0) {
    const bits = BigInt(bytes.length * 8);
    if (value >= 1n << (bits - 1n)) {
      value -= 1n << bits;
    }
  }
  return value;
}

export function encodeFloat(value: number, width: FloatWidth, endian: Endian): Uint8Array {
  const out = new Uint8Array(width);
  const view = new DataView(out.buffer);
  const littleEndian = endian === "little";
  switch (width) {
    case 2:
      view.setUint16(0, floatToHalf(value), littleEndian);
      break;
    case 4:
      view.setFloat32(0, value, littleEndian);
      break;
    case 8:
      view.setFloat64(0, value, littleEndian);
      break;
    default:
      width satisfies never;
  }
  return out;
}

export function decodeFloat(bytes: Uint8Array, endian: Endian): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const littleEndian = endian === "little";
  switch (bytes.length) {
    case 2:
      return halfToFloat(view.getUint16(0, littleEndian));
    case 4:
      return view.getFloat32(0, littleEndian);
    case 8:
      return view.getFloat64(0, littleEndian);
    default:
      throw new RangeError(`Unsupported float width ${bytes.length}`);
  }
}

const float32Scratch = new Float32Array(1);
const uint32Scratch = new Uint32Array(float32Scratch.buffer);

/** IEEE 754 binary16 bits for `value`, rounding to nearest. */
export function floatToHalf(value: number): number {
  float32Scratch[0] = value;
  const bits = uint32Scratch[0];
  const sign = (bits >>> 16) & 0x8000;
  const exponent = (bits >>> 23) & 0xff;
  let mantissa = bits & 0x7fffff;

  if (exponent === 0xff) {
    return sign | 0x7c00 | (mantissa !== 0 ? 0x200 : 0);
  }
  const halfExponent = exponent - 127 + 15;
  if (halfExponent <= 0) {
    if (halfExponent < -10) return sign;
    mantissa |= 0x800000;
    const shift = 14 - halfExponent;
    let half = mantissa >> shift;
    if ((mantissa >> (shift - 1)) & 1) half += 1;
    return sign | half;
  }
  let half = sign | (halfExponent << 10) | (mantissa >> 13);
  if (mantissa & 0x1000) half += 1;
  if (halfExponent >= 0x1f || (half & 0x7c00) === 0x7c00) {
    throw new ValueSizeError(`${value} is out of range for a 16-bit float`, { value });
  }
  return half;
}

export function halfToFloat(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const mantissa = bits & 0x3ff;
  if (exponent === 0) return sign * mantissa * 2 ** -24;
  if (exponent === 0x1f) return mantissa !== 0 ? Number.NaN : sign * Number.POSITIVE_INFINITY;
  return sign * (1 + mantissa / 1024) * 2 ** (exponent - 15);
}

export function encodeText(value: string, encoding: TextEncoding): Uint8Array {
  if (encoding === "latin1" || encoding === "ascii") {
    for (let i = 0; i < value.length; i++) {
      const code = value.charCodeAt(i);
      if (code > (encoding === "ascii" ? 0x7f : 0xff)) {
        throw new UnserializableValueError(`Character ${JSON.stringify(value[i])} cannot be encoded as ${encoding}`, {
          value,
        });
      }
    }
  }
  return new Uint8Array(Buffer.from(value, encoding));
}

export function decodeText(bytes: Uint8Array, encoding: TextEncoding): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(encoding);
}

export function codeUnitWidth(encoding: TextEncoding): number {
  return encoding === "utf16le" ? 2 : 1;
}
