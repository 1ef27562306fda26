import { bytesToHex } from "@bytecraft/helpers";
import { describe, expect, it } from "vitest";
import { UnexpectedEOFError, UnserializableValueError, VarIntOverflowError } from "./errors";
import { MemorySource } from "./io";
import {
  decodeCompact,
  decodeLeb128,
  decodeUleb128,
  decodeVarInt,
  decodeVlq,
  encodeCompact,
  encodeLeb128,
  encodeUleb128,
  encodeVarInt,
  encodeVlq,
  isSignedScheme,
} from "./varint";

const bytes = (...values: number[]) => new Uint8Array(values);

describe("ULEB128", () => {
  it("encodes multi-byte values least significant group first", () => {
    expect(bytesToHex(encodeUleb128(300))).toBe("ac02");
    expect(bytesToHex(encodeUleb128(0))).toBe("00");
    expect(bytesToHex(encodeUleb128(127))).toBe("7f");
    expect(bytesToHex(encodeUleb128(128))).toBe("8001");
  });

  it("decodes and reports the bytes consumed", () => {
    expect(decodeUleb128(bytes(0xac, 0x02))).toEqual({ value: 300n, bytesRead: 2, complete: true });
  });

  it("rejects negative values", () => {
    expect(() => encodeUleb128(-1)).toThrow(UnserializableValueError);
  });

  it("reads no further than the terminating byte", () => {
    const source = new MemorySource(bytes(0xac, 0x02, 0x07));
    expect(decodeUleb128(source).value).toBe(300n);
    expect(source.tell()).toBe(2);
  });
});

describe("signed LEB128", () => {
  it("encodes negative and sign-bit values", () => {
    expect(bytesToHex(encodeLeb128(-1))).toBe("7f");
    expect(bytesToHex(encodeLeb128(-128))).toBe("807f");
    expect(bytesToHex(encodeLeb128(64))).toBe("c000");
    expect(bytesToHex(encodeLeb128(63))).toBe("3f");
  });

  it("sign-extends from the last group", () => {
    expect(decodeLeb128(bytes(0x7f)).value).toBe(-1n);
    expect(decodeLeb128(bytes(0x80, 0x7f)).value).toBe(-128n);
    expect(decodeLeb128(bytes(0xc0, 0x00)).value).toBe(64n);
  });

  it("covers the limits of 32 and 64 bit integers", () => {
    const limits: [bigint, string][] = [
      [2n ** 31n - 1n, "ffffffff07"],
      [-(2n ** 31n), "8080808078"],
      [2n ** 63n - 1n, "ffffffffffffffffff00"],
      [-(2n ** 63n), "8080808080808080807f"],
    ];
    for (const [value, encoded] of limits) {
      expect(bytesToHex(encodeLeb128(value))).toBe(encoded);
      expect(decodeLeb128(encodeLeb128(value))).toEqual({ value, bytesRead: encoded.length / 2, complete: true });
    }
  });
});

describe("VLQ", () => {
  it("encodes most significant group first", () => {
    expect(bytesToHex(encodeVlq(300))).toBe("822c");
    expect(bytesToHex(encodeVlq(128))).toBe("8100");
    expect(bytesToHex(encodeVlq(0))).toBe("00");
  });

  it("decodes big-endian groups", () => {
    expect(decodeVlq(bytes(0x82, 0x2c)).value).toBe(300n);
    expect(decodeVlq(bytes(0x81, 0x00)).value).toBe(128n);
  });

  it("rejects negative values", () => {
    expect(() => encodeVlq(-5)).toThrow(UnserializableValueError);
  });
});

describe("compact signed", () => {
  it("keeps the sign in the lead byte", () => {
    expect(bytesToHex(encodeCompact(1))).toBe("01");
    expect(bytesToHex(encodeCompact(-1))).toBe("41");
    expect(bytesToHex(encodeCompact(63))).toBe("3f");
    expect(bytesToHex(encodeCompact(64))).toBe("8040");
    expect(bytesToHex(encodeCompact(-64))).toBe("c040");
  });

  it("decodes magnitude and sign", () => {
    expect(decodeCompact(bytes(0x01)).value).toBe(1n);
    expect(decodeCompact(bytes(0x41)).value).toBe(-1n);
    expect(decodeCompact(bytes(0x80, 0x40)).value).toBe(64n);
    expect(decodeCompact(bytes(0xc0, 0x40)).value).toBe(-64n);
  });
});

describe("decodeVarInt limits", () => {
  it("fails once a value runs past maxBytes", () => {
    expect(() => decodeUleb128(bytes(0x80, 0x80, 0x01), { maxBytes: 2 })).toThrow(VarIntOverflowError);
    expect(decodeUleb128(bytes(0x80, 0x80, 0x01), { maxBytes: 3 }).value).toBe(16384n);
  });

  it("fails on input that ends inside a value", () => {
    expect(() => decodeUleb128(bytes(0x80))).toThrow(UnexpectedEOFError);
  });

  it("returns a partial value when short reads are allowed", () => {
    expect(decodeVarInt("uleb128", bytes(0x85), { allowShortRead: true })).toEqual({
      value: 5n,
      bytesRead: 1,
      complete: false,
    });
  });

  it("dispatches by scheme", () => {
    expect(bytesToHex(encodeVarInt("vlq", 300))).toBe("822c");
    expect(decodeVarInt("leb128", bytes(0x7f)).value).toBe(-1n);
    expect(isSignedScheme("compact")).toBe(true);
    expect(isSignedScheme("uleb128")).toBe(false);
  });
});

describe("varint round trips", () => {
  const samples: bigint[] = [
    0n, 1n, 63n, 64n, 127n, 128n, 255n, 300n, 8191n, 8192n, 16383n, 16384n,
    2n ** 32n - 1n, 2n ** 32n, 2n ** 53n, 2n ** 63n - 1n,
  ];
  const signed = samples.flatMap((value) => [value, -value - 1n]);

  for (const scheme of ["uleb128", "leb128", "vlq", "compact"] as const) {
    it(`decodes what ${scheme} encodes and reports its length`, () => {
      for (const value of isSignedScheme(scheme) ? signed : samples) {
        const encoded = encodeVarInt(scheme, value);
        // a trailing byte must not be consumed
        const input = new Uint8Array([...encoded, 0xaa]);
        expect(decodeVarInt(scheme, input)).toEqual({ value, bytesRead: encoded.length, complete: true });
      }
    });
  }
});
