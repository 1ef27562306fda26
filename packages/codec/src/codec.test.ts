import { bytesToHex, hexToBytes } from "@bytecraft/helpers";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { decodeField, encodeField, fieldExpectedSize, readField, writeField } from "./codec";
import {
  ConfigurationError,
  ExtraneousDataError,
  UndefinedSizeError,
  UnexpectedEOFError,
  UnexpectedValueError,
  UnserializableValueError,
  ValidationError,
  ValueSizeError,
  VarIntOverflowError,
} from "./errors";
import { f } from "./fields";
import { MemorySink, MemorySource } from "./io";
import { zodValidator } from "./validation";
import { DEFAULT } from "./sentinels";

const hex = (value: Uint8Array) => bytesToHex(value);

describe("integer fields", () => {
  it("encodes and decodes a single byte", () => {
    expect(hex(encodeField(f.uint8(), 5))).toBe("05");
    expect(decodeField(f.uint8(), hexToBytes("05"))).toBe(5);
  });

  it("honours endianness and signedness", () => {
    expect(hex(encodeField(f.int16({ endian: "big" }), -2))).toBe("fffe");
    expect(decodeField(f.int16({ endian: "big" }), hexToBytes("fffe"))).toBe(-2);
    expect(hex(encodeField(f.uint24(), 0x010203))).toBe("030201");
  });

  it("decodes wide integers as bigint", () => {
    expect(decodeField(f.uint64(), hexToBytes("0100000000000000"))).toBe(1n);
    expect(decodeField(f.uint32(), hexToBytes("ffffffff"))).toBe(4294967295);
  });

  it("rejects trailing bytes unless told otherwise", () => {
    expect(() => decodeField(f.uint8(), hexToBytes("0506"))).toThrow(ExtraneousDataError);
    expect(decodeField(f.uint8(), hexToBytes("0506"), { exact: false })).toBe(5);
  });

  it("checks constants on load", () => {
    expect(() => decodeField(f.uint8({ const: 1 }), hexToBytes("02"))).toThrow(UnexpectedValueError);
    expect(decodeField(f.uint8({ const: 1 }), hexToBytes("01"))).toBe(1);
  });

  it("substitutes the default for DEFAULT", () => {
    expect(hex(encodeField(f.uint16({ default: 7 }), DEFAULT))).toBe("0700");
    expect(hex(encodeField(f.uint8({ factory: () => 9 }), DEFAULT))).toBe("09");
  });

  it("fails on input that ends early", () => {
    expect(() => decodeField(f.uint32(), hexToBytes("0102"))).toThrow(UnexpectedEOFError);
  });
});

describe("null representations", () => {
  it("maps a byte pattern to null", () => {
    const field = f.uint16({ nullValue: hexToBytes("ffff") });
    expect(decodeField(field, hexToBytes("ffff"))).toBeNull();
    expect(decodeField(field, hexToBytes("0100"))).toBe(1);
    expect(hex(encodeField(field, null))).toBe("ffff");
  });

  it("maps a logical value to null", () => {
    const field = f.uint8({ nullValue: 0 });
    expect(decodeField(field, hexToBytes("00"))).toBeNull();
    expect(hex(encodeField(field, null))).toBe("00");
  });

  it("uses zero bytes of the field's size for DEFAULT", () => {
    const field = f.bytes({ size: 2, nullValue: DEFAULT });
    expect(decodeField(field, hexToBytes("0000"))).toBeNull();
    expect(hex(encodeField(field, null))).toBe("0000");
  });

  it("refuses null for fields without a representation", () => {
    expect(() => encodeField(f.uint8(), null)).toThrow(UnserializableValueError);
  });
});

describe("text fields", () => {
  it("pads fixed-size strings and strips the padding on load", () => {
    const field = f.string({ size: 4, padByte: 0x20 });
    expect(hex(encodeField(field, "ab"))).toBe("61622020");
    expect(decodeField(field, hexToBytes("61622020"))).toBe("ab");
  });

  it("rejects strings that do not fit", () => {
    expect(() => encodeField(f.string({ size: 2 }), "abc")).toThrow(ValueSizeError);
    expect(() => encodeField(f.string({ size: 2 }), "a")).toThrow(ValueSizeError);
  });

  it("reads null-terminated strings", () => {
    expect(hex(encodeField(f.stringZ(), "hi"))).toBe("686900");
    expect(decodeField(f.stringZ(), hexToBytes("686900"))).toBe("hi");
    expect(() => decodeField(f.stringZ(), hexToBytes("68"))).toThrow(UnexpectedEOFError);
  });

  it("terminates wide encodings with a full code unit", () => {
    const field = f.stringZ({ encoding: "utf16le" });
    expect(hex(encodeField(field, "A"))).toBe("41000000");
    expect(decodeField(field, hexToBytes("41000000"))).toBe("A");
  });

  it("refuses embedded terminators", () => {
    expect(() => encodeField(f.stringZ(), "a\0b")).toThrow(UnserializableValueError);
  });
});

describe("other scalar fields", () => {
  it("encodes timestamps at the declared resolution", () => {
    expect(hex(encodeField(f.timestamp32(), new Date(1_000_000)))).toBe("e8030000");
    expect(decodeField(f.timestamp32(), hexToBytes("e8030000"))).toEqual(new Date(1_000_000));
    expect(hex(encodeField(f.timestamp64({ resolution: "ms" }), new Date(1234)))).toBe("d204000000000000");
  });

  it("rounds instants before the epoch down to the earlier tick", () => {
    expect(hex(encodeField(f.timestamp32(), new Date(-1500)))).toBe("feffffff");
    expect(decodeField(f.timestamp32(), hexToBytes("feffffff"))).toEqual(new Date(-2000));
    expect(decodeField(f.timestamp64({ resolution: "us" }), hexToBytes("ffffffffffffffff"))).toEqual(new Date(-1));
  });

  it("encodes varints and enforces byte limits", () => {
    expect(hex(encodeField(f.uleb128(), 300))).toBe("ac02");
    expect(decodeField(f.uleb128(), hexToBytes("ac02"))).toBe(300);
    expect(() => encodeField(f.uleb128({ maxBytes: 1 }), 300)).toThrow(ValueSizeError);
    expect(() => decodeField(f.uleb128(), hexToBytes("808001"), { maxVarintBytes: 2 })).toThrow(VarIntOverflowError);
  });

  it("encodes half-precision floats", () => {
    expect(hex(encodeField(f.float16(), 1))).toBe("003c");
    expect(decodeField(f.float32({ endian: "big" }), hexToBytes("3fc00000"))).toBe(1.5);
  });

  it("sizes variable fields from sibling values", () => {
    const field = f.bytes({ size: "n" });
    expect(hex(encodeField(field, hexToBytes("0102"), { values: { n: 2 } }))).toBe("0102");
    expect(() => encodeField(field, hexToBytes("0102"), { values: { n: 3 } })).toThrow(ValueSizeError);
    expect(() => encodeField(field, hexToBytes("0102"))).toThrow(UndefinedSizeError);
  });
});

describe("field sizes", () => {
  it("uses declared sizes, then the value or default", () => {
    expect(fieldExpectedSize(f.uint32())).toBe(4);
    expect(fieldExpectedSize(f.bytes({ size: "n" }), { n: 5 })).toBe(5);
    expect(fieldExpectedSize(f.stringZ({ default: "ab" }))).toBe(3);
    expect(() => fieldExpectedSize(f.stringZ())).toThrow(UndefinedSizeError);
  });
});

describe("field validators", () => {
  it("rejects values a validator returns false for", () => {
    const field = f.uint8({ validate: (value) => value !== 3 });
    expect(() => encodeField(field, 3)).toThrow("Validation failed for field 'integer'");
    expect(hex(encodeField(field, 4))).toBe("04");
  });

  it("runs zod schemas on decoded values", () => {
    const field = f.uint8({ validate: zodValidator(z.number().max(10)) });
    expect(() => decodeField(field, hexToBytes("0b"))).toThrow(ValidationError);
    expect(decodeField(field, hexToBytes("0a"))).toBe(10);
  });
});

describe("streams", () => {
  it("reads one field and leaves the rest of the source", () => {
    const source = new MemorySource(hexToBytes("0102ff"));
    expect(readField(f.uint16(), source)).toBe(0x0201);
    expect(source.tell()).toBe(2);
  });

  it("writes to a sink", () => {
    const sink = new MemorySink();
    expect(writeField(f.uint16({ endian: "big" }), 0x0102, sink)).toBe(2);
    expect(hex(sink.getBytes())).toBe("0102");
  });
});

describe("field factories", () => {
  it("reject contradictory options", () => {
    expect(() => f.uint8({ default: 1, factory: () => 2 })).toThrow(ConfigurationError);
    expect(() => f.string({ padByte: 256 })).toThrow(ConfigurationError);
    expect(() => f.bytes({ size: -1 })).toThrow(ConfigurationError);
    expect(() => f.integer(0)).toThrow(ConfigurationError);
    expect(() => f.union([])).toThrow(ConfigurationError);
    expect(() => f.union([f.uint8(), f.float32()])).toThrow(ConfigurationError);
    expect(() => f.array(f.uint8(), { count: -1 })).toThrow(ConfigurationError);
  });
});
