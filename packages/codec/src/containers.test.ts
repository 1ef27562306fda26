import { bytesToHex, hexToBytes } from "@bytecraft/helpers";
import { describe, expect, it } from "vitest";
import { defineRecord } from "./builder";
import { decodeField, encodeField, getFinalElementCount } from "./codec";
import { ArraySizeError, DeserializationError, UnserializableValueError } from "./errors";
import { f, untilEndOfInput, untilSentinel } from "./fields";
import { RecordInstance } from "./record";

const hex = (value: Uint8Array) => bytesToHex(value);

describe("arrays", () => {
  it("requires exactly the declared number of elements", () => {
    const field = f.array(f.uint8(), { count: 3 });
    expect(hex(encodeField(field, [1, 2, 3]))).toBe("010203");
    expect(decodeField(field, hexToBytes("010203"))).toEqual([1, 2, 3]);
    expect(() => encodeField(field, [1, 2])).toThrow(ArraySizeError);
    expect(() => encodeField(field, [1, 2, 3, 4])).toThrow(ArraySizeError);
    expect(getFinalElementCount(field, [7, 8, 9])).toBe(3);
  });

  it("rejects values that are not lists", () => {
    expect(() => encodeField(f.array(f.uint8(), { count: 1 }), 1)).toThrow(UnserializableValueError);
  });

  it("stops at a sentinel element and drops it", () => {
    const field = f.array(f.stringZ(), { haltCheck: untilSentinel((element) => element === "") });
    expect(decodeField(field, hexToBytes("6162630000"))).toEqual(["abc"]);
    expect(hex(encodeField(field, ["abc"]))).toBe("61626300");
    expect(hex(encodeField(field, ["abc", ""]))).toBe("6162630000");
  });

  it("reads until the input is exhausted", () => {
    const field = f.array(f.uint16(), { haltCheck: untilEndOfInput });
    expect(decodeField(field, hexToBytes("01000200"))).toEqual([1, 2]);
    expect(decodeField(field, new Uint8Array())).toEqual([]);
  });

  it("checks the halting predicate before the first element", () => {
    const seen: number[] = [];
    const field = f.array(f.uint8(), {
      haltCheck: (_array, _source, elements) => {
        seen.push(elements.length);
        return elements.length === 2;
      },
    });
    expect(decodeField(field, hexToBytes("0909"))).toEqual([9, 9]);
    expect(seen).toEqual([0, 1, 2]);
  });
});

describe("unions", () => {
  it("picks the choice whose value shape matches when dumping", () => {
    const field = f.union([f.uint8(), f.stringZ()]);
    expect(hex(encodeField(field, 7))).toBe("07");
    expect(hex(encodeField(field, "a"))).toBe("6100");
    expect(() => encodeField(field, new Uint8Array())).toThrow(UnserializableValueError);
  });

  it("takes the first choice that decodes when loading", () => {
    const field = f.union([f.uint8({ const: 1 }), f.stringZ()]);
    expect(decodeField(field, hexToBytes("01"))).toBe(1);
    expect(decodeField(field, hexToBytes("6100"))).toBe("a");
  });

  it("fails when no choice decodes", () => {
    const field = f.union([f.uint8({ const: 1 }), f.string({ size: 2, const: "zz" })]);
    expect(() => decodeField(field, hexToBytes("6162"))).toThrow("No union choice of 'union' matched the input");
    expect(() => decodeField(field, hexToBytes("6162"))).toThrow(DeserializationError);
  });

  it("follows deciders", () => {
    const small = f.uint8();
    const large = f.uint16();
    const field = f.union([small, large], {
      loadDecider: (source, choices) => (source.peek(1)[0] === 0xff ? choices[1] : choices[0]),
      dumpDecider: (value, choices) => (typeof value === "number" && value > 0xff ? choices[1] : choices[0]),
    });
    expect(hex(encodeField(field, 5))).toBe("05");
    expect(hex(encodeField(field, 0x1234))).toBe("3412");
    expect(decodeField(field, hexToBytes("05"))).toBe(5);
    expect(decodeField(field, hexToBytes("ff01"))).toBe(0x01ff);
  });
});

describe("nested records", () => {
  const Inner = defineRecord("Inner", { a: f.uint8(), b: f.uint8() });

  it("encodes plain objects and record instances alike", () => {
    const field = f.nested(Inner);
    expect(hex(encodeField(field, { a: 1, b: 2 }))).toBe("0102");
    expect(hex(encodeField(field, Inner.create({ a: 3, b: 4 })))).toBe("0304");
  });

  it("decodes to a record instance", () => {
    const decoded = decodeField(f.nested(Inner), hexToBytes("0102"));
    expect(decoded).toBeInstanceOf(RecordInstance);
    if (decoded instanceof RecordInstance) {
      expect(decoded.toDict()).toEqual({ a: 1, b: 2 });
    }
  });

  it("rejects records of another schema", () => {
    const Other = defineRecord("Other", { a: f.uint8(), b: f.uint8() });
    expect(() => encodeField(f.nested(Inner), Other.create({ a: 1, b: 2 }))).toThrow(
      "Expected a 'Inner' record, got a 'Other' record",
    );
  });

  it("can be a union choice", () => {
    const field = f.union([Inner, f.stringZ()]);
    expect(hex(encodeField(field, { a: 9, b: 8 }))).toBe("0908");
  });
});

describe("tagged union round trips", () => {
  const Pair = defineRecord("Pair", { a: f.uint8(), b: f.uint8() });
  const Message = defineRecord("Message", {
    kind: f.uint8(),
    body: f.union([f.uint16(), f.stringZ(), f.bytes({ size: 2 }), Pair], {
      loadDecider: (_source, choices, _context, loaded) => choices[Number(loaded.kind)],
    }),
  });

  const variants: { kind: number; body: unknown; encoded: string; loaded: unknown }[] = [
    { kind: 0, body: 0x1234, encoded: "003412", loaded: 0x1234 },
    { kind: 1, body: "hi", encoded: "01686900", loaded: "hi" },
    { kind: 2, body: hexToBytes("beef"), encoded: "02beef", loaded: hexToBytes("beef") },
    { kind: 3, body: { a: 1, b: 2 }, encoded: "030102", loaded: { a: 1, b: 2 } },
  ];

  for (const { kind, body, encoded, loaded } of variants) {
    it(`dumps and reloads variant ${kind}`, () => {
      const bytes = Message.create({ kind, body }).toBytes();
      expect(hex(bytes)).toBe(encoded);
      expect(Message.fromBytes(bytes).toDict()).toEqual({ kind, body: loaded });
    });
  }
});
