import { describe, expect, it } from "vitest";
import {
  ArraySizeError,
  CodecError,
  ConfigurationError,
  DocumentParseError,
  ImmutableFieldError,
  IllegalOperationError,
  SerializationError,
  UnexpectedEOFError,
  DeserializationError,
  UnserializableValueError,
  ValueSizeError,
} from "./errors";
import { DEFAULT, isDefault, isNotPresent, isSentinel, isUndefined, NOT_PRESENT, Sentinel, UNDEFINED } from "./sentinels";

describe("error hierarchy", () => {
  it("groups errors by family and code", () => {
    const error = new ValueSizeError("too big");
    expect(error).toBeInstanceOf(UnserializableValueError);
    expect(error).toBeInstanceOf(SerializationError);
    expect(error).toBeInstanceOf(CodecError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("SERIALIZATION_ERROR");
    expect(error.name).toBe("ValueSizeError");
    expect(new ArraySizeError("x")).toBeInstanceOf(UnserializableValueError);
    expect(new UnexpectedEOFError("x")).toBeInstanceOf(DeserializationError);
    expect(new DocumentParseError("x").code).toBe("CONFIGURATION_ERROR");
    expect(new ImmutableFieldError("x")).toBeInstanceOf(IllegalOperationError);
  });

  it("exposes location details", () => {
    const error = new ConfigurationError("bad", { field: "length", record: "Packet" });
    expect(error.field).toBe("length");
    expect(error.record).toBe("Packet");
    expect(new ConfigurationError("bad").field).toBeUndefined();
  });

  it("only fills in locations that are still unknown", () => {
    const error = new UnexpectedEOFError("short", { field: "payload[2]" });
    error.locate({ field: "payload", record: "Packet", offset: 4 });
    expect(error.details).toEqual({ field: "payload[2]", record: "Packet", offset: 4 });
  });
});

describe("sentinels", () => {
  it("are distinct singletons", () => {
    expect(UNDEFINED).toBe(Sentinel.UNDEFINED);
    expect(UNDEFINED).not.toBe(NOT_PRESENT);
    expect(String(UNDEFINED)).toBe("<undefined>");
    expect(String(NOT_PRESENT)).toBe("<not-present>");
    expect(DEFAULT.tag).toBe("default");
  });

  it("are recognised only by identity", () => {
    expect(isSentinel(DEFAULT)).toBe(true);
    expect(isSentinel({ tag: "default" })).toBe(false);
    expect(isUndefined(UNDEFINED)).toBe(true);
    expect(isUndefined(undefined)).toBe(false);
    expect(isNotPresent(NOT_PRESENT)).toBe(true);
    expect(isDefault(UNDEFINED)).toBe(false);
  });
});
