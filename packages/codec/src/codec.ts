import { bytesEqual, concatBytes } from "@bytecraft/helpers";
import {
  ArraySizeError,
  CodecError,
  ConfigurationError,
  DeserializationError,
  ExtraneousDataError,
  FieldReferenceError,
  MissingRequiredValueError,
  UndefinedSizeError,
  UnexpectedValueError,
  UnserializableValueError,
  ValidationError,
  ValueSizeError,
  VarIntOverflowError,
} from "./errors";
import { evaluateExpression, isExpression, type FieldScope } from "./expression";
import type { ArrayField, CountPolicy, Field, SizePolicy, TimestampField, TimestampResolution, UnionChoice, UnionField } from "./fields";
import { valueShape } from "./fields";
import { SourceCursor } from "./io";
import { createState, resolveOptions, type CodecState } from "./options";
import {
  codeUnitWidth,
  decodeFloat,
  decodeInteger,
  decodeText,
  encodeFloat,
  encodeInteger,
  encodeText,
  toBigInt,
} from "./primitives";
import { isDefault, isSentinel, NOT_PRESENT } from "./sentinels";
import type { ByteSink, ByteSource, DumpOptions, FieldValues, LoadOptions } from "./types";
import { runFieldValidators } from "./validation";
import { describeValue, isIntegerValue, valuesEqual } from "./values";
import { decodeVarInt, encodeVarInt } from "./varint";

const TICKS_PER_SECOND: Record<TimestampResolution, bigint> = {
  s: 1n,
  ms: 1_000n,
  us: 1_000_000n,
  ns: 1_000_000_000n,
};

/** Rounds toward negative infinity. */
function floorDiv(value: bigint, divisor: bigint): bigint {
  const quotient = value / divisor;
  return value % divisor < 0n ? quotient - 1n : quotient;
}

// ---------------------------------------------------------------------------
// Standalone field operations

export function readField(field: Field, source: ByteSource | Uint8Array, options?: LoadOptions): unknown {
  const resolved = resolveOptions(options, "readField");
  const cursor = SourceCursor.from(source);
  const state = createState(resolved);
  const label = field.name || field.kind;
  const value = readValue(field, cursor, state, label);
  validateValue(field, value, state, label);
  cursor.settle(resolved.logger);
  return value;
}

export function decodeField(field: Field, data: Uint8Array, options?: LoadOptions): unknown {
  const resolved = resolveOptions(options, "decodeField");
  const cursor = SourceCursor.from(data);
  const state = createState(resolved);
  const label = field.name || field.kind;
  const value = readValue(field, cursor, state, label);
  validateValue(field, value, state, label);
  if ((resolved.exact ?? true) && !cursor.atEnd()) {
    throw new ExtraneousDataError(`Found extra bytes after '${label}' at offset ${cursor.position}`, {
      field: label,
      offset: cursor.position,
    });
  }
  return value;
}

export function encodeField(field: Field, value: unknown, options?: DumpOptions & { values?: FieldValues }): Uint8Array {
  const { values, ...rest } = options ?? {};
  const resolved = resolveOptions(rest, "encodeField");
  const state = createState(resolved, { values: values ?? {} });
  const label = field.name || field.kind;
  const resolvedValue = isDefault(value) ? defaultValueOf(field, label) : value;
  validateValue(field, resolvedValue, state, label);
  return encodeValue(field, resolvedValue, state, label);
}

export function writeField(
  field: Field,
  value: unknown,
  sink: ByteSink,
  options?: DumpOptions & { values?: FieldValues },
): number {
  return sink.write(encodeField(field, value, options));
}

/** Size of `field` given already-resolved sibling values. */
export function fieldExpectedSize(field: Field, values: FieldValues = {}, options?: DumpOptions): number {
  const state = createState(resolveOptions(options, "fieldExpectedSize"), { values });
  return expectedSize(field, state, field.name || field.kind);
}

export function getFinalElementCount(field: ArrayField, value: unknown): number {
  if (!Array.isArray(value)) {
    throw new UnserializableValueError(`Array field '${field.name}' expects a list, got ${describeValue(value)}`, {
      field: field.name,
    });
  }
  if (typeof field.count === "number" && value.length !== field.count) {
    throw new ArraySizeError(`Array field '${field.name}' needs exactly ${field.count} element(s), got ${value.length}`, {
      field: field.name,
      expected: field.count,
      actual: value.length,
    });
  }
  return value.length;
}

// ---------------------------------------------------------------------------
// Load

export function readValue(field: Field, cursor: SourceCursor, state: CodecState, path: string): unknown {
  if (field.present !== undefined && !isPresent(field, state, path)) {
    return field.notPresentValue !== undefined ? field.notPresentValue : NOT_PRESENT;
  }
  const offset = cursor.position;
  try {
    const nullPattern = loadNullPattern(field, state, path);
    if (nullPattern) {
      const peeked = cursor.peek(nullPattern.length);
      if (bytesEqual(peeked, nullPattern)) {
        cursor.read(nullPattern.length);
        return null;
      }
    }
    const value = decodeKind(field, cursor, state, path);
    if (hasLogicalNull(field) && valuesEqual(value, field.nullValue)) {
      return null;
    }
    if (field.const !== undefined && !valuesEqual(value, field.const)) {
      throw new UnexpectedValueError(`Field '${path}' expected a constant value, read ${describeValue(value)} instead`, {
        field: path,
        offset,
        expected: field.const,
        actual: value,
      });
    }
    return value;
  } catch (error) {
    if (error instanceof CodecError) error.locate({ field: path, offset });
    throw error;
  }
}

export function isPresent(field: Field, state: CodecState, path: string): boolean {
  const { present } = field;
  if (present === undefined) return true;
  if (isExpression(present)) {
    return evaluateExpression(present, state.scope, `presence of ${path}`) !== 0n;
  }
  return present(state.scope.values, state.context);
}

function decodeKind(field: Field, cursor: SourceCursor, state: CodecState, path: string): unknown {
  switch (field.kind) {
    case "integer": {
      const value = decodeInteger(cursor.readExact(field.byteLength, path), field.signed, field.endian);
      return field.bigint ? value : toSafeNumber(value, path);
    }
    case "varint": {
      const { value } = decodeVarInt(field.scheme, cursor, { maxBytes: field.maxBytes ?? state.maxVarintBytes });
      if (field.bigint) return value;
      if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new VarIntOverflowError(`Varint '${path}' exceeds the safe integer range; declare it with bigint: true`, {
          field: path,
        });
      }
      return Number(value);
    }
    case "float":
      return decodeFloat(cursor.readExact(field.byteLength, path), field.endian);
    case "timestamp":
      return decodeTimestamp(field, cursor.readExact(field.byteLength, path));
    case "bytes":
      return cursor.readExact(loadSize(field, state, path), path);
    case "string": {
      let raw = cursor.readExact(loadSize(field, state, path), path);
      if (field.padByte !== undefined) {
        let end = raw.length;
        while (end > 0 && raw[end - 1] === field.padByte) end -= 1;
        raw = raw.subarray(0, end);
      }
      return decodeText(raw, field.encoding);
    }
    case "stringz": {
      const unit = codeUnitWidth(field.encoding);
      const collected: Uint8Array[] = [];
      for (;;) {
        const chunk = cursor.readExact(unit, path);
        if (chunk.every((byte) => byte === 0)) break;
        collected.push(chunk);
      }
      return decodeText(concatBytes(collected), field.encoding);
    }
    case "array":
      return decodeArray(field, cursor, state, path);
    case "union":
      return decodeUnion(field, cursor, state, path);
    case "nested":
      return field.schema.readNested(cursor, state);
    default:
      field satisfies never;
      throw new ConfigurationError(`Unsupported field kind encountered while reading ${path}`);
  }
}

function decodeArray(field: ArrayField, cursor: SourceCursor, state: CodecState, path: string): unknown[] {
  const elements: unknown[] = [];
  const readElement = () => {
    const elementPath = `${path}[${elements.length}]`;
    const value = readValue(field.element, cursor, state, elementPath);
    validateValue(field.element, value, state, elementPath);
    elements.push(value);
  };
  const { haltCheck } = field;
  if (haltCheck) {
    while (!haltCheck(field, cursor, elements, state.context, state.scope.values)) {
      readElement();
    }
    return elements;
  }
  const count = resolveCount(field, state, path);
  while (elements.length < count) {
    readElement();
  }
  return elements;
}

function decodeUnion(field: UnionField, cursor: SourceCursor, state: CodecState, path: string): unknown {
  if (field.loadDecider) {
    const choice = requireChoice(field, field.loadDecider(cursor, field.choices, state.context, state.scope.values), path);
    return decodeChoice(choice, cursor, state, path);
  }
  const failures: string[] = [];
  for (const choice of field.choices) {
    const checkpoint = cursor.checkpoint();
    try {
      const value = decodeChoice(choice, cursor, state, path);
      cursor.release(checkpoint);
      return value;
    } catch (error) {
      cursor.restore(checkpoint);
      if (!(error instanceof DeserializationError) && !(error instanceof ValidationError)) throw error;
      failures.push(error.message);
    }
  }
  throw new DeserializationError(`No union choice of '${path}' matched the input`, { field: path, failures });
}

function decodeChoice(choice: UnionChoice, cursor: SourceCursor, state: CodecState, path: string): unknown {
  if (choice.kind === "record") {
    return choice.readNested(cursor, state);
  }
  const value = readValue(choice, cursor, state, path);
  validateValue(choice, value, state, path);
  return value;
}

function decodeTimestamp(field: TimestampField, bytes: Uint8Array): Date {
  const ticks = decodeInteger(bytes, field.signed, field.endian);
  return new Date(Number(floorDiv(ticks * 1_000n, TICKS_PER_SECOND[field.resolution])));
}

// ---------------------------------------------------------------------------
// Dump

/** Encoded bytes for `value`, with null and size handling applied. */
export function encodeValue(field: Field, value: unknown, state: CodecState, path: string): Uint8Array {
  try {
    if (value === null) return encodeNull(field, state, path);
    return fitToSize(field, encodeKind(field, value, state, path), state, path);
  } catch (error) {
    if (error instanceof CodecError) error.locate({ field: path });
    throw error;
  }
}

function encodeKind(field: Field, value: unknown, state: CodecState, path: string): Uint8Array {
  switch (field.kind) {
    case "integer":
      return encodeInteger(requireInteger(value, path), field.byteLength, field.signed, field.endian);
    case "varint": {
      const encoded = encodeVarInt(field.scheme, requireInteger(value, path));
      if (field.maxBytes !== undefined && encoded.length > field.maxBytes) {
        throw new ValueSizeError(`Varint '${path}' needs ${encoded.length} bytes, more than the ${field.maxBytes} allowed`, {
          field: path,
        });
      }
      return encoded;
    }
    case "float":
      if (typeof value !== "number") throw unserializable(path, "a number", value);
      return encodeFloat(value, field.byteLength, field.endian);
    case "timestamp": {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) throw unserializable(path, "a valid Date", value);
      const ticks = floorDiv(BigInt(value.getTime()) * TICKS_PER_SECOND[field.resolution], 1_000n);
      return encodeInteger(ticks, field.byteLength, field.signed, field.endian);
    }
    case "bytes":
      if (!(value instanceof Uint8Array)) throw unserializable(path, "bytes", value);
      return value;
    case "string":
      if (typeof value !== "string") throw unserializable(path, "a string", value);
      return encodeText(value, field.encoding);
    case "stringz": {
      if (typeof value !== "string") throw unserializable(path, "a string", value);
      if (value.includes("\0")) {
        throw new UnserializableValueError(`Null-terminated string '${path}' cannot contain a null character`, { field: path });
      }
      return concatBytes([encodeText(value, field.encoding), new Uint8Array(codeUnitWidth(field.encoding))]);
    }
    case "array":
      return encodeArray(field, value, state, path);
    case "union": {
      const choice = chooseForDump(field, value, state, path);
      if (choice.kind === "record") return choice.encodeNested(value, state);
      validateValue(choice, value, state, path);
      return encodeValue(choice, value, state, path);
    }
    case "nested":
      return field.schema.encodeNested(value, state);
    default:
      field satisfies never;
      throw new ConfigurationError(`Unsupported field kind encountered while writing ${path}`);
  }
}

function encodeArray(field: ArrayField, value: unknown, state: CodecState, path: string): Uint8Array {
  const count = getFinalElementCount(field, value);
  if (!Array.isArray(value)) throw unserializable(path, "a list", value);
  if (field.count !== undefined && typeof field.count !== "number") {
    const declared = tryResolveCount(field.count, state.scope, path);
    if (declared !== null && declared !== count) {
      throw new ArraySizeError(`Array '${path}' has ${count} element(s) but its count field says ${declared}`, {
        field: path,
        expected: declared,
        actual: count,
      });
    }
  }
  const chunks = value.map((element, index) => {
    const elementPath = `${path}[${index}]`;
    validateValue(field.element, element, state, elementPath);
    return encodeValue(field.element, element, state, elementPath);
  });
  return concatBytes(chunks);
}

function chooseForDump(field: UnionField, value: unknown, state: CodecState, path: string): UnionChoice {
  if (field.dumpDecider) {
    return requireChoice(field, field.dumpDecider(value, field.choices, state.context, state.scope.values), path);
  }
  const matches = field.choices.filter((choice) => acceptsValue(choice, value));
  if (matches.length !== 1) {
    throw new UnserializableValueError(
      `Cannot pick a union choice of '${path}' for ${describeValue(value)}: ${matches.length} choices accept it`,
      { field: path },
    );
  }
  return matches[0];
}

function acceptsValue(choice: UnionChoice, value: unknown): boolean {
  switch (valueShape(choice)) {
    case "number":
      return typeof value === "number" || typeof value === "bigint";
    case "date":
      return value instanceof Date;
    case "bytes":
      return value instanceof Uint8Array;
    case "string":
      return typeof value === "string";
    case "array":
      return Array.isArray(value);
    case "record":
      return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array) && !(value instanceof Date);
    case "any":
      return true;
  }
}

function requireChoice(field: UnionField, choice: UnionChoice, path: string): UnionChoice {
  if (!field.choices.includes(choice)) {
    throw new ConfigurationError(`Decider for union '${path}' returned something that is not one of its choices`, {
      field: path,
    });
  }
  return choice;
}

function encodeNull(field: Field, state: CodecState, path: string): Uint8Array {
  const { nullValue } = field;
  if (nullValue === undefined) {
    throw new UnserializableValueError(`Field '${path}' is not nullable`, { field: path });
  }
  if (nullValue instanceof Uint8Array) return nullValue;
  if (isDefault(nullValue)) return new Uint8Array(expectedSize(field, state, path));
  return encodeValue(field, nullValue, state, path);
}

function loadNullPattern(field: Field, state: CodecState, path: string): Uint8Array | null {
  const { nullValue } = field;
  if (nullValue instanceof Uint8Array) return nullValue;
  if (isDefault(nullValue)) return new Uint8Array(loadSize(field, state, path));
  return null;
}

function hasLogicalNull(field: Field): boolean {
  return field.nullValue !== undefined && !(field.nullValue instanceof Uint8Array) && !isDefault(field.nullValue);
}

function fitToSize(field: Field, encoded: Uint8Array, state: CodecState, path: string): Uint8Array {
  if (field.kind !== "bytes" && field.kind !== "string") return encoded;
  if (field.size === undefined) return encoded;
  const expected = resolveSizePolicy(field.size, state, path);
  if (encoded.length === expected) return encoded;
  if (encoded.length < expected && field.kind === "string" && field.padByte !== undefined) {
    const padded = new Uint8Array(expected).fill(field.padByte);
    padded.set(encoded);
    return padded;
  }
  throw new ValueSizeError(`Value of '${path}' is ${encoded.length} byte(s), field size is ${expected}`, {
    field: path,
    expected,
    actual: encoded.length,
  });
}

// ---------------------------------------------------------------------------
// Sizes

/** Byte size of `field` when it does not depend on any value; null otherwise. */
export function fixedSizeOf(field: Field): number | null {
  switch (field.kind) {
    case "integer":
    case "float":
    case "timestamp":
      return field.byteLength;
    case "bytes":
      if (typeof field.size === "number") return field.size;
      return field.size === undefined && field.const !== undefined ? field.const.length : null;
    case "string":
      if (typeof field.size === "number") return field.size;
      return field.size === undefined && field.const !== undefined ? encodeText(field.const, field.encoding).length : null;
    case "array": {
      const elementSize = fixedSizeOf(field.element);
      return typeof field.count === "number" && elementSize !== null ? field.count * elementSize : null;
    }
    case "union": {
      const sizes = field.choices.map((choice) => (choice.kind === "record" ? choice.fixedSize : fixedSizeOf(choice)));
      const [first] = sizes;
      return first !== null && sizes.every((size) => size === first) ? first : null;
    }
    case "nested":
      return field.schema.fixedSize;
    case "varint":
    case "stringz":
      return null;
    default:
      field satisfies never;
      return null;
  }
}

/**
 * Size from the field's declaration and the resolved siblings in scope,
 * falling back to encoding the field's own value (or const/default).
 */
export function expectedSize(field: Field, state: CodecState, path: string): number {
  const declared = declaredSize(field, state, path);
  if (declared !== null) return declared;

  const own = field.name !== "" && Object.hasOwn(state.scope.values, field.name) ? state.scope.values[field.name] : undefined;
  const candidate = own !== undefined && !isSentinel(own) ? own : (field.const ?? field.default);
  if (candidate === undefined || candidate === null) {
    throw new UndefinedSizeError(`Size of '${path}' depends on a value that is not known`, { field: path });
  }
  return encodeValue(field, candidate, state, path).length;
}

function loadSize(field: Field, state: CodecState, path: string): number {
  const declared = declaredSize(field, state, path);
  if (declared === null) {
    throw new UndefinedSizeError(`Field '${path}' has no size to read`, { field: path });
  }
  return declared;
}

function declaredSize(field: Field, state: CodecState, path: string): number | null {
  if ((field.kind === "bytes" || field.kind === "string") && field.size !== undefined) {
    return resolveSizePolicy(field.size, state, path);
  }
  if (field.kind === "array" && field.count !== undefined && typeof field.count !== "number") {
    const elementSize = fixedSizeOf(field.element);
    const count = tryResolveCount(field.count, state.scope, path);
    return elementSize !== null && count !== null ? elementSize * count : null;
  }
  return fixedSizeOf(field);
}

export function resolveSizePolicy(policy: SizePolicy, state: CodecState, path: string): number {
  if (typeof policy === "number") return policy;
  if (typeof policy === "string") {
    const value = Object.hasOwn(state.scope.values, policy) ? state.scope.values[policy] : undefined;
    if (value === undefined || isSentinel(value) || value === null) {
      throw new UndefinedSizeError(`Size of '${path}' comes from '${policy}', which has no value`, {
        field: path,
        sizeField: policy,
      });
    }
    return toLength(value, path);
  }
  if (isExpression(policy)) {
    try {
      return toLength(evaluateExpression(policy, state.scope, `size of ${path}`), path);
    } catch (error) {
      if (error instanceof FieldReferenceError) {
        throw new UndefinedSizeError(`Size of '${path}' cannot be evaluated: ${error.message}`, { field: path });
      }
      throw error;
    }
  }
  return toLength(policy(state.scope.values, state.context), path);
}

function resolveCount(field: ArrayField, state: CodecState, path: string): number {
  const { count } = field;
  if (count === undefined) {
    throw new ConfigurationError(`Array '${path}' has no count`);
  }
  if (typeof count === "number") return count;
  const value = typeof count === "string" ? lookupCount(count, state.scope, path) : evaluateExpression(count, state.scope, `count of ${path}`);
  return toLength(value, path);
}

function tryResolveCount(count: CountPolicy, scope: FieldScope, path: string): number | null {
  if (typeof count === "number") return count;
  try {
    const value = typeof count === "string" ? lookupCount(count, scope, path) : evaluateExpression(count, scope, `count of ${path}`);
    return toLength(value, path);
  } catch (error) {
    if (error instanceof FieldReferenceError) return null;
    throw error;
  }
}

function lookupCount(name: string, scope: FieldScope, path: string): unknown {
  const value = Object.hasOwn(scope.values, name) ? scope.values[name] : undefined;
  if (value === undefined || isSentinel(value)) {
    throw new FieldReferenceError(`Count of '${path}' comes from '${name}', which has no value`, { field: path });
  }
  return value;
}

// ---------------------------------------------------------------------------
// Shared helpers

export function validateValue(field: Field, value: unknown, state: CodecState, path: string): void {
  if (field.validators.length === 0 || value === NOT_PRESENT) return;
  runFieldValidators(field.validators, field, value, state.scope.values, state.context, { field: path });
}

export function defaultValueOf(field: Field, path: string): unknown {
  if (field.factory) return field.factory();
  if (field.default !== undefined) return field.default;
  if (field.const !== undefined) return field.const;
  throw new MissingRequiredValueError(`Field '${path}' has no value and no default`, { field: path });
}

function toLength(value: unknown, path: string): number {
  if (!isIntegerValue(value)) {
    throw new UndefinedSizeError(`Size or count of '${path}' resolved to a non-integer (${describeValue(value)})`, {
      field: path,
    });
  }
  const length = Number(value);
  if (length < 0 || !Number.isSafeInteger(length)) {
    throw new UndefinedSizeError(`Size or count of '${path}' resolved to ${value}`, { field: path });
  }
  return length;
}

function toSafeNumber(value: bigint, path: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new DeserializationError(`Integer '${path}' exceeds the safe integer range; declare it with bigint: true`, {
      field: path,
    });
  }
  return Number(value);
}

function requireInteger(value: unknown, path: string): bigint {
  if (typeof value !== "bigint" && typeof value !== "number") throw unserializable(path, "an integer", value);
  return toBigInt(value);
}

function unserializable(path: string, expected: string, value: unknown): UnserializableValueError {
  return new UnserializableValueError(`Field '${path}' expects ${expected}, got ${describeValue(value)}`, { field: path });
}
