import { hexToBytes } from "@bytecraft/helpers";
import YAML from "yaml";
import { RecordBuilder } from "./builder";
import {
  ConfigurationError,
  DocumentParseError,
  UnexpectedValueError,
  UnserializableValueError,
} from "./errors";
import { BINARY_OPERATORS, evaluateExpression, type BinaryOperator, type Expression } from "./expression";
import {
  countOf,
  f,
  lengthOf,
  untilEndOfInput,
  type ArgumentDefaults,
  type ComputedValue,
  type Field,
  type FloatOptions,
  type NullRepresentation,
  type TimestampResolution,
  type UnionChoice,
} from "./fields";
import type { RecordSchema } from "./record";
import { DEFAULT } from "./sentinels";
import type { Endian, FieldValues, IntegerValue, TextEncoding } from "./types";
import { VARINT_SCHEMES } from "./varint";

export interface RecordDocument {
  readonly records: ReadonlyMap<string, RecordSchema>;
  get(name: string): RecordSchema;
}

type ResolveRecord = (name: string, context: string) => RecordSchema;

/** Sizes and counts a document can declare: a number, a field name or an expression. */
type DeclaredSize = number | string | Expression;

const ENDIANS: readonly Endian[] = ["little", "big"];
const ENCODINGS: readonly TextEncoding[] = ["utf8", "utf16le", "latin1", "ascii"];
const RESOLUTIONS: readonly TimestampResolution[] = ["s", "ms", "us", "ns"];

/**
 * Builds record schemas from a YAML document. Records may refer to each other
 * in any order; reference cycles are rejected.
 */
export function parseRecordDocument(text: string): RecordDocument {
  let root: unknown;
  try {
    root = YAML.parse(text, { intAsBigInt: true });
  } catch (error) {
    throw new DocumentParseError("Failed to parse record document YAML", {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const document = requireRecord(root, "record document");
  const declarations = new Map<string, Record<string, unknown>>();
  requireArray(document.records, "records").forEach((entry, index) => {
    const node = requireRecord(entry, `records[${index}]`);
    const name = requireString(node.name, `records[${index}].name`);
    if (declarations.has(name)) {
      throw new ConfigurationError(`Duplicate record definition '${name}' found in document`, { record: name });
    }
    declarations.set(name, node);
  });

  const built = new Map<string, RecordSchema>();
  const building: string[] = [];
  const resolve: ResolveRecord = (name, context) => {
    const existing = built.get(name);
    if (existing) return existing;
    if (building.includes(name)) {
      throw new ConfigurationError(`Cyclic record reference detected: ${[...building, name].join(" -> ")}`, { record: name });
    }
    const node = declarations.get(name);
    if (!node) {
      throw new ConfigurationError(`${context} references unknown record '${name}'`, { record: name });
    }
    building.push(name);
    const schema = buildRecord(name, node, resolve);
    building.pop();
    built.set(name, schema);
    return schema;
  };
  for (const name of declarations.keys()) {
    resolve(name, "document");
  }

  return {
    records: built,
    get(name: string): RecordSchema {
      const schema = built.get(name);
      if (!schema) {
        throw new ConfigurationError(`Record '${name}' is not defined in the document`, { record: name });
      }
      return schema;
    },
  };
}

function buildRecord(name: string, node: Record<string, unknown>, resolve: ResolveRecord): RecordSchema {
  const builder = new RecordBuilder(name, parseDefaults(node.defaults, `${name}.defaults`));
  if (node.extends !== undefined) {
    builder.extends(resolve(requireString(node.extends, `${name}.extends`), `Record '${name}'`));
  }
  requireArray(node.fields, `${name}.fields`).forEach((entry, index) => {
    const fieldNode = requireRecord(entry, `${name}.fields[${index}]`);
    const fieldName = requireString(fieldNode.name, `${name}.fields[${index}].name`);
    const context = `${name}.${fieldName}`;
    builder.field(fieldName, parseField(fieldNode, context, resolve));
    if (fieldNode.computed !== undefined) {
      builder.computes(fieldName, parseComputed(fieldNode.computed, `${context}.computed`));
    }
  });
  return builder.build();
}

function parseDefaults(value: unknown, context: string): ArgumentDefaults {
  if (value === undefined) return {};
  const node = requireRecord(value, context);
  return {
    endian: node.endian === undefined ? undefined : requireOneOf(node.endian, ENDIANS, `${context}.endian`),
    encoding: node.encoding === undefined ? undefined : requireOneOf(node.encoding, ENCODINGS, `${context}.encoding`),
  };
}

function parseComputed(value: unknown, context: string): ComputedValue {
  const node = requireRecord(value, context);
  const keys = Object.keys(node);
  if (keys.length !== 1) {
    throw new ConfigurationError(`${context} must contain exactly one of 'length-of' or 'count-of'`);
  }
  switch (keys[0]) {
    case "length-of":
      return lengthOf(requireString(node["length-of"], `${context}.length-of`));
    case "count-of":
      return countOf(requireString(node["count-of"], `${context}.count-of`));
    default:
      throw new ConfigurationError(`Computed value '${keys[0]}' in ${context} is not supported`);
  }
}

interface Scalars<T> {
  const?: T;
  default?: T;
  nullValue?: NullRepresentation<T>;
  notPresentValue?: T;
}

function scalarOptions<T>(node: Record<string, unknown>, convert: (value: unknown, context: string) => T, context: string): Scalars<T> {
  const read = (key: string) => (node[key] === undefined ? undefined : convert(node[key], `${context}.${key}`));
  const nullNode = node["null-value"];
  return {
    const: read("const"),
    default: read("default"),
    nullValue: nullNode === undefined ? undefined : nullNode === "default" ? DEFAULT : convert(nullNode, `${context}.null-value`),
    notPresentValue: read("not-present-value"),
  };
}

function parseField(node: Record<string, unknown>, context: string, resolve: ResolveRecord): Field {
  const common = {
    discard: node.discard === undefined ? undefined : requireBoolean(node.discard, `${context}.discard`),
    present: node.present === undefined ? undefined : parseExpression(node.present, `${context}.present`),
  };
  return parseType(requireRecord(node.type, `${context}.type`), context, resolve, node, common);
}

interface DocumentCommon {
  discard?: boolean;
  present?: Expression;
}

function parseType(
  typeNode: Record<string, unknown>,
  context: string,
  resolve: ResolveRecord,
  node: Record<string, unknown> = {},
  common: DocumentCommon = {},
): Field {
  const keys = Object.keys(typeNode);
  if (keys.length !== 1) {
    throw new ConfigurationError(`Type of '${context}' must be a single-entry object`);
  }
  const key = keys[0];
  const value = typeNode[key];

  switch (key) {
    case "uint":
    case "int": {
      const params = parseWidth(value, `${context}.${key}`);
      return f.integer(params.bytes, {
        ...common,
        ...scalarOptions(node, toIntegerScalar, context),
        signed: key === "int",
        endian: params.endian,
      });
    }
    case "float": {
      const params = parseWidth(value, `${context}.float`);
      return floatField(params.bytes, `${context}.float`, {
        ...common,
        ...scalarOptions(node, toNumberScalar, context),
        endian: params.endian,
      });
    }
    case "varint": {
      const params: Record<string, unknown> = typeof value === "string" ? { scheme: value } : requireRecord(value, `${context}.varint`);
      return f.varint(requireOneOf(params.scheme, VARINT_SCHEMES, `${context}.varint.scheme`), {
        ...common,
        ...scalarOptions(node, toIntegerScalar, context),
        maxBytes: params["max-bytes"] !== undefined ? toCount(params["max-bytes"], `${context}.varint.max-bytes`) : undefined,
        bigint: params.bigint !== undefined ? requireBoolean(params.bigint, `${context}.varint.bigint`) : undefined,
      });
    }
    case "bytes": {
      const params = optionalRecord(value, `${context}.bytes`);
      return f.bytes({
        ...common,
        ...scalarOptions(node, toBytesScalar, context),
        size: params.size === undefined ? undefined : parseSize(params.size, `${context}.bytes.size`),
      });
    }
    case "string": {
      const params = optionalRecord(value, `${context}.string`);
      return f.string({
        ...common,
        ...scalarOptions(node, toStringScalar, context),
        size: params.size === undefined ? undefined : parseSize(params.size, `${context}.string.size`),
        encoding: params.encoding === undefined ? undefined : requireOneOf(params.encoding, ENCODINGS, `${context}.string.encoding`),
        padByte: params["pad-byte"] === undefined ? undefined : toCount(params["pad-byte"], `${context}.string.pad-byte`),
      });
    }
    case "stringz": {
      const params = optionalRecord(value, `${context}.stringz`);
      return f.stringZ({
        ...common,
        ...scalarOptions(node, toStringScalar, context),
        encoding: params.encoding === undefined ? undefined : requireOneOf(params.encoding, ENCODINGS, `${context}.stringz.encoding`),
      });
    }
    case "timestamp": {
      const params = requireRecord(value, `${context}.timestamp`);
      return f.timestamp(toCount(params.bytes, `${context}.timestamp.bytes`), {
        ...common,
        resolution: params.resolution === undefined ? undefined : requireOneOf(params.resolution, RESOLUTIONS, `${context}.timestamp.resolution`),
        signed: params.signed === undefined ? undefined : requireBoolean(params.signed, `${context}.timestamp.signed`),
        endian: params.endian === undefined ? undefined : requireOneOf(params.endian, ENDIANS, `${context}.timestamp.endian`),
      });
    }
    case "array":
      return parseArray(requireRecord(value, `${context}.array`), context, resolve, common);
    case "union":
      return parseUnion(requireRecord(value, `${context}.union`), context, resolve, common);
    case "record":
      return f.nested(resolve(requireString(value, `${context}.record`), `Field '${context}'`), common);
    default:
      throw new ConfigurationError(`Type kind '${key}' used by '${context}' is not supported`);
  }
}

function floatField(bytes: number, context: string, options: FloatOptions): Field {
  switch (bytes) {
    case 2:
      return f.float16(options);
    case 4:
      return f.float32(options);
    case 8:
      return f.float64(options);
    default:
      throw new ConfigurationError(`${context} must be 2, 4 or 8 bytes wide, got ${bytes}`);
  }
}

function parseArray(node: Record<string, unknown>, context: string, resolve: ResolveRecord, common: DocumentCommon): Field {
  const element = parseType(requireRecord(node.element, `${context}.array.element`), `${context}[]`, resolve);
  if (node.until !== undefined) {
    if (node.count !== undefined) {
      throw new ConfigurationError(`Array '${context}' must not define both 'count' and 'until'`);
    }
    if (node.until !== "end-of-input") {
      throw new ConfigurationError(`Array '${context}' only supports until: end-of-input`);
    }
    return f.array(element, { ...common, haltCheck: untilEndOfInput });
  }
  if (node.count === undefined) {
    throw new ConfigurationError(`Array '${context}' must define 'count' or 'until'`);
  }
  return f.array(element, { ...common, count: parseSize(node.count, `${context}.array.count`) });
}

function parseUnion(node: Record<string, unknown>, context: string, resolve: ResolveRecord, common: DocumentCommon): Field {
  const tagRef = parseExpression(node["tag-ref"], `${context}.union.tag-ref`);
  const tags: bigint[] = [];
  const choices: UnionChoice[] = requireArray(node.variants, `${context}.union.variants`).map((entry, index) => {
    const variant = requireRecord(entry, `${context}.union.variants[${index}]`);
    const tag = toBigIntScalar(variant["tag-value"], `${context}.union.variants[${index}].tag-value`);
    if (tags.includes(tag)) {
      throw new ConfigurationError(`Union '${context}' declares tag value ${tag} more than once`);
    }
    tags.push(tag);
    return parseType(requireRecord(variant.type, `${context}.union.variants[${index}].type`), context, resolve);
  });

  const pick = (values: FieldValues, onMissing: (tag: bigint) => Error): UnionChoice => {
    const tag = evaluateExpression(tagRef, { values }, `tag of ${context}`);
    const index = tags.indexOf(tag);
    if (index < 0) throw onMissing(tag);
    return choices[index];
  };

  return f.union(choices, {
    ...common,
    loadDecider: (_source, _choices, _context, loaded) =>
      pick(loaded, (tag) => new UnexpectedValueError(`Union '${context}' has no variant for tag ${tag}`, { field: context })),
    dumpDecider: (_value, _choices, _context, values) =>
      pick(values, (tag) => new UnserializableValueError(`Union '${context}' has no variant for tag ${tag}`, { field: context })),
  });
}

function parseWidth(value: unknown, context: string): { bytes: number; endian?: Endian } {
  if (typeof value === "bigint" || typeof value === "number") {
    return { bytes: toCount(value, context) };
  }
  const node = requireRecord(value, context);
  return {
    bytes: toCount(node.bytes, `${context}.bytes`),
    endian: node.endian === undefined ? undefined : requireOneOf(node.endian, ENDIANS, `${context}.endian`),
  };
}

function parseSize(value: unknown, context: string): DeclaredSize {
  if (typeof value === "bigint" || typeof value === "number") return toCount(value, context);
  if (typeof value === "string") return requireString(value, context);
  return parseExpression(value, context);
}

function parseExpression(value: unknown, context: string): Expression {
  const node = requireRecord(value, `Expression for ${context}`);
  const keys = Object.keys(node);
  if (keys.length !== 1) {
    throw new ConfigurationError(`Expression for ${context} must contain exactly one operator`);
  }
  const key = keys[0];
  const operand = node[key];

  switch (key) {
    case "literal":
      return { type: "literal", value: parseLiteral(operand, context) };
    case "field-ref": {
      const pathNode = requireRecord(operand, `field-ref expression in ${context}`).path;
      if (!Array.isArray(pathNode) || pathNode.length === 0) {
        throw new ConfigurationError(`field-ref in ${context} must define a non-empty path array`);
      }
      const path = pathNode.map((segment, index) => requireString(segment, `field-ref segment ${index} in ${context}`));
      return { type: "field-ref", path };
    }
    case "bit-not": {
      const inner = requireRecord(operand, `${key} expression in ${context}`);
      return { type: "unary", op: "bit-not", operand: parseExpression(inner.operand, context) };
    }
    default: {
      const op = BINARY_OPERATORS.find((candidate) => candidate === key);
      if (!op) {
        throw new ConfigurationError(`Expression '${key}' in ${context} is not supported`);
      }
      return parseBinary(op, requireRecord(operand, `${key} expression in ${context}`), context);
    }
  }
}

function parseBinary(op: BinaryOperator, node: Record<string, unknown>, context: string): Expression {
  if (node.left === undefined || node.right === undefined) {
    throw new ConfigurationError(`Binary expression '${op}' in ${context} must include 'left' and 'right'`);
  }
  return { type: "binary", op, left: parseExpression(node.left, context), right: parseExpression(node.right, context) };
}

function parseLiteral(value: unknown, context: string): bigint {
  if (typeof value === "bigint" || typeof value === "number") return toBigIntScalar(value, `literal in ${context}`);
  const node = requireRecord(value, `literal in ${context}`);
  const keys = Object.keys(node);
  if (keys.length !== 1) {
    throw new ConfigurationError(`Literal expression for ${context} must specify exactly one type`);
  }
  return toBigIntScalar(node[keys[0]], `literal in ${context}`);
}

function toBigIntScalar(value: unknown, context: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new ConfigurationError(`${context} must be an integer`);
}

function toIntegerScalar(value: unknown, context: string): IntegerValue {
  const big = toBigIntScalar(value, context);
  return big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(big) : big;
}

function toNumberScalar(value: unknown, context: string): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  throw new ConfigurationError(`${context} must be a number`);
}

function toStringScalar(value: unknown, context: string): string {
  if (typeof value !== "string") {
    throw new ConfigurationError(`${context} must be a string`);
  }
  return value;
}

function toBytesScalar(value: unknown, context: string): Uint8Array {
  try {
    return hexToBytes(toStringScalar(value, context));
  } catch (error) {
    throw new ConfigurationError(`${context} must be a hex string`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function toCount(value: unknown, context: string): number {
  const big = toBigIntScalar(value, context);
  if (big < 0n || big > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ConfigurationError(`${context} must be a non-negative integer`);
  }
  return Number(big);
}

function requireRecord(value: unknown, context: string): Record<string, unknown> {
  if (!isRecordNode(value)) {
    throw new ConfigurationError(`${context} must be an object`);
  }
  return value;
}

function optionalRecord(value: unknown, context: string): Record<string, unknown> {
  return value === null || value === undefined ? {} : requireRecord(value, context);
}

function isRecordNode(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireArray(value: unknown, context: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${context} must be a list`);
  }
  return value;
}

function requireString(value: unknown, context: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigurationError(`${context} must be a non-empty string`);
  }
  return value;
}

function requireBoolean(value: unknown, context: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${context} must be true or false`);
  }
  return value;
}

function requireOneOf<T extends string>(value: unknown, allowed: readonly T[], context: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`${context} must be one of ${allowed.join(", ")}`);
  }
  return match;
}
