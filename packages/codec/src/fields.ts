import { ConfigurationError, MissingRequiredValueError, UnserializableValueError } from "./errors";
import type { Expression } from "./expression";
import { encodeText, type FloatWidth } from "./primitives";
import type { RecordInstance, RecordSchema } from "./record";
import { isSentinel, type Sentinel } from "./sentinels";
import type { Endian, FieldValues, IntegerValue, PeekableSource, TextEncoding } from "./types";
import type { VarIntScheme } from "./varint";

export type FieldKind =
  | "integer"
  | "varint"
  | "float"
  | "timestamp"
  | "bytes"
  | "string"
  | "stringz"
  | "array"
  | "union"
  | "nested";

export type TimestampResolution = "s" | "ms" | "us" | "ns";

export type SizeFunction = (values: FieldValues, context: unknown) => number;

/** Fixed byte count, name of an earlier integer field, callable, or expression. */
export type SizePolicy = number | string | SizeFunction | Expression;

export type CountPolicy = number | string | Expression;

export type PresenceCheck = (values: FieldValues, context: unknown) => boolean;

export type PresencePolicy = PresenceCheck | Expression;

export interface ComputedValue<T = unknown> {
  /** Fields whose resolved values `produce` reads. */
  readonly dependsOn: readonly string[];
  produce(values: FieldValues, context: unknown): T;
  /** Called once the record's fields are final, so the value can adapt to them. */
  bind?(fields: ReadonlyMap<string, Field>): ComputedValue<T>;
}

export interface FieldInfo {
  readonly name: string;
  readonly kind: FieldKind;
}

/** Returns `false` or throws ValidationError to reject a value. */
export type FieldValidator = (value: unknown, field: FieldInfo, values: FieldValues, context: unknown) => boolean | void;

export type HaltCheck = (
  array: ArrayField,
  source: PeekableSource,
  elements: unknown[],
  context: unknown,
  loaded: FieldValues,
) => boolean;

export type UnionChoice = Field | RecordSchema;

export type LoadDecider = (
  source: PeekableSource,
  choices: readonly UnionChoice[],
  context: unknown,
  loaded: FieldValues,
) => UnionChoice;

export type DumpDecider = (
  value: unknown,
  choices: readonly UnionChoice[],
  context: unknown,
  values: FieldValues,
) => UnionChoice;

export type NullRepresentation<T> = T | Uint8Array | Sentinel<"default">;

export interface CommonOptions<T> {
  const?: T;
  default?: T | null;
  factory?: () => T | null;
  discard?: boolean;
  nullValue?: NullRepresentation<T>;
  present?: PresencePolicy;
  notPresentValue?: T | null;
  computed?: ComputedValue<T>;
  validate?: FieldValidator | readonly FieldValidator[];
}

interface FieldCommon<K extends FieldKind, T> extends FieldInfo {
  readonly kind: K;
  /** Declared position; -1 for elements and standalone fields. */
  readonly index: number;
  /** Byte offset inside the record when every earlier field has a fixed size. */
  readonly offset: number | null;
  readonly const?: T;
  readonly default?: T | null;
  readonly factory?: () => T | null;
  readonly discard: boolean;
  readonly nullValue?: NullRepresentation<T>;
  readonly present?: PresencePolicy;
  readonly notPresentValue?: T | null;
  readonly computed?: ComputedValue;
  readonly validators: readonly FieldValidator[];
  /** Options the caller set explicitly; record defaults fill in the rest. */
  readonly explicit: ReadonlySet<string>;
}

export interface IntegerField extends FieldCommon<"integer", IntegerValue> {
  readonly byteLength: number;
  readonly signed: boolean;
  readonly endian: Endian;
  /** Decode to bigint instead of number. */
  readonly bigint: boolean;
}

export interface VarIntField extends FieldCommon<"varint", IntegerValue> {
  readonly scheme: VarIntScheme;
  readonly maxBytes?: number;
  readonly bigint: boolean;
}

export interface FloatField extends FieldCommon<"float", number> {
  readonly byteLength: FloatWidth;
  readonly endian: Endian;
}

export interface TimestampField extends FieldCommon<"timestamp", Date> {
  readonly byteLength: number;
  readonly signed: boolean;
  readonly endian: Endian;
  readonly resolution: TimestampResolution;
}

export interface BytesField extends FieldCommon<"bytes", Uint8Array> {
  readonly size?: SizePolicy;
}

export interface StringField extends FieldCommon<"string", string> {
  readonly size?: SizePolicy;
  readonly encoding: TextEncoding;
  /** Pads short values up to the field size instead of failing. */
  readonly padByte?: number;
}

export interface StringZField extends FieldCommon<"stringz", string> {
  readonly encoding: TextEncoding;
}

export interface ArrayField extends FieldCommon<"array", readonly unknown[]> {
  readonly element: Field;
  readonly count?: CountPolicy;
  readonly haltCheck?: HaltCheck;
}

export interface UnionField extends FieldCommon<"union", unknown> {
  readonly choices: readonly UnionChoice[];
  readonly loadDecider?: LoadDecider;
  readonly dumpDecider?: DumpDecider;
}

export type NestedValue = RecordInstance | Readonly<Record<string, unknown>>;

export interface NestedField extends FieldCommon<"nested", NestedValue> {
  readonly schema: RecordSchema;
}

export type Field =
  | IntegerField
  | VarIntField
  | FloatField
  | TimestampField
  | BytesField
  | StringField
  | StringZField
  | ArrayField
  | UnionField
  | NestedField;

export interface IntegerOptions extends CommonOptions<IntegerValue> {
  endian?: Endian;
  bigint?: boolean;
}

export interface VarIntOptions extends CommonOptions<IntegerValue> {
  maxBytes?: number;
  bigint?: boolean;
}

export interface FloatOptions extends CommonOptions<number> {
  endian?: Endian;
}

export interface TimestampOptions extends CommonOptions<Date> {
  resolution?: TimestampResolution;
  signed?: boolean;
  endian?: Endian;
}

export interface BytesOptions extends CommonOptions<Uint8Array> {
  size?: SizePolicy;
}

export interface StringOptions extends CommonOptions<string> {
  size?: SizePolicy;
  encoding?: TextEncoding;
  padByte?: number;
}

export interface StringZOptions extends CommonOptions<string> {
  encoding?: TextEncoding;
}

export type ArrayOptions = CommonOptions<readonly unknown[]> &
  ({ count: CountPolicy; haltCheck?: never } | { haltCheck: HaltCheck; count?: never });

export interface UnionOptions extends CommonOptions<unknown> {
  loadDecider?: LoadDecider;
  dumpDecider?: DumpDecider;
}

export type NestedOptions = CommonOptions<NestedValue>;

export interface KindDefaults {
  endian?: Endian;
  encoding?: TextEncoding;
}

/** Record-wide option defaults; kind-specific entries win over the generic ones. */
export interface ArgumentDefaults extends KindDefaults {
  kinds?: Partial<Record<FieldKind, KindDefaults>>;
}

function commonParts<T>(options: CommonOptions<T>) {
  if (options.default !== undefined && options.factory !== undefined) {
    throw new ConfigurationError("A field cannot have both a default and a factory");
  }
  if (options.const !== undefined && options.computed !== undefined) {
    throw new ConfigurationError("A const field cannot also be computed");
  }
  const { validate } = options;
  return {
    name: "",
    index: -1,
    offset: null,
    const: options.const,
    default: options.default,
    factory: options.factory,
    discard: options.discard ?? false,
    nullValue: options.nullValue,
    present: options.present,
    notPresentValue: options.notPresentValue,
    computed: options.computed,
    validators: validate === undefined ? [] : typeof validate === "function" ? [validate] : [...validate],
    explicit: new Set(
      Object.entries(options)
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key),
    ),
  };
}

function requireByteLength(byteLength: number, what: string): void {
  if (!Number.isInteger(byteLength) || byteLength < 1) {
    throw new ConfigurationError(`${what} byte length must be a positive integer, got ${byteLength}`);
  }
}

function requireFixedSize(size: SizePolicy | undefined): void {
  if (typeof size === "number" && (!Number.isInteger(size) || size < 0)) {
    throw new ConfigurationError(`Field size must be a non-negative integer, got ${size}`);
  }
}

function integer(byteLength: number, signed: boolean, options: IntegerOptions = {}): IntegerField {
  requireByteLength(byteLength, "Integer");
  return {
    kind: "integer",
    ...commonParts(options),
    byteLength,
    signed,
    endian: options.endian ?? "little",
    bigint: options.bigint ?? byteLength > 6,
  };
}

function varint(scheme: VarIntScheme, options: VarIntOptions = {}): VarIntField {
  if (options.maxBytes !== undefined) requireByteLength(options.maxBytes, "Varint maximum");
  return { kind: "varint", ...commonParts(options), scheme, maxBytes: options.maxBytes, bigint: options.bigint ?? false };
}

function float(byteLength: FloatWidth, options: FloatOptions = {}): FloatField {
  return { kind: "float", ...commonParts(options), byteLength, endian: options.endian ?? "little" };
}

function timestamp(byteLength: number, options: TimestampOptions = {}): TimestampField {
  requireByteLength(byteLength, "Timestamp");
  return {
    kind: "timestamp",
    ...commonParts(options),
    byteLength,
    signed: options.signed ?? true,
    endian: options.endian ?? "little",
    resolution: options.resolution ?? "s",
  };
}

function bytes(options: BytesOptions = {}): BytesField {
  requireFixedSize(options.size);
  return { kind: "bytes", ...commonParts(options), size: options.size };
}

function string(options: StringOptions = {}): StringField {
  requireFixedSize(options.size);
  if (options.padByte !== undefined && (!Number.isInteger(options.padByte) || options.padByte < 0 || options.padByte > 0xff)) {
    throw new ConfigurationError(`Pad byte must be a single byte value, got ${options.padByte}`);
  }
  return {
    kind: "string",
    ...commonParts(options),
    size: options.size,
    encoding: options.encoding ?? "latin1",
    padByte: options.padByte,
  };
}

function stringZ(options: StringZOptions = {}): StringZField {
  return { kind: "stringz", ...commonParts(options), encoding: options.encoding ?? "latin1" };
}

function array(element: Field, options: ArrayOptions): ArrayField {
  const { count, haltCheck } = options;
  if ((count === undefined) === (haltCheck === undefined)) {
    throw new ConfigurationError("An array needs exactly one of `count` or `haltCheck`");
  }
  if (typeof count === "number" && (!Number.isInteger(count) || count < 0)) {
    throw new ConfigurationError(`Array count must be a non-negative integer, got ${count}`);
  }
  return { kind: "array", ...commonParts(options), element, count, haltCheck };
}

function union(choices: readonly UnionChoice[], options: UnionOptions = {}): UnionField {
  if (choices.length === 0) {
    throw new ConfigurationError("A union needs at least one choice");
  }
  if (!options.loadDecider || !options.dumpDecider) {
    const seen = new Map<ValueShape, number>();
    choices.forEach((choice, index) => {
      const shape = valueShape(choice);
      const previous = seen.get(shape);
      if (shape === "any" || previous !== undefined) {
        throw new ConfigurationError(
          `Union choices ${previous ?? index} and ${index} accept the same kind of value; supply both a load and a dump decider`,
        );
      }
      seen.set(shape, index);
    });
  }
  return {
    kind: "union",
    ...commonParts(options),
    choices: [...choices],
    loadDecider: options.loadDecider,
    dumpDecider: options.dumpDecider,
  };
}

function nested(schema: RecordSchema, options: NestedOptions = {}): NestedField {
  return { kind: "nested", ...commonParts(options), schema };
}

export const f = {
  int8: (options?: IntegerOptions) => integer(1, true, options),
  uint8: (options?: IntegerOptions) => integer(1, false, options),
  int16: (options?: IntegerOptions) => integer(2, true, options),
  uint16: (options?: IntegerOptions) => integer(2, false, options),
  int24: (options?: IntegerOptions) => integer(3, true, options),
  uint24: (options?: IntegerOptions) => integer(3, false, options),
  int32: (options?: IntegerOptions) => integer(4, true, options),
  uint32: (options?: IntegerOptions) => integer(4, false, options),
  int64: (options?: IntegerOptions) => integer(8, true, options),
  uint64: (options?: IntegerOptions) => integer(8, false, options),
  integer: (byteLength: number, options: IntegerOptions & { signed?: boolean } = {}) =>
    integer(byteLength, options.signed ?? false, options),
  varint,
  uleb128: (options?: VarIntOptions) => varint("uleb128", options),
  leb128: (options?: VarIntOptions) => varint("leb128", options),
  vlq: (options?: VarIntOptions) => varint("vlq", options),
  compact: (options?: VarIntOptions) => varint("compact", options),
  float16: (options?: FloatOptions) => float(2, options),
  float32: (options?: FloatOptions) => float(4, options),
  float64: (options?: FloatOptions) => float(8, options),
  timestamp,
  timestamp32: (options?: TimestampOptions) => timestamp(4, options),
  timestamp64: (options?: TimestampOptions) => timestamp(8, options),
  bytes,
  string,
  stringZ,
  array,
  union,
  nested,
};

/** Copy of `field` carrying its place in a record. */
export function bindField(field: Field, name: string, index: number, offset: number | null): Field {
  return { ...field, name, index, offset };
}

export function applyArgumentDefaults(field: Field, defaults: ArgumentDefaults): Field {
  const scoped = defaults.kinds?.[field.kind];
  const endian = scoped?.endian ?? defaults.endian;
  const encoding = scoped?.encoding ?? defaults.encoding;
  const inherits = (option: string) => !field.explicit.has(option);
  switch (field.kind) {
    case "integer":
    case "float":
    case "timestamp":
      return endian !== undefined && inherits("endian") ? { ...field, endian } : field;
    case "string":
    case "stringz":
      return encoding !== undefined && inherits("encoding") ? { ...field, encoding } : field;
    case "array":
      return { ...field, element: applyArgumentDefaults(field.element, defaults) };
    case "varint":
    case "bytes":
    case "union":
    case "nested":
      return field;
    default:
      field satisfies never;
      return field;
  }
}

export type ValueShape = "number" | "date" | "bytes" | "string" | "array" | "record" | "any";

export function valueShape(choice: UnionChoice): ValueShape {
  switch (choice.kind) {
    case "integer":
    case "varint":
    case "float":
      return "number";
    case "timestamp":
      return "date";
    case "bytes":
      return "bytes";
    case "string":
    case "stringz":
      return "string";
    case "array":
      return "array";
    case "nested":
    case "record":
      return "record";
    case "union":
      return "any";
    default:
      choice satisfies never;
      return "any";
  }
}

export function lengthOf(name: string, options: { encoding?: TextEncoding } = {}): ComputedValue<number> {
  return measureLength(name, options.encoding, options.encoding ?? "latin1");
}

function measureLength(name: string, explicit: TextEncoding | undefined, encoding: TextEncoding): ComputedValue<number> {
  return {
    dependsOn: [name],
    produce: (values) => {
      const value = values[name];
      if (value instanceof Uint8Array || Array.isArray(value)) return value.length;
      if (typeof value === "string") return encodeText(value, encoding).length;
      if (value === null) return 0;
      if (value === undefined || isSentinel(value)) {
        throw new MissingRequiredValueError(`Cannot compute the length of '${name}' before it has a value`, { field: name });
      }
      throw new UnserializableValueError(`Cannot take the length of '${name}' (${typeof value})`, { field: name });
    },
    // strings are measured in the encoding of the field they are written to
    bind: (fields) => {
      const target = fields.get(name);
      if (explicit !== undefined || (target?.kind !== "string" && target?.kind !== "stringz")) {
        return measureLength(name, explicit, encoding);
      }
      return measureLength(name, undefined, target.encoding);
    },
  };
}

export function countOf(name: string): ComputedValue<number> {
  return {
    dependsOn: [name],
    produce: (values) => {
      const value = values[name];
      if (Array.isArray(value)) return value.length;
      if (value === undefined || isSentinel(value)) {
        throw new MissingRequiredValueError(`Cannot count '${name}' before it has a value`, { field: name });
      }
      throw new UnserializableValueError(`Field '${name}' does not hold a list`, { field: name });
    },
  };
}

export const untilEndOfInput: HaltCheck = (_array, source) => source.peek(1).length === 0;

/** Stops after an element matching `isSentinel`, dropping that element. */
export function untilSentinel(matches: (element: unknown) => boolean): HaltCheck {
  return (_array, _source, elements) => {
    if (elements.length === 0 || !matches(elements[elements.length - 1])) return false;
    elements.pop();
    return true;
  };
}
