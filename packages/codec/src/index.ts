/**
 * @bytecraft/codec - Declarative binary record codec
 *
 * Describe a binary layout once as a record of typed fields, then load and
 * dump it against bytes or streams.
 *
 * @example
 * ```ts
 * import { defineRecord, f, lengthOf, record } from "@bytecraft/codec";
 *
 * const Packet = record("Packet")
 *   .field("length", f.uint8())
 *   .field("payload", f.bytes({ size: "length" }))
 *   .computes("length", lengthOf("payload"))
 *   .build();
 *
 * const bytes = Packet.create({ payload: new Uint8Array([1, 2]) }).toBytes();
 * ```
 */

// ============================================================
// Record Declarations
// ============================================================

export { RecordBuilder, defineRecord, record, type RecordOptions } from "./builder";
export { RecordInstance, RecordSchema } from "./record";
export type { SchemaParts, ToDictOptions } from "./record";

// ============================================================
// Fields
// ============================================================

export {
  f,
  countOf,
  lengthOf,
  untilEndOfInput,
  untilSentinel,
  valueShape,
} from "./fields";
export type {
  ArgumentDefaults,
  ArrayField,
  ArrayOptions,
  BytesField,
  BytesOptions,
  CommonOptions,
  ComputedValue,
  CountPolicy,
  DumpDecider,
  Field,
  FieldInfo,
  FieldKind,
  FieldValidator,
  FloatField,
  FloatOptions,
  HaltCheck,
  IntegerField,
  IntegerOptions,
  KindDefaults,
  LoadDecider,
  NestedField,
  NestedOptions,
  NestedValue,
  NullRepresentation,
  PresenceCheck,
  PresencePolicy,
  SizeFunction,
  SizePolicy,
  StringField,
  StringOptions,
  StringZField,
  StringZOptions,
  TimestampField,
  TimestampOptions,
  TimestampResolution,
  UnionChoice,
  UnionField,
  UnionOptions,
  ValueShape,
  VarIntField,
  VarIntOptions,
} from "./fields";

// Standalone field encoding
export { decodeField, encodeField, fieldExpectedSize, getFinalElementCount, readField, writeField } from "./codec";

// ============================================================
// Expressions
// ============================================================

export { BINARY_OPERATORS, collectFieldRefs, evaluateExpression, expr, isExpression } from "./expression";
export type {
  BinaryExpression,
  BinaryOperator,
  Expression,
  FieldRefExpression,
  FieldScope,
  LiteralExpression,
  UnaryExpression,
  UnaryOperator,
} from "./expression";

// ============================================================
// Record Documents (YAML)
// ============================================================

export { parseRecordDocument, type RecordDocument } from "./document";

// ============================================================
// Validation
// ============================================================

export { zodRecordValidator, zodValidator, type RecordValidator } from "./validation";

// ============================================================
// Streams, Sentinels and Logging
// ============================================================

export { MemorySink, MemorySource, SourceCursor } from "./io";
export { DEFAULT, NOT_PRESENT, Sentinel, UNDEFINED, isDefault, isNotPresent, isSentinel, isUndefined } from "./sentinels";
export type { SentinelTag } from "./sentinels";
export { NOOP_LOGGER, createConsoleLogger } from "./logger";
export type { ConsoleLoggerOptions, LogLevel } from "./logger";
export { DEFAULT_MAX_VARINT_BYTES } from "./options";
export type {
  ByteSink,
  ByteSource,
  CodecLogger,
  DumpOptions,
  Endian,
  FieldValues,
  IntegerValue,
  LoadOptions,
  PartialDumpOptions,
  PartialLoadOptions,
  PartialOptions,
  PeekableSource,
  TextEncoding,
} from "./types";

// ============================================================
// Low-level Codecs
// ============================================================

export {
  VARINT_SCHEMES,
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
export type { VarIntDecodeOptions, VarIntDecodeResult, VarIntScheme } from "./varint";
export { decodeFloat, decodeInteger, encodeFloat, encodeInteger, floatToHalf, halfToFloat } from "./primitives";
export type { FloatWidth } from "./primitives";

// ============================================================
// Errors
// ============================================================

export {
  ArraySizeError,
  CodecError,
  ConfigurationError,
  DeserializationError,
  DocumentParseError,
  ExtraneousDataError,
  FieldRedefinedError,
  FieldReferenceError,
  IllegalOperationError,
  ImmutableFieldError,
  MissingRequiredValueError,
  MixedDeclarationsError,
  MultipleInheritanceError,
  NoDefinedFieldsError,
  SerializationError,
  UndefinedSizeError,
  UnexpectedEOFError,
  UnexpectedValueError,
  UnknownFieldError,
  UnserializableValueError,
  ValidationError,
  ValueSizeError,
  VarIntOverflowError,
} from "./errors";
export type { CodecErrorCode } from "./errors";
