import { expectedSize, fixedSizeOf, readValue, validateValue } from "./codec";
import { fieldLimit, loadValues, resolveDumpValues, writeValues } from "./engine";
import {
  ExtraneousDataError,
  IllegalOperationError,
  ImmutableFieldError,
  MissingRequiredValueError,
  UndefinedSizeError,
  UnknownFieldError,
  UnserializableValueError,
} from "./errors";
import type { Field, FieldValidator } from "./fields";
import { MemorySink, SourceCursor } from "./io";
import { createState, resolveOptions, withScope, type CodecState } from "./options";
import { isNotPresent, isSentinel, isUndefined, UNDEFINED } from "./sentinels";
import type { ByteSink, ByteSource, DumpOptions, LoadOptions, PartialDumpOptions, PartialLoadOptions } from "./types";
import { runRecordValidators, type RecordValidator } from "./validation";
import { describeValue, isPlainRecord, valuesEqual } from "./values";

export interface SchemaParts {
  name: string;
  fields: readonly Field[];
  fieldValidators: ReadonlyMap<string, readonly FieldValidator[]>;
  recordValidators: readonly RecordValidator[];
  base?: RecordSchema;
}

export class RecordSchema {
  readonly kind: "record" = "record";
  readonly name: string;
  readonly fields: readonly Field[];
  readonly fieldValidators: ReadonlyMap<string, readonly FieldValidator[]>;
  readonly recordValidators: readonly RecordValidator[];
  readonly base?: RecordSchema;
  /** Serialized size when it never depends on values; null otherwise. */
  readonly fixedSize: number | null;
  private readonly byName: ReadonlyMap<string, Field>;

  constructor(parts: SchemaParts) {
    this.name = parts.name;
    this.fields = Object.freeze([...parts.fields]);
    this.fieldValidators = parts.fieldValidators;
    this.recordValidators = Object.freeze([...parts.recordValidators]);
    this.base = parts.base;
    this.byName = new Map(this.fields.map((field) => [field.name, field]));
    this.fixedSize = fixedRecordSize(this.fields);
    Object.freeze(this);
  }

  field(name: string): Field {
    const field = this.byName.get(name);
    if (!field) {
      throw new UnknownFieldError(`Record '${this.name}' has no field named '${name}'`, { record: this.name, field: name });
    }
    return field;
  }

  hasField(name: string): boolean {
    return this.byName.has(name);
  }

  create(values: Readonly<Record<string, unknown>> = {}): RecordInstance {
    return new RecordInstance(this, values);
  }

  /** Loads one record from exactly `data`; trailing bytes fail unless `exact` is false. */
  fromBytes(data: Uint8Array, options?: LoadOptions): RecordInstance {
    const resolved = resolveOptions(options, "fromBytes");
    const cursor = SourceCursor.from(data);
    const record = this.loadRecord(cursor, createState(resolved));
    if ((resolved.exact ?? true) && !cursor.atEnd()) {
      throw new ExtraneousDataError(`Found extra bytes after record '${this.name}' at offset ${cursor.position}`, {
        record: this.name,
        offset: cursor.position,
      });
    }
    return record;
  }

  fromStream(source: ByteSource, options?: LoadOptions): RecordInstance {
    const resolved = resolveOptions(options, "fromStream");
    const cursor = SourceCursor.from(source);
    const record = this.loadRecord(cursor, createState(resolved));
    if (resolved.exact && !cursor.atEnd()) {
      throw new ExtraneousDataError(`Found extra bytes after record '${this.name}' at offset ${cursor.position}`, {
        record: this.name,
        offset: cursor.position,
      });
    }
    cursor.settle(resolved.logger);
    return record;
  }

  /**
   * Loads a leading subset of fields. Without `lastField` or `count`, loads
   * every field the source holds completely. Record validators do not run.
   */
  partialLoad(source: ByteSource | Uint8Array, options?: PartialLoadOptions): RecordInstance {
    const resolved = resolveOptions(options, "partialLoad");
    const limit = fieldLimit(this, resolved);
    const cursor = SourceCursor.from(source);
    const values = loadValues(this, cursor, createState(resolved), {
      limit: limit ?? this.fields.length,
      tolerateEof: limit === null,
    });
    cursor.settle(resolved.logger);
    return this.finishLoad(values);
  }

  /** Reads a single field and puts the source back where it was. */
  getField(source: ByteSource, name: string, options?: LoadOptions): unknown {
    const field = this.field(name);
    const tell = source.tell?.bind(source);
    const seek = source.seek?.bind(source);
    if (!tell || !seek) {
      throw new IllegalOperationError(`Reading field '${name}' on its own needs a seekable source`, { field: name });
    }
    const resolved = resolveOptions(options, "getField");
    const state = createState(resolved);
    const start = tell();
    const cursor = new SourceCursor(source);
    try {
      if (field.offset !== null && fixedFieldSize(field) !== null) {
        cursor.readExact(field.offset, name);
        const value = readValue(field, cursor, state, name);
        validateValue(field, value, state, name);
        return value;
      }
      return loadValues(this, cursor, state, { limit: field.index + 1, tolerateEof: false })[name];
    } finally {
      seek(start);
    }
  }

  getSize(): number {
    if (this.fixedSize === null) {
      const unsized = this.fields.find((field) => field.present !== undefined || fixedFieldSize(field) === null);
      throw new UndefinedSizeError(`Size of record '${this.name}' depends on its values`, {
        record: this.name,
        field: unsized?.name,
      });
    }
    return this.fixedSize;
  }

  /** @internal Loads this record as a field of an enclosing record. */
  readNested(cursor: SourceCursor, state: CodecState): RecordInstance {
    return this.loadRecord(cursor, state);
  }

  /** @internal Encodes a record instance or plain object as a field of an enclosing record. */
  encodeNested(value: unknown, state: CodecState): Uint8Array {
    const record = this.coerce(value);
    const sink = new MemorySink();
    dumpRecord(record, sink, state);
    return sink.getBytes();
  }

  coerce(value: unknown): RecordInstance {
    if (value instanceof RecordInstance) {
      if (value.schema !== this) {
        throw new UnserializableValueError(`Expected a '${this.name}' record, got a '${value.schema.name}' record`, {
          record: this.name,
        });
      }
      return value;
    }
    if (isPlainRecord(value)) return this.create(value);
    throw new UnserializableValueError(`Expected a '${this.name}' record, got ${describeValue(value)}`, { record: this.name });
  }

  private loadRecord(cursor: SourceCursor, state: CodecState): RecordInstance {
    const start = cursor.position;
    const values = loadValues(this, cursor, state, { limit: this.fields.length, tolerateEof: false });
    const record = new RecordInstance(this, values);
    runRecordValidators(this.recordValidators, record, state.context);
    for (const field of this.fields) {
      if (field.discard) record.delete(field.name);
    }
    state.logger.debug("Loaded record", { record: this.name, offset: start, size: cursor.position - start });
    return record;
  }

  private finishLoad(values: Record<string, unknown>): RecordInstance {
    const record = new RecordInstance(this, values);
    for (const field of this.fields) {
      if (field.discard) record.delete(field.name);
    }
    return record;
  }
}

export interface ToDictOptions {
  keepDiscarded?: boolean;
  context?: unknown;
}

export class RecordInstance {
  private readonly slots = new Map<string, unknown>();

  constructor(
    readonly schema: RecordSchema,
    values: Readonly<Record<string, unknown>> = {},
  ) {
    for (const [name, value] of Object.entries(values)) {
      schema.field(name);
      if (!isUndefined(value)) this.slots.set(name, value);
    }
  }

  /** Stored value, or UNDEFINED when the slot was never assigned. */
  get(name: string): unknown {
    this.schema.field(name);
    return this.slots.has(name) ? this.slots.get(name) : UNDEFINED;
  }

  has(name: string): boolean {
    return this.slots.has(name);
  }

  set(name: string, value: unknown): this {
    const field = this.schema.field(name);
    if (field.const !== undefined || field.computed !== undefined) {
      throw new ImmutableFieldError(`Field '${name}' of record '${this.schema.name}' cannot be assigned`, {
        record: this.schema.name,
        field: name,
      });
    }
    if (isUndefined(value)) {
      this.slots.delete(name);
    } else {
      this.slots.set(name, value);
    }
    return this;
  }

  delete(name: string): this {
    this.schema.field(name);
    this.slots.delete(name);
    return this;
  }

  /** Names of assigned fields in declared order. */
  keys(): string[] {
    return this.schema.fields.filter((field) => this.slots.has(field.name)).map((field) => field.name);
  }

  storedValues(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const name of this.keys()) out[name] = this.slots.get(name);
    return out;
  }

  toBytes(options?: DumpOptions): Uint8Array {
    const sink = new MemorySink();
    this.toStream(sink, options);
    return sink.getBytes();
  }

  toStream(sink: ByteSink, options?: DumpOptions): number {
    const state = createState(resolveOptions(options, "toStream"));
    return dumpRecord(this, sink, state);
  }

  /**
   * Writes a leading subset of fields. Without `lastField` or `count`, stops
   * before the first field that has no value. Record validators do not run.
   */
  partialDump(sink: ByteSink, options?: PartialDumpOptions): number {
    const resolved = resolveOptions(options, "partialDump");
    const limit = fieldLimit(this.schema, resolved);
    const state = createState(resolved);
    const values = resolveDumpValues(this.schema, (name) => this.get(name), state, {
      lenient: limit === null,
      limit: limit ?? undefined,
    });
    return writeValues(this.schema, values, sink, state, {
      limit: limit ?? this.schema.fields.length,
      stopAtMissing: limit === null,
    });
  }

  validateContents(context?: unknown): void {
    runRecordValidators(this.schema.recordValidators, this, context);
  }

  /** Serialized size of this instance with computed and default values applied. */
  size(options?: DumpOptions): number {
    const state = createState(resolveOptions(options, "size"));
    const values = resolveDumpValues(this.schema, (name) => this.get(name), state, { lenient: false });
    const scoped = withScope(state, { values, parent: state.scope });
    let total = 0;
    for (const field of this.schema.fields) {
      const value = values[field.name];
      if (isNotPresent(value)) continue;
      if (isUndefined(value)) {
        throw new MissingRequiredValueError(`Missing value for required field '${field.name}' of record '${this.schema.name}'`, {
          field: field.name,
          record: this.schema.name,
        });
      }
      total += expectedSize(field, scoped, field.name);
    }
    return total;
  }

  /**
   * Plain nested mapping of the record's values. Values that cannot be
   * resolved are left out; only serialization errors are suppressed.
   */
  toDict(options: ToDictOptions = {}): Record<string, unknown> {
    const state = createState(resolveOptions({ context: options.context }, "toDict"));
    const values = resolveDumpValues(this.schema, (name) => this.get(name), state, { lenient: true });
    const out: Record<string, unknown> = {};
    for (const field of this.schema.fields) {
      if (field.discard && !options.keepDiscarded) continue;
      const value = values[field.name];
      if (isSentinel(value)) continue;
      out[field.name] = plainValue(value, options);
    }
    return out;
  }

  copy(): RecordInstance {
    const copied: Record<string, unknown> = {};
    for (const [name, value] of this.slots) copied[name] = cloneValue(value);
    return new RecordInstance(this.schema, copied);
  }

  equals(other: unknown): boolean {
    if (other instanceof RecordInstance) {
      return other.schema === this.schema && valuesEqual(this.storedValues(), other.storedValues());
    }
    return isPlainRecord(other) && valuesEqual(this.storedValues(), other);
  }
}

function dumpRecord(record: RecordInstance, sink: ByteSink, state: CodecState): number {
  const { schema } = record;
  runRecordValidators(schema.recordValidators, record, state.context);
  const values = resolveDumpValues(schema, (name) => record.get(name), state, { lenient: false });
  const written = writeValues(schema, values, sink, state, { limit: schema.fields.length, stopAtMissing: false });
  state.logger.debug("Dumped record", { record: schema.name, size: written });
  return written;
}

function fixedFieldSize(field: Field): number | null {
  return field.present !== undefined ? null : fixedSizeOf(field);
}

function fixedRecordSize(fields: readonly Field[]): number | null {
  let total = 0;
  for (const field of fields) {
    const size = fixedFieldSize(field);
    if (size === null) return null;
    total += size;
  }
  return total;
}

function plainValue(value: unknown, options: ToDictOptions): unknown {
  if (value instanceof RecordInstance) return value.toDict(options);
  if (Array.isArray(value)) return value.map((item) => plainValue(item, options));
  return value;
}

function cloneValue(value: unknown): unknown {
  if (value instanceof RecordInstance) return value.copy();
  if (value instanceof Uint8Array) return value.slice();
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return value.map(cloneValue);
  return value;
}
