import { encodeValue, isPresent, readValue } from "./codec";
import { CodecError, MissingRequiredValueError, SerializationError, UndefinedSizeError, UnexpectedEOFError } from "./errors";
import type { Field } from "./fields";
import type { SourceCursor } from "./io";
import { withScope, type CodecState } from "./options";
import type { RecordSchema } from "./record";
import { isDefault, isNotPresent, isUndefined, NOT_PRESENT, UNDEFINED } from "./sentinels";
import type { ByteSink, PartialOptions } from "./types";
import { runFieldValidators } from "./validation";

export interface LoadPlan {
  /** Number of leading fields to read. */
  limit: number;
  /** Stop quietly, rewinding the cut-off field, when input runs out. */
  tolerateEof: boolean;
}

export interface WritePlan {
  limit: number;
  /** Stop at the first field without a value instead of failing. */
  stopAtMissing: boolean;
}

/** Number of leading fields selected by `lastField` or `count`; null when neither is set. */
export function fieldLimit(schema: RecordSchema, options: PartialOptions): number | null {
  if (options.lastField !== undefined) return schema.field(options.lastField).index + 1;
  if (options.count !== undefined) return Math.min(options.count, schema.fields.length);
  return null;
}

export function loadValues(schema: RecordSchema, cursor: SourceCursor, state: CodecState, plan: LoadPlan): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  const scoped = withScope(state, { values, parent: state.scope });

  for (const field of schema.fields.slice(0, plan.limit)) {
    const start = cursor.position;
    const checkpoint = plan.tolerateEof ? cursor.checkpoint() : null;
    let value: unknown;
    try {
      value = readValue(field, cursor, scoped, field.name);
    } catch (error) {
      if (checkpoint) {
        cursor.restore(checkpoint);
        if (error instanceof UnexpectedEOFError) break;
      }
      if (error instanceof CodecError) error.locate({ record: schema.name });
      throw error;
    }
    if (checkpoint) cursor.release(checkpoint);

    values[field.name] = value;
    validateField(schema, field, value, scoped);
    state.logger.debug("Loaded field", {
      record: schema.name,
      field: field.name,
      offset: start,
      size: cursor.position - start,
    });
  }
  return values;
}

export interface ResolveOptions {
  /** Leave values that cannot be resolved as UNDEFINED instead of failing; skips presence. */
  lenient: boolean;
  /** Fields at or past this index are resolved leniently and never presence-checked. */
  limit?: number;
}

/**
 * Two-pass dump resolution: stored values and defaults first, then computed
 * fields in declared order with every other value visible, then presence.
 */
export function resolveDumpValues(
  schema: RecordSchema,
  stored: (name: string) => unknown,
  state: CodecState,
  options: ResolveOptions,
): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  const scoped = withScope(state, { values, parent: state.scope });
  const derived: Field[] = [];
  const limit = options.limit ?? schema.fields.length;

  for (const field of schema.fields) {
    const value = stored(field.name);
    if (!isUndefined(value) && !isNotPresent(value) && !isDefault(value)) {
      values[field.name] = value;
    } else if (field.computed) {
      values[field.name] = UNDEFINED;
      derived.push(field);
    } else {
      values[field.name] = naturalDefault(field);
    }
  }

  for (const field of derived) {
    const { computed } = field;
    if (!computed) continue;
    try {
      const produced = computed.produce(values, state.context);
      values[field.name] = produced === undefined ? naturalDefault(field) : produced;
    } catch (error) {
      if ((options.lenient || field.index >= limit) && (error instanceof SerializationError || error instanceof UndefinedSizeError)) {
        state.logger.debug("Skipped unresolvable computed field", { record: schema.name, field: field.name });
        values[field.name] = naturalDefault(field);
        continue;
      }
      if (error instanceof CodecError) error.locate({ field: field.name, record: schema.name });
      throw error;
    }
  }

  if (!options.lenient) {
    for (const field of schema.fields.slice(0, limit)) {
      if (field.present !== undefined && !isPresent(field, scoped, field.name)) {
        values[field.name] = NOT_PRESENT;
      }
    }
  }
  return values;
}

export function writeValues(
  schema: RecordSchema,
  values: Record<string, unknown>,
  sink: ByteSink,
  state: CodecState,
  plan: WritePlan,
): number {
  const scoped = withScope(state, { values, parent: state.scope });
  let written = 0;

  for (const field of schema.fields.slice(0, plan.limit)) {
    const value = values[field.name];
    if (isNotPresent(value)) continue;
    if (isUndefined(value)) {
      if (plan.stopAtMissing) break;
      throw new MissingRequiredValueError(`Missing value for required field '${field.name}' of record '${schema.name}'`, {
        field: field.name,
        record: schema.name,
      });
    }
    validateField(schema, field, value, scoped);
    let bytes: Uint8Array;
    try {
      bytes = encodeValue(field, value, scoped, field.name);
    } catch (error) {
      if (error instanceof CodecError) error.locate({ record: schema.name });
      throw error;
    }
    written += sink.write(bytes);
    state.logger.debug("Dumped field", { record: schema.name, field: field.name, size: bytes.length });
  }
  return written;
}

function validateField(schema: RecordSchema, field: Field, value: unknown, state: CodecState): void {
  if (isNotPresent(value)) return;
  const registered = schema.fieldValidators.get(field.name) ?? [];
  if (field.validators.length === 0 && registered.length === 0) return;
  runFieldValidators([...field.validators, ...registered], field, value, state.scope.values, state.context, {
    field: field.name,
    record: schema.name,
  });
}

function naturalDefault(field: Field): unknown {
  if (field.factory) return field.factory();
  if (field.default !== undefined) return field.default;
  if (field.const !== undefined) return field.const;
  return UNDEFINED;
}
