import { fixedSizeOf } from "./codec";
import {
  ConfigurationError,
  FieldRedefinedError,
  MixedDeclarationsError,
  MultipleInheritanceError,
  NoDefinedFieldsError,
} from "./errors";
import { collectFieldRefs, isExpression } from "./expression";
import {
  applyArgumentDefaults,
  bindField,
  type ArgumentDefaults,
  type ComputedValue,
  type Field,
  type FieldValidator,
} from "./fields";
import { RecordSchema } from "./record";
import type { FieldValues } from "./types";
import type { RecordValidator } from "./validation";

export interface RecordOptions {
  defaults?: ArgumentDefaults;
  extends?: RecordSchema;
  validators?: readonly RecordValidator[];
}

type Convention = "keyed" | "listed";

/**
 * Collects a record declaration. Fields are declared either all at once with
 * `fields({...})` or one by one with `field(name, def)`, never both.
 */
export class RecordBuilder {
  private readonly declared: { name: string; field: Field }[] = [];
  private convention: Convention | null = null;
  private base: RecordSchema | undefined;
  private readonly computeFns = new Map<string, ComputedValue>();
  private readonly fieldValidators: { names: readonly string[]; validator: FieldValidator }[] = [];
  private readonly recordValidators: RecordValidator[] = [];

  constructor(
    readonly name: string,
    private readonly defaults: ArgumentDefaults = {},
  ) {
    if (name.trim().length === 0) {
      throw new ConfigurationError("Record name must be a non-empty string");
    }
  }

  extends(base: RecordSchema): this {
    if (this.base) {
      throw new MultipleInheritanceError(`Record '${this.name}' already extends '${this.base.name}'; it cannot also extend '${base.name}'`, {
        record: this.name,
      });
    }
    this.base = base;
    return this;
  }

  field(name: string, field: Field): this {
    this.useConvention("listed");
    this.declare(name, field);
    return this;
  }

  fields(shape: Readonly<Record<string, Field>>): this {
    this.useConvention("keyed");
    for (const [name, field] of Object.entries(shape)) {
      this.declare(name, field);
    }
    return this;
  }

  computes(name: string, computed: ComputedValue): this;
  computes(name: string, produce: (values: FieldValues, context: unknown) => unknown, dependsOn?: readonly string[]): this;
  computes(
    name: string,
    computed: ComputedValue | ((values: FieldValues, context: unknown) => unknown),
    dependsOn: readonly string[] = [],
  ): this {
    if (this.computeFns.has(name)) {
      throw new ConfigurationError(`Field '${name}' of record '${this.name}' already has a compute function`, {
        record: this.name,
        field: name,
      });
    }
    this.computeFns.set(name, typeof computed === "function" ? { dependsOn, produce: computed } : computed);
    return this;
  }

  validates(names: string | readonly string[], validator: FieldValidator): this {
    this.fieldValidators.push({ names: typeof names === "string" ? [names] : [...names], validator });
    return this;
  }

  validatesRecord(validator: RecordValidator): this {
    this.recordValidators.push(validator);
    return this;
  }

  build(): RecordSchema {
    const inherited = this.base?.fields ?? [];
    const seen = new Set(inherited.map((field) => field.name));
    for (const { name } of this.declared) {
      if (seen.has(name)) {
        throw new FieldRedefinedError(`Field '${name}' is defined more than once in record '${this.name}'`, {
          record: this.name,
          field: name,
        });
      }
      seen.add(name);
    }
    if (seen.size === 0) {
      throw new NoDefinedFieldsError(`Record '${this.name}' does not define any fields`, { record: this.name });
    }

    const collected: Field[] = [
      ...inherited,
      ...this.declared.map(({ name, field }) => bindField(applyArgumentDefaults(field, this.defaults), name, -1, null)),
    ];
    const withComputes = collected.map((field) => this.attachCompute(field));
    for (const name of this.computeFns.keys()) {
      if (!seen.has(name)) {
        throw new ConfigurationError(`Compute function refers to unknown field '${name}' of record '${this.name}'`, {
          record: this.name,
          field: name,
        });
      }
    }

    let offset: number | null = 0;
    const fields = withComputes.map((field, index) => {
      const bound = bindField(field, field.name, index, offset);
      const size = field.present !== undefined ? null : fixedSizeOf(field);
      offset = offset !== null && size !== null ? offset + size : null;
      return bound;
    });

    checkDependencies(this.name, fields);
    const byName = new Map(fields.map((field) => [field.name, field]));
    const bound = fields.map((field) => (field.computed?.bind ? { ...field, computed: field.computed.bind(byName) } : field));

    return new RecordSchema({
      name: this.name,
      fields: bound,
      fieldValidators: this.collectFieldValidators(seen),
      recordValidators: [...(this.base?.recordValidators ?? []), ...this.recordValidators],
      base: this.base,
    });
  }

  private declare(name: string, field: Field): void {
    if (name.trim().length === 0) {
      throw new ConfigurationError(`Record '${this.name}' has a field without a name`, { record: this.name });
    }
    this.declared.push({ name, field });
  }

  private useConvention(convention: Convention): void {
    if (this.convention && this.convention !== convention) {
      throw new MixedDeclarationsError(`Record '${this.name}' mixes keyed and listed field declarations`, {
        record: this.name,
      });
    }
    this.convention = convention;
  }

  private attachCompute(field: Field): Field {
    const computed = this.computeFns.get(field.name);
    if (!computed) return field;
    if (field.const !== undefined) {
      throw new ConfigurationError(`Const field '${field.name}' of record '${this.name}' cannot be computed`, {
        record: this.name,
        field: field.name,
      });
    }
    if (field.computed) {
      throw new ConfigurationError(`Field '${field.name}' of record '${this.name}' already has a compute function`, {
        record: this.name,
        field: field.name,
      });
    }
    return { ...field, computed };
  }

  private collectFieldValidators(names: ReadonlySet<string>): Map<string, FieldValidator[]> {
    const byField = new Map<string, FieldValidator[]>();
    for (const [name, validators] of this.base?.fieldValidators ?? []) {
      byField.set(name, [...validators]);
    }
    for (const { names: targets, validator } of this.fieldValidators) {
      for (const name of targets) {
        if (!names.has(name)) {
          throw new ConfigurationError(`Validator refers to unknown field '${name}' of record '${this.name}'`, {
            record: this.name,
            field: name,
          });
        }
        const list = byField.get(name) ?? [];
        list.push(validator);
        byField.set(name, list);
      }
    }
    return byField;
  }
}

export function record(name: string, defaults?: ArgumentDefaults): RecordBuilder {
  return new RecordBuilder(name, defaults);
}

export function defineRecord(name: string, shape: Readonly<Record<string, Field>>, options: RecordOptions = {}): RecordSchema {
  const builder = new RecordBuilder(name, options.defaults);
  if (options.extends) builder.extends(options.extends);
  builder.fields(shape);
  for (const validator of options.validators ?? []) {
    builder.validatesRecord(validator);
  }
  return builder.build();
}

function referencedNames(policy: unknown): string[] {
  if (typeof policy === "string") return [policy];
  if (isExpression(policy)) {
    return collectFieldRefs(policy)
      .filter((path) => path[0] !== "..")
      .map((path) => path[0]);
  }
  return [];
}

function sizeReferences(field: Field): { names: string[]; what: string }[] {
  const refs: { names: string[]; what: string }[] = [];
  if (field.kind === "bytes" || field.kind === "string") refs.push({ names: referencedNames(field.size), what: "size" });
  if (field.kind === "array") {
    refs.push({ names: referencedNames(field.count), what: "count" });
    refs.push(...sizeReferences(field.element));
  }
  return refs;
}

/**
 * Every field must be loadable from the fields before it and dumpable from
 * values computed before it.
 */
function checkDependencies(recordName: string, fields: readonly Field[]): void {
  const byName = new Map(fields.map((field) => [field.name, field]));
  const fail = (message: string, field: string) => {
    throw new ConfigurationError(message, { record: recordName, field });
  };

  for (const field of fields) {
    for (const { names, what } of sizeReferences(field)) {
      for (const name of names) {
        const target = byName.get(name);
        if (!target) {
          fail(`Field '${field.name}' of record '${recordName}' takes its ${what} from unknown field '${name}'`, field.name);
        } else if (target.index >= field.index) {
          fail(`Field '${field.name}' of record '${recordName}' takes its ${what} from '${name}', which is not declared before it`, field.name);
        } else if (target.kind !== "integer" && target.kind !== "varint") {
          fail(`Field '${field.name}' of record '${recordName}' takes its ${what} from '${name}', which is not an integer field`, field.name);
        }
      }
    }

    for (const name of field.present !== undefined && isExpression(field.present) ? referencedNames(field.present) : []) {
      const target = byName.get(name);
      if (!target || target.index >= field.index) {
        fail(`Presence of '${field.name}' in record '${recordName}' depends on '${name}', which is not declared before it`, field.name);
      }
    }

    for (const name of field.computed?.dependsOn ?? []) {
      const target = byName.get(name);
      if (!target) {
        fail(`Computed field '${field.name}' of record '${recordName}' depends on unknown field '${name}'`, field.name);
      } else if (target === field) {
        fail(`Computed field '${field.name}' of record '${recordName}' depends on itself`, field.name);
      } else if (target.computed && target.index > field.index) {
        fail(
          `Computed field '${field.name}' of record '${recordName}' depends on computed field '${name}' declared after it; the two cannot be resolved in order`,
          field.name,
        );
      }
    }
  }
}
