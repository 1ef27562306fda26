import type { ZodTypeAny } from "zod";
import { ValidationError } from "./errors";
import type { FieldInfo, FieldValidator } from "./fields";
import type { RecordInstance } from "./record";
import type { FieldValues } from "./types";

/** Returns `false` or throws ValidationError to reject a record. */
export type RecordValidator = (record: RecordInstance, context: unknown) => boolean | void;

export interface ValidationLocation {
  field: string;
  record?: string;
}

export function runFieldValidators(
  validators: readonly FieldValidator[],
  field: FieldInfo,
  value: unknown,
  values: FieldValues,
  context: unknown,
  location: ValidationLocation,
): void {
  for (const validator of validators) {
    let accepted: boolean | void;
    try {
      accepted = validator(value, field, values, context);
    } catch (error) {
      if (error instanceof ValidationError) error.locate(location);
      throw error;
    }
    if (accepted === false) {
      const where = location.record ? ` in record '${location.record}'` : "";
      throw new ValidationError(`Validation failed for field '${location.field}'${where}`, { ...location, value });
    }
  }
}

export function runRecordValidators(validators: readonly RecordValidator[], record: RecordInstance, context: unknown): void {
  const name = record.schema.name;
  for (const validator of validators) {
    let accepted: boolean | void;
    try {
      accepted = validator(record, context);
    } catch (error) {
      if (error instanceof ValidationError) error.locate({ record: name });
      throw error;
    }
    if (accepted === false) {
      throw new ValidationError(`Validation failed for record '${name}'`, { record: name });
    }
  }
}

function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

/** Field validator backed by a zod schema. */
export function zodValidator(schema: ZodTypeAny): FieldValidator {
  return (value, field) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(`Invalid value for field '${field.name}': ${formatIssues(result.error.issues)}`, {
        field: field.name,
        value,
        issues: result.error.issues,
      });
    }
    return true;
  };
}

/** Record validator that checks the record's flattened values against a zod schema. */
export function zodRecordValidator(schema: ZodTypeAny): RecordValidator {
  return (record) => {
    const result = schema.safeParse(record.toDict());
    if (!result.success) {
      throw new ValidationError(`Invalid record '${record.schema.name}': ${formatIssues(result.error.issues)}`, {
        record: record.schema.name,
        issues: result.error.issues,
      });
    }
    return true;
  };
}
