export type CodecErrorCode =
  | "CONFIGURATION_ERROR"
  | "REFERENCE_ERROR"
  | "SERIALIZATION_ERROR"
  | "DESERIALIZATION_ERROR"
  | "VALIDATION_ERROR"
  | "ILLEGAL_OPERATION";

export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: CodecErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }

  /** Path of the field being processed when the error was raised, if known. */
  get field(): string | undefined {
    const field = this.details.field;
    return typeof field === "string" ? field : undefined;
  }

  get record(): string | undefined {
    const record = this.details.record;
    return typeof record === "string" ? record : undefined;
  }

  /** Fills in location details that were unknown where the error was raised. */
  locate(location: { field?: string; record?: string; offset?: number }): this {
    for (const [key, value] of Object.entries(location)) {
      if (value !== undefined && this.details[key] === undefined) {
        this.details[key] = value;
      }
    }
    return this;
  }
}

export class ConfigurationError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIGURATION_ERROR", message, details);
  }
}

export class FieldRedefinedError extends ConfigurationError {}

export class NoDefinedFieldsError extends ConfigurationError {}

export class MixedDeclarationsError extends ConfigurationError {}

export class MultipleInheritanceError extends ConfigurationError {}

export class UndefinedSizeError extends ConfigurationError {}

export class DocumentParseError extends ConfigurationError {}

export class FieldReferenceError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("REFERENCE_ERROR", message, details);
  }
}

export class SerializationError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("SERIALIZATION_ERROR", message, details);
  }
}

export class UnserializableValueError extends SerializationError {}

export class ValueSizeError extends UnserializableValueError {}

export class ArraySizeError extends UnserializableValueError {}

export class MissingRequiredValueError extends SerializationError {}

export class DeserializationError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DESERIALIZATION_ERROR", message, details);
  }
}

export class UnexpectedEOFError extends DeserializationError {}

export class UnexpectedValueError extends DeserializationError {}

export class ExtraneousDataError extends DeserializationError {}

export class VarIntOverflowError extends DeserializationError {}

export class ValidationError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
  }
}

export class IllegalOperationError extends CodecError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ILLEGAL_OPERATION", message, details);
  }
}

export class ImmutableFieldError extends IllegalOperationError {}

export class UnknownFieldError extends IllegalOperationError {}
