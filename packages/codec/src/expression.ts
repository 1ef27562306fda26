import { FieldReferenceError } from "./errors";
import { isSentinel } from "./sentinels";
import type { FieldValues } from "./types";

export type BinaryOperator =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "mod"
  | "bit-and"
  | "bit-or"
  | "bit-xor"
  | "left-shift"
  | "right-shift"
  | "eq"
  | "ne";

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  "add",
  "sub",
  "mul",
  "div",
  "mod",
  "bit-and",
  "bit-or",
  "bit-xor",
  "left-shift",
  "right-shift",
  "eq",
  "ne",
];

export type UnaryOperator = "bit-not";

export interface LiteralExpression {
  type: "literal";
  value: bigint;
}

export interface FieldRefExpression {
  type: "field-ref";
  path: string[];
}

export interface BinaryExpression {
  type: "binary";
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression {
  type: "unary";
  op: UnaryOperator;
  operand: Expression;
}

export type Expression = LiteralExpression | FieldRefExpression | BinaryExpression | UnaryExpression;

export interface FieldScope {
  values: FieldValues;
  parent?: FieldScope;
}

/** Records expose their values through `get`; plain objects are read directly. */
interface ValueContainer {
  has(name: string): boolean;
  get(name: string): unknown;
}

export const expr = {
  literal: (value: number | bigint): LiteralExpression => ({ type: "literal", value: BigInt(value) }),
  ref: (...path: string[]): FieldRefExpression => ({ type: "field-ref", path }),
  binary: (op: BinaryOperator, left: Expression, right: Expression): BinaryExpression => ({ type: "binary", op, left, right }),
  not: (operand: Expression): UnaryExpression => ({ type: "unary", op: "bit-not", operand }),
};

export function isExpression(value: unknown): value is Expression {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  return value.type === "literal" || value.type === "field-ref" || value.type === "binary" || value.type === "unary";
}

export function evaluateExpression(expression: Expression, scope: FieldScope | undefined, context: string): bigint {
  switch (expression.type) {
    case "literal":
      return expression.value;
    case "field-ref":
      return toBigIntValue(resolveFieldPath(expression.path, scope, context), expression.path, context);
    case "binary":
      return applyBinaryOperator(
        expression.op,
        evaluateExpression(expression.left, scope, `${context} (left)`),
        evaluateExpression(expression.right, scope, `${context} (right)`),
        context,
      );
    case "unary":
      return applyUnaryOperator(expression.op, evaluateExpression(expression.operand, scope, `${context} (operand)`), context);
    default:
      expression satisfies never;
      throw new FieldReferenceError(`Unsupported expression encountered while evaluating ${context}`);
  }
}

/** Field paths referenced by an expression, outermost first. */
export function collectFieldRefs(expression: Expression): string[][] {
  switch (expression.type) {
    case "literal":
      return [];
    case "field-ref":
      return [expression.path];
    case "binary":
      return [...collectFieldRefs(expression.left), ...collectFieldRefs(expression.right)];
    case "unary":
      return collectFieldRefs(expression.operand);
    default:
      expression satisfies never;
      return [];
  }
}

export function resolveFieldPath(path: readonly string[], scope: FieldScope | undefined, context: string): unknown {
  if (path.length === 0) {
    throw new FieldReferenceError(`Invalid field-ref in ${context}: path cannot be empty`);
  }
  if (!scope) {
    throw new FieldReferenceError(`Unable to resolve field '${path.join(".")}' in ${context}`, { path });
  }

  const [head, ...tail] = path;

  if (head === "..") {
    if (!scope.parent) {
      throw new FieldReferenceError(`Field reference in ${context} attempted to access parent scope, but none exists`);
    }
    return resolveFieldPath(tail, scope.parent, context);
  }

  if (Object.hasOwn(scope.values, head)) {
    const value = scope.values[head];
    return tail.length === 0 ? value : resolveNestedValue(value, tail, context);
  }

  return resolveFieldPath(path, scope.parent, context);
}

function resolveNestedValue(value: unknown, path: readonly string[], context: string): unknown {
  const [head, ...tail] = path;
  let nested: unknown;
  if (isValueContainer(value)) {
    if (!value.has(head)) {
      throw new FieldReferenceError(`Record field '${head}' referenced in ${context} is not set`);
    }
    nested = value.get(head);
  } else if (typeof value === "object" && value !== null && !Array.isArray(value) && Object.hasOwn(value, head)) {
    nested = Reflect.get(value, head);
  } else {
    throw new FieldReferenceError(`Field reference '${path.join(".")}' in ${context} traversed through a non-record value`);
  }
  return tail.length === 0 ? nested : resolveNestedValue(nested, tail, context);
}

function isValueContainer(value: unknown): value is ValueContainer {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function" &&
    "has" in value &&
    typeof value.has === "function"
  );
}

function toBigIntValue(value: unknown, path: readonly string[], context: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  if (typeof value === "boolean") return value ? 1n : 0n;
  const shown = isSentinel(value) ? value.toString() : typeof value;
  throw new FieldReferenceError(`Expression in ${context} referenced '${path.join(".")}', which is not an integer (${shown})`, {
    path,
  });
}

function applyBinaryOperator(op: BinaryOperator, left: bigint, right: bigint, context: string): bigint {
  switch (op) {
    case "add":
      return left + right;
    case "sub":
      return left - right;
    case "mul":
      return left * right;
    case "div":
      if (right === 0n) {
        throw new FieldReferenceError(`Division by zero while evaluating expression for ${context}`);
      }
      return left / right;
    case "mod":
      if (right === 0n) {
        throw new FieldReferenceError(`Modulo by zero while evaluating expression for ${context}`);
      }
      return left % right;
    case "bit-and":
      return left & right;
    case "bit-or":
      return left | right;
    case "bit-xor":
      return left ^ right;
    case "left-shift":
      return left << right;
    case "right-shift":
      return left >> right;
    case "eq":
      return left === right ? 1n : 0n;
    case "ne":
      return left !== right ? 1n : 0n;
    default:
      op satisfies never;
      throw new FieldReferenceError(`Binary operator '${String(op)}' is not supported in ${context}`);
  }
}

function applyUnaryOperator(op: UnaryOperator, operand: bigint, context: string): bigint {
  switch (op) {
    case "bit-not":
      return ~operand;
    default:
      op satisfies never;
      throw new FieldReferenceError(`Unary operator '${String(op)}' is not supported in ${context}`);
  }
}
