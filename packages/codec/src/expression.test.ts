import { describe, expect, it } from "vitest";
import { defineRecord } from "./builder";
import { FieldReferenceError } from "./errors";
import { collectFieldRefs, evaluateExpression, expr, isExpression, resolveFieldPath } from "./expression";
import { f } from "./fields";
import { UNDEFINED } from "./sentinels";

describe("evaluateExpression", () => {
  it("combines literals and field references", () => {
    const total = expr.binary("add", expr.ref("a"), expr.literal(2));
    expect(evaluateExpression(total, { values: { a: 3 } }, "total")).toBe(5n);
    expect(evaluateExpression(expr.binary("mul", expr.ref("rows"), expr.ref("cols")), { values: { rows: 2, cols: 3n } }, "cells")).toBe(6n);
  });

  it("supports bitwise and comparison operators", () => {
    const scope = { values: { flags: 0b0110 } };
    expect(evaluateExpression(expr.binary("bit-and", expr.ref("flags"), expr.literal(4)), scope, "t")).toBe(4n);
    expect(evaluateExpression(expr.binary("right-shift", expr.ref("flags"), expr.literal(1)), scope, "t")).toBe(3n);
    expect(evaluateExpression(expr.binary("eq", expr.ref("flags"), expr.literal(6)), scope, "t")).toBe(1n);
    expect(evaluateExpression(expr.binary("ne", expr.ref("flags"), expr.literal(6)), scope, "t")).toBe(0n);
    expect(evaluateExpression(expr.not(expr.literal(0)), scope, "t")).toBe(-1n);
  });

  it("treats booleans as 1 and 0", () => {
    expect(evaluateExpression(expr.ref("on"), { values: { on: true } }, "t")).toBe(1n);
    expect(evaluateExpression(expr.ref("on"), { values: { on: false } }, "t")).toBe(0n);
  });

  it("rejects division by zero", () => {
    expect(() => evaluateExpression(expr.binary("div", expr.literal(1), expr.literal(0)), { values: {} }, "t")).toThrow(
      FieldReferenceError,
    );
  });

  it("rejects references to values that are not integers", () => {
    expect(() => evaluateExpression(expr.ref("name"), { values: { name: "x" } }, "t")).toThrow(
      "Expression in t referenced 'name', which is not an integer (string)",
    );
    expect(() => evaluateExpression(expr.ref("n"), { values: { n: UNDEFINED } }, "t")).toThrow("(<undefined>)");
  });
});

describe("resolveFieldPath", () => {
  const parent = { values: { size: 4 } };

  it("walks to the parent scope with '..'", () => {
    expect(resolveFieldPath(["..", "size"], { values: {}, parent }, "t")).toBe(4);
  });

  it("falls back to enclosing scopes for names not found locally", () => {
    expect(resolveFieldPath(["size"], { values: { other: 1 }, parent }, "t")).toBe(4);
  });

  it("fails for unknown names and missing parents", () => {
    expect(() => resolveFieldPath(["missing"], { values: {} }, "t")).toThrow(FieldReferenceError);
    expect(() => resolveFieldPath(["..", "size"], { values: {} }, "t")).toThrow("attempted to access parent scope");
  });

  it("descends into records and plain objects", () => {
    const Point = defineRecord("Point", { x: f.uint8(), y: f.uint8() });
    const scope = { values: { origin: Point.create({ x: 5, y: 0 }), meta: { depth: 2 } } };
    expect(resolveFieldPath(["origin", "x"], scope, "t")).toBe(5);
    expect(resolveFieldPath(["meta", "depth"], scope, "t")).toBe(2);
    expect(() => resolveFieldPath(["origin", "z"], scope, "t")).toThrow("Record field 'z' referenced in t is not set");
  });
});

describe("expression helpers", () => {
  it("collects referenced paths", () => {
    const expression = expr.binary("sub", expr.ref("..", "len"), expr.not(expr.ref("pad")));
    expect(collectFieldRefs(expression)).toEqual([["..", "len"], ["pad"]]);
  });

  it("recognises expression objects", () => {
    expect(isExpression(expr.literal(1))).toBe(true);
    expect(isExpression({ type: "other" })).toBe(false);
    expect(isExpression("length")).toBe(false);
  });
});
