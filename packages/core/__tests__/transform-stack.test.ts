import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/errors.js";
import { applyMatrix } from "../src/transform/matrix.js";
import { TransformStack } from "../src/transform/transform-stack.js";

describe("TransformStack", () => {
  it("serializes an empty stack to no attribute", () => {
    const stack = new TransformStack();
    expect(stack.hasTransform()).toBe(false);
    expect(stack.serialize()).toBeUndefined();
  });

  it("serializes operations in append order", () => {
    const stack = new TransformStack();
    stack.translate(5, 5);
    stack.scale(2);
    expect(stack.hasTransform()).toBe(true);
    expect(stack.serialize()).toBe("translate(5,5) scale(2)");
  });

  it("never reorders operations", () => {
    const stack = new TransformStack();
    stack.scale(2);
    stack.translate(5, 5);
    expect(stack.serialize()).toBe("scale(2) translate(5,5)");
  });

  it("serializes each operation kind", () => {
    const stack = new TransformStack();
    stack.scale(2, 3);
    stack.rotate(45);
    stack.rotate(30, { x: 10, y: 20 });
    expect(stack.serialize()).toBe("scale(2,3) rotate(45) rotate(30,10,20)");
  });

  it("prints numbers in short form", () => {
    const stack = new TransformStack();
    stack.translate(0.1 + 0.2, 1 / 3);
    expect(stack.serialize()).toBe("translate(0.3,0.333333)");
  });

  it("keeps tiny non-zero factors non-zero", () => {
    const stack = new TransformStack();
    stack.scale(1e-7);
    stack.translate(-2.5e-8, 0);
    expect(stack.serialize()).toBe("scale(1e-7) translate(-2.5e-8,0)");
  });

  it("accepts an initial operation list without sharing it", () => {
    const ops = [{ kind: "translate" as const, dx: 1, dy: 2 }];
    const stack = new TransformStack(ops);
    stack.scale(3);
    expect(ops).toHaveLength(1);
    expect(stack.operations).toEqual([
      { kind: "translate", dx: 1, dy: 2 },
      { kind: "scale", sx: 3, sy: 3 },
    ]);
  });

  it("rejects non-finite arguments", () => {
    const stack = new TransformStack();
    expect(() => stack.translate(Number.NaN, 0)).toThrow(ConfigError);
    expect(() => stack.scale(Number.POSITIVE_INFINITY)).toThrow(ConfigError);
    expect(() => stack.rotate(10, { x: 0, y: Number.NaN })).toThrow(ConfigError);
    expect(stack.hasTransform()).toBe(false);
  });

  describe("composition order", () => {
    it("applies the last appended operation to local points first", () => {
      const stack = new TransformStack();
      stack.translate(5, 5);
      stack.scale(2);
      expect(applyMatrix(stack.toMatrix(), { x: 1, y: 1 })).toEqual({ x: 7, y: 7 });
    });

    it("gives a different result when the order is reversed", () => {
      const stack = new TransformStack();
      stack.scale(2);
      stack.translate(5, 5);
      expect(applyMatrix(stack.toMatrix(), { x: 1, y: 1 })).toEqual({ x: 12, y: 12 });
    });

    it("rotates about a pivot", () => {
      const stack = new TransformStack();
      stack.rotate(90, { x: 1, y: 1 });
      const p = applyMatrix(stack.toMatrix(), { x: 2, y: 1 });
      expect(p.x).toBeCloseTo(1, 10);
      expect(p.y).toBeCloseTo(2, 10);
    });

    it("composes to the identity when empty", () => {
      expect(new TransformStack().toMatrix()).toEqual({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 });
    });
  });
});
