import { ConfigError } from "../errors.js";
import { n } from "../format.js";
import type { Point } from "../types/geometry.js";
import {
  identityMatrix,
  multiplyMatrices,
  rotationMatrix,
  scalingMatrix,
  translationMatrix,
  type Matrix,
} from "./matrix.js";

export type TransformOp =
  | { kind: "translate"; dx: number; dy: number }
  | { kind: "scale"; sx: number; sy: number }
  | { kind: "rotate"; angle: number; pivot?: Point };

/**
 * Ordered list of affine operations owned by one component.
 *
 * Composition follows SVG transform lists: the stack `[op1, op2, ..., opN]`
 * composes to `M1 · M2 · ... · MN`. Every operation acts inside the coordinate
 * system established by the ones before it, so on a local point the last
 * appended operation acts first. `translate(5,5) scale(2)` sends (1,1) to (7,7).
 */
export class TransformStack {
  private readonly ops: TransformOp[] = [];

  constructor(initial: readonly TransformOp[] = []) {
    for (const op of initial) {
      this.push(op);
    }
  }

  get operations(): readonly TransformOp[] {
    return this.ops;
  }

  push(op: TransformOp): void {
    switch (op.kind) {
      case "translate":
        assertFinite("translate", [op.dx, op.dy]);
        this.ops.push({ kind: "translate", dx: op.dx, dy: op.dy });
        break;
      case "scale":
        assertFinite("scale", [op.sx, op.sy]);
        this.ops.push({ kind: "scale", sx: op.sx, sy: op.sy });
        break;
      case "rotate":
        assertFinite("rotate", op.pivot ? [op.angle, op.pivot.x, op.pivot.y] : [op.angle]);
        this.ops.push(
          op.pivot
            ? { kind: "rotate", angle: op.angle, pivot: { x: op.pivot.x, y: op.pivot.y } }
            : { kind: "rotate", angle: op.angle },
        );
        break;
    }
  }

  translate(dx: number, dy: number): void {
    this.push({ kind: "translate", dx, dy });
  }

  scale(sx: number, sy: number = sx): void {
    this.push({ kind: "scale", sx, sy });
  }

  rotate(angle: number, pivot?: Point): void {
    this.push(pivot ? { kind: "rotate", angle, pivot } : { kind: "rotate", angle });
  }

  hasTransform(): boolean {
    return this.ops.length > 0;
  }

  /** Transform attribute value, or undefined when the stack is empty. */
  serialize(): string | undefined {
    if (this.ops.length === 0) return undefined;
    return this.ops.map(serializeOp).join(" ");
  }

  toMatrix(): Matrix {
    return this.ops.reduce((acc, op) => multiplyMatrices(acc, opMatrix(op)), identityMatrix());
  }
}

function serializeOp(op: TransformOp): string {
  switch (op.kind) {
    case "translate":
      return `translate(${n(op.dx)},${n(op.dy)})`;
    case "scale":
      return op.sx === op.sy ? `scale(${n(op.sx)})` : `scale(${n(op.sx)},${n(op.sy)})`;
    case "rotate":
      return op.pivot
        ? `rotate(${n(op.angle)},${n(op.pivot.x)},${n(op.pivot.y)})`
        : `rotate(${n(op.angle)})`;
  }
}

function opMatrix(op: TransformOp): Matrix {
  switch (op.kind) {
    case "translate":
      return translationMatrix(op.dx, op.dy);
    case "scale":
      return scalingMatrix(op.sx, op.sy);
    case "rotate":
      return rotationMatrix(op.angle, op.pivot);
  }
}

function assertFinite(name: string, values: number[]): void {
  if (values.some((v) => !Number.isFinite(v))) {
    throw new ConfigError(`Invalid ${name} arguments: ${values.join(", ")}`);
  }
}
