import { boxOfPoints, type BoundingBox, type Point } from "../types/geometry.js";

/**
 * 2D affine matrix in SVG layout:
 *
 *   | a c e |
 *   | b d f |
 *   | 0 0 1 |
 */
export interface Matrix {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
}

export function identityMatrix(): Matrix {
  return { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };
}

export function translationMatrix(dx: number, dy: number): Matrix {
  return { a: 1, b: 0, c: 0, d: 1, e: dx, f: dy };
}

export function scalingMatrix(sx: number, sy: number = sx): Matrix {
  return { a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 };
}

/**
 * Rotation by `angle` degrees (clockwise on screen, since SVG's y axis points
 * down). With a pivot this equals translate(p) rotate(a) translate(-p).
 */
export function rotationMatrix(angle: number, pivot?: Point): Matrix {
  const rad = (angle * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const rotation: Matrix = { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
  if (!pivot) return rotation;
  return multiplyMatrices(
    multiplyMatrices(translationMatrix(pivot.x, pivot.y), rotation),
    translationMatrix(-pivot.x, -pivot.y),
  );
}

/** Product `left · right`: applied to a point, `right` acts first. */
export function multiplyMatrices(left: Matrix, right: Matrix): Matrix {
  return {
    a: left.a * right.a + left.c * right.b,
    b: left.b * right.a + left.d * right.b,
    c: left.a * right.c + left.c * right.d,
    d: left.b * right.c + left.d * right.d,
    e: left.a * right.e + left.c * right.f + left.e,
    f: left.b * right.e + left.d * right.f + left.f,
  };
}

export function applyMatrix(m: Matrix, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f,
  };
}

/** Axis-aligned box around the four transformed corners of `box`. */
export function transformBoundingBox(box: BoundingBox, m: Matrix): BoundingBox {
  return boxOfPoints([
    applyMatrix(m, { x: box.minX, y: box.minY }),
    applyMatrix(m, { x: box.maxX, y: box.minY }),
    applyMatrix(m, { x: box.maxX, y: box.maxY }),
    applyMatrix(m, { x: box.minX, y: box.maxY }),
  ]);
}
