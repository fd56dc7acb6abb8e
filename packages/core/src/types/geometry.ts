// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned box given by its extreme coordinates. */
export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Coordinate space of a document: origin plus extent. */
export interface ViewBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function boxSize(box: BoundingBox): Size {
  return { width: box.maxX - box.minX, height: box.maxY - box.minY };
}

export function boxCenter(box: BoundingBox): Point {
  return { x: (box.minX + box.maxX) / 2, y: (box.minY + box.maxY) / 2 };
}

/** Smallest box containing every point. Callers guarantee at least one point. */
export function boxOfPoints(points: readonly Point[]): BoundingBox {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return { minX, minY, maxX, maxY };
}

/** True when the two boxes share any area or edge. */
export function boxesIntersect(a: BoundingBox, b: BoundingBox): boolean {
  return a.minX <= b.maxX && b.minX <= a.maxX && a.minY <= b.maxY && b.minY <= a.maxY;
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
