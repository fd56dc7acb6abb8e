import { createAppearance } from "../appearance.js";
import { ConfigError, determinate, type GeometryResult } from "../errors.js";
import { n, type Attributes } from "../format.js";
import {
  PointTupleSchema,
  PolylineConfigSchema,
  parseSchema,
  type AppearanceConfigInput,
  type PointTuple,
  type PolylineConfigInput,
} from "../types/config.js";
import { boxOfPoints, distance, type BoundingBox, type Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

/**
 * Open sequence of straight segments. The point list is the only mutable
 * geometry in the model and never becomes empty.
 */
export class Polyline extends Component {
  readonly tag = "polyline";
  private readonly pts: PointTuple[];

  constructor(
    config: PolylineConfigInput,
    appearance?: AppearanceConfigInput,
    transforms?: readonly TransformOp[],
  ) {
    const parsed = parseSchema(PolylineConfigSchema, config, "polyline config");
    super(createAppearance(appearance), transforms);
    this.pts = parsed.points.map(([x, y]): PointTuple => [x, y]);
  }

  get config(): { readonly points: ReadonlyArray<Readonly<PointTuple>> } {
    return { points: this.pts };
  }

  get points(): Point[] {
    return this.pts.map(([x, y]) => ({ x, y }));
  }

  boundingBox(): GeometryResult<BoundingBox> {
    return determinate(boxOfPoints(this.points));
  }

  /**
   * Arithmetic mean of the vertices. This approximates the center and is not
   * the centroid of the enclosed polygon.
   */
  centralPoint(): GeometryResult<Point> {
    let sumX = 0;
    let sumY = 0;
    for (const [x, y] of this.pts) {
      sumX += x;
      sumY += y;
    }
    return determinate({ x: sumX / this.pts.length, y: sumY / this.pts.length });
  }

  addPoint(x: number, y: number): this {
    const [px, py] = parseSchema(PointTupleSchema, [x, y], "polyline point");
    this.pts.push([px, py]);
    return this;
  }

  addPoints(points: readonly PointTuple[]): this {
    const parsed = parseSchema(PointTupleSchema.array(), points, "polyline points");
    for (const [x, y] of parsed) {
      this.pts.push([x, y]);
    }
    return this;
  }

  removePoint(index: number): this {
    if (!Number.isInteger(index) || index < 0 || index >= this.pts.length) {
      throw new ConfigError(`Point index ${index} is out of range (0..${this.pts.length - 1})`);
    }
    if (this.pts.length === 1) {
      throw new ConfigError("Polyline must have at least one point");
    }
    this.pts.splice(index, 1);
    return this;
  }

  pointCount(): number {
    return this.pts.length;
  }

  segmentLengths(): number[] {
    const points = this.points;
    const lengths: number[] = [];
    for (let i = 0; i < points.length - 1; i++) {
      lengths.push(distance(points[i], points[i + 1]));
    }
    return lengths;
  }

  totalLength(): number {
    return this.segmentLengths().reduce((sum, len) => sum + len, 0);
  }

  protected geometryAttributes(): Attributes {
    return [["points", this.pts.map(([x, y]) => `${n(x)},${n(y)}`).join(" ")]];
  }
}
