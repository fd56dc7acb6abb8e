import { createAppearance } from "../appearance.js";
import { determinate, type GeometryResult } from "../errors.js";
import { n, type Attributes } from "../format.js";
import {
  CircleConfigSchema,
  parseSchema,
  type AppearanceConfigInput,
  type CircleConfig,
  type CircleConfigInput,
} from "../types/config.js";
import type { BoundingBox, Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

export class Circle extends Component {
  readonly tag = "circle";
  readonly config: CircleConfig;

  constructor(
    config: CircleConfigInput = {},
    appearance?: AppearanceConfigInput,
    transforms?: readonly TransformOp[],
  ) {
    const parsed = parseSchema(CircleConfigSchema, config, "circle config");
    super(createAppearance(appearance), transforms);
    this.config = parsed;
  }

  boundingBox(): GeometryResult<BoundingBox> {
    const { cx, cy, r } = this.config;
    return determinate({ minX: cx - r, minY: cy - r, maxX: cx + r, maxY: cy + r });
  }

  centralPoint(): GeometryResult<Point> {
    return determinate({ x: this.config.cx, y: this.config.cy });
  }

  area(): number {
    return Math.PI * this.config.r ** 2;
  }

  circumference(): number {
    return 2 * Math.PI * this.config.r;
  }

  protected geometryAttributes(): Attributes {
    return [
      ["cx", n(this.config.cx)],
      ["cy", n(this.config.cy)],
      ["r", n(this.config.r)],
    ];
  }
}
