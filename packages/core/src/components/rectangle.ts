import { createAppearance } from "../appearance.js";
import { determinate, type GeometryResult } from "../errors.js";
import { n, type Attributes } from "../format.js";
import {
  RectangleConfigSchema,
  parseSchema,
  type AppearanceConfigInput,
  type RectangleConfig,
  type RectangleConfigInput,
} from "../types/config.js";
import type { BoundingBox, Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

export class Rectangle extends Component {
  readonly tag = "rect";
  readonly config: RectangleConfig;

  constructor(
    config: RectangleConfigInput = {},
    appearance?: AppearanceConfigInput,
    transforms?: readonly TransformOp[],
  ) {
    const parsed = parseSchema(RectangleConfigSchema, config, "rectangle config");
    super(createAppearance(appearance), transforms);
    this.config = parsed;
  }

  boundingBox(): GeometryResult<BoundingBox> {
    const { x, y, width, height } = this.config;
    return determinate({ minX: x, minY: y, maxX: x + width, maxY: y + height });
  }

  centralPoint(): GeometryResult<Point> {
    const { x, y, width, height } = this.config;
    return determinate({ x: x + width / 2, y: y + height / 2 });
  }

  hasRoundedCorners(): boolean {
    return this.config.rx !== undefined || this.config.ry !== undefined;
  }

  protected geometryAttributes(): Attributes {
    const { x, y, width, height, rx, ry } = this.config;
    const attrs: Attributes = [
      ["x", n(x)],
      ["y", n(y)],
      ["width", n(width)],
      ["height", n(height)],
    ];
    if (rx !== undefined) attrs.push(["rx", n(rx)]);
    if (ry !== undefined) attrs.push(["ry", n(ry)]);
    return attrs;
  }
}
