import { determinate, type GeometryResult } from "../errors.js";
import { n, type Attributes } from "../format.js";
import {
  NestedSvgConfigSchema,
  parseSchema,
  type NestedSvgConfig,
  type NestedSvgConfigInput,
} from "../types/config.js";
import type { BoundingBox, Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

/**
 * A nested <svg> viewport wrapping raw markup. The inner coordinate space is
 * 0 0 width height. Content is emitted verbatim.
 */
export class NestedSvg extends Component {
  readonly tag = "svg";
  readonly config: NestedSvgConfig;

  constructor(config: NestedSvgConfigInput, transforms?: readonly TransformOp[]) {
    const parsed = parseSchema(NestedSvgConfigSchema, config, "nested svg config");
    super(undefined, transforms);
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

  protected geometryAttributes(): Attributes {
    const { x, y, width, height } = this.config;
    return [
      ["x", n(x)],
      ["y", n(y)],
      ["width", n(width)],
      ["height", n(height)],
      ["viewBox", `0 0 ${n(width)} ${n(height)}`],
    ];
  }

  protected content(): string {
    return this.config.content;
  }
}
