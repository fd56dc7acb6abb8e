import { determinate, type GeometryResult } from "../errors.js";
import { n, type Attributes } from "../format.js";
import {
  ImageConfigSchema,
  parseSchema,
  type ImageConfig,
  type ImageConfigInput,
} from "../types/config.js";
import type { BoundingBox, Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

/** A raster or vector image referenced by URL or path. */
export class Image extends Component {
  readonly tag = "image";
  readonly config: ImageConfig;

  constructor(config: ImageConfigInput, transforms?: readonly TransformOp[]) {
    const parsed = parseSchema(ImageConfigSchema, config, "image config");
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
    const { x, y, width, height, href, preserveAspectRatio } = this.config;
    return [
      ["x", n(x)],
      ["y", n(y)],
      ["width", n(width)],
      ["height", n(height)],
      ["href", href],
      ["preserveAspectRatio", preserveAspectRatio],
    ];
  }
}
