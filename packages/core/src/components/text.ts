import { determinate, indeterminate, type GeometryResult } from "../errors.js";
import { escapeXml, n, type Attributes } from "../format.js";
import {
  TextConfigSchema,
  parseSchema,
  type TextConfig,
  type TextConfigInput,
} from "../types/config.js";
import type { BoundingBox, Point } from "../types/geometry.js";
import type { TransformOp } from "../transform/transform-stack.js";
import { Component } from "./component.js";

/**
 * A run of text anchored at (x, y). Its color is part of the geometry config,
 * so it carries no appearance. The rendered extent depends on font metrics
 * the builder does not have.
 */
export class Text extends Component {
  readonly tag = "text";
  readonly config: TextConfig;

  constructor(config: TextConfigInput = {}, transforms?: readonly TransformOp[]) {
    const parsed = parseSchema(TextConfigSchema, config, "text config");
    super(undefined, transforms);
    this.config = parsed;
  }

  boundingBox(): GeometryResult<BoundingBox> {
    return indeterminate("the extent of text depends on font metrics that are unknown at layout time");
  }

  /** Defined only when the anchor point is the visual center of the text. */
  centralPoint(): GeometryResult<Point> {
    const { x, y, textAnchor, dominantBaseline } = this.config;
    if (textAnchor === "middle" && dominantBaseline === "central") {
      return determinate({ x, y });
    }
    return indeterminate(
      `text anchored with text-anchor="${textAnchor}" and dominant-baseline="${dominantBaseline}" has no known center`,
    );
  }

  protected geometryAttributes(): Attributes {
    const { x, y, fontSize, fontFamily, color, textAnchor, dominantBaseline } = this.config;
    return [
      ["x", n(x)],
      ["y", n(y)],
      ["font-size", n(fontSize)],
      ["font-family", fontFamily],
      ["fill", color],
      ["text-anchor", textAnchor],
      ["dominant-baseline", dominantBaseline],
    ];
  }

  protected content(): string {
    return escapeXml(this.config.text);
  }
}
