import { appearanceAttributes } from "../appearance.js";
import {
  ConfigError,
  IndeterminateGeometryError,
  determinate,
  type GeometryResult,
} from "../errors.js";
import { attrString, mergeAttributes, type Attributes } from "../format.js";
import type { AppearanceConfig } from "../types/config.js";
import { boxSize, type BoundingBox, type Point } from "../types/geometry.js";
import { transformBoundingBox, type Matrix } from "../transform/matrix.js";
import { TransformStack, type TransformOp } from "../transform/transform-stack.js";

// Relative slack when comparing extents against limits
const FIT_TOLERANCE = 1e-9;

/**
 * Contract shared by every drawable: geometry, optional appearance and an
 * owned transform stack. Subclasses supply the geometry-dependent parts
 * (bounding box, central point, geometry attributes); scale-to-fit and
 * serialization live here.
 */
export abstract class Component {
  readonly appearance: AppearanceConfig | undefined;
  private readonly stack: TransformStack;

  /** Element name emitted by toElement(). */
  abstract readonly tag: string;

  protected constructor(
    appearance: AppearanceConfig | undefined,
    transforms: readonly TransformOp[] = [],
  ) {
    this.appearance = appearance;
    this.stack = new TransformStack(transforms);
  }

  /** Local, untransformed bounding box. */
  abstract boundingBox(): GeometryResult<BoundingBox>;

  /** Local, untransformed representative center. */
  abstract centralPoint(): GeometryResult<Point>;

  protected abstract geometryAttributes(): Attributes;

  /** Inner content of the element; undefined for self-closing elements. */
  protected content(): string | undefined {
    return undefined;
  }

  // ---- Transform stack ----

  translate(dx: number, dy: number): this {
    this.stack.translate(dx, dy);
    return this;
  }

  scale(sx: number, sy: number = sx): this {
    this.stack.scale(sx, sy);
    return this;
  }

  rotate(angle: number, pivot?: Point): this {
    this.stack.rotate(angle, pivot);
    return this;
  }

  hasTransform(): boolean {
    return this.stack.hasTransform();
  }

  get transforms(): readonly TransformOp[] {
    return this.stack.operations;
  }

  transformString(): string | undefined {
    return this.stack.serialize();
  }

  transformMatrix(): Matrix {
    return this.stack.toMatrix();
  }

  /** Local bounding box carried through the transform stack. */
  transformedBoundingBox(): GeometryResult<BoundingBox> {
    const local = this.boundingBox();
    if (!local.ok) return local;
    return determinate(transformBoundingBox(local.value, this.stack.toMatrix()));
  }

  // ---- Scale-to-fit ----

  /**
   * Shrink uniformly so the component fits within maxWidth x maxHeight,
   * appending one scale() to the stack. Already-fitting and zero-extent
   * geometry is left alone. The extent is measured through the current stack,
   * so repeating the call with the same limits changes nothing.
   */
  restrictSize(maxWidth: number, maxHeight: number): this {
    if (!isLimit(maxWidth) || !isLimit(maxHeight)) {
      throw new ConfigError(
        `Invalid size limits ${maxWidth} x ${maxHeight}: expected non-negative finite numbers`,
      );
    }

    const box = this.transformedBoundingBox();
    if (!box.ok) {
      throw new IndeterminateGeometryError(`Cannot restrict size: ${box.error.message}`);
    }

    const { width, height } = boxSize(box.value);
    if (width === 0 && height === 0) return this;

    const widthScale = exceeds(width, maxWidth) ? maxWidth / width : 1;
    const heightScale = exceeds(height, maxHeight) ? maxHeight / height : 1;
    const factor = Math.min(widthScale, heightScale);

    if (factor < 1) {
      this.stack.scale(factor);
    }
    return this;
  }

  // ---- Serialization ----

  attributes(): Attributes {
    const transform = this.stack.serialize();
    return mergeAttributes(
      this.geometryAttributes(),
      this.appearance ? appearanceAttributes(this.appearance) : [],
      transform !== undefined ? [["transform", transform]] : [],
    );
  }

  toElement(): string {
    const attrs = attrString(this.attributes());
    const content = this.content();
    if (content === undefined) {
      return `<${this.tag}${attrs}/>`;
    }
    return `<${this.tag}${attrs}>${content}</${this.tag}>`;
  }
}

function isLimit(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function exceeds(current: number, max: number): boolean {
  return current - max > FIT_TOLERANCE * Math.max(1, max);
}
