import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  ColorSchema,
  ConfigError,
  n,
  parseSchema,
  type Component,
  type ViewBox,
} from "@shapecraft/core";

export interface CanvasOptions {
  width: number;
  height: number;
  /** Coordinate space; defaults to 0 0 width height. */
  viewBox?: ViewBox;
  /** Fill for a rect covering the view box; omitted when unset. */
  background?: string;
}

/**
 * Ordered collection of components wrapped in an <svg> envelope.
 * Insertion order is paint order: later components draw over earlier ones.
 * No DOM dependency.
 */
export class Canvas {
  readonly width: number;
  readonly height: number;
  readonly viewBox: ViewBox;
  readonly background: string | undefined;
  private readonly items: Component[] = [];

  constructor(options: CanvasOptions) {
    const { width, height } = options;
    if (!isExtent(width) || !isExtent(height)) {
      throw new ConfigError(`Invalid canvas size ${width} x ${height}: expected positive numbers`);
    }
    const viewBox = options.viewBox ?? { x: 0, y: 0, width, height };
    if (
      !Number.isFinite(viewBox.x) ||
      !Number.isFinite(viewBox.y) ||
      !isExtent(viewBox.width) ||
      !isExtent(viewBox.height)
    ) {
      throw new ConfigError("Invalid canvas viewBox: expected finite origin and positive size");
    }
    this.width = width;
    this.height = height;
    this.viewBox = { ...viewBox };
    this.background =
      options.background === undefined
        ? undefined
        : parseSchema(ColorSchema, options.background, "canvas background");
  }

  add(component: Component): this {
    this.items.push(component);
    return this;
  }

  get components(): readonly Component[] {
    return this.items;
  }

  render(): string {
    const { x, y, width, height } = this.viewBox;
    const parts: string[] = [];

    parts.push(
      `<svg xmlns="http://www.w3.org/2000/svg" width="${n(this.width)}" height="${n(this.height)}" viewBox="${n(x)} ${n(y)} ${n(width)} ${n(height)}">`,
    );

    if (this.background !== undefined) {
      parts.push(
        `<rect x="${n(x)}" y="${n(y)}" width="${n(width)}" height="${n(height)}" fill="${this.background}"/>`,
      );
    }

    for (const component of this.items) {
      parts.push(component.toElement());
    }

    parts.push("</svg>");
    return parts.join("\n");
  }

  /** Write the rendered document to `path`, creating parent directories. */
  save(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, this.render(), "utf-8");
  }
}

function isExtent(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
