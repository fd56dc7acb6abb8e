import { createAppearance } from "../appearance.js";
import { Circle } from "../components/circle.js";
import type { Component } from "../components/component.js";
import { Image } from "../components/image.js";
import { NestedSvg } from "../components/nested-svg.js";
import { Polyline } from "../components/polyline.js";
import { Rectangle } from "../components/rectangle.js";
import { Text } from "../components/text.js";
import { ConfigError } from "../errors.js";
import {
  CircleConfigSchema,
  ImageConfigSchema,
  NestedSvgConfigSchema,
  PolylineConfigSchema,
  RectangleConfigSchema,
  TextConfigSchema,
  parseSchema,
} from "../types/config.js";
import type { SceneComponentConfig, SceneConfig, TransformEntry } from "../types/scene.js";
import type { TransformOp } from "../transform/transform-stack.js";

export function toTransformOp(entry: TransformEntry): TransformOp {
  if ("translate" in entry) {
    const [dx, dy] = entry.translate;
    return { kind: "translate", dx, dy };
  }
  if ("scale" in entry) {
    const [sx, sy] = typeof entry.scale === "number" ? [entry.scale, entry.scale] : entry.scale;
    return { kind: "scale", sx, sy };
  }
  if (typeof entry.rotate === "number") {
    return { kind: "rotate", angle: entry.rotate };
  }
  const { angle, pivot } = entry.rotate;
  return pivot ? { kind: "rotate", angle, pivot: { x: pivot[0], y: pivot[1] } } : { kind: "rotate", angle };
}

/**
 * Create one component from its scene entry: construct it, apply the listed
 * transforms in order, then scale it to fit if restrictSize is given.
 */
export function buildComponent(entry: SceneComponentConfig): Component {
  const component = constructComponent(entry);
  if (entry.restrictSize) {
    component.restrictSize(entry.restrictSize[0], entry.restrictSize[1]);
  }
  return component;
}

/** Construct and transform a component without applying restrictSize. */
export function constructComponent(entry: SceneComponentConfig): Component {
  const label = entry.id ? `${entry.type} "${entry.id}"` : entry.type;
  const transforms = entry.transforms.map(toTransformOp);

  switch (entry.type) {
    case "circle":
      return new Circle(
        parseSchema(CircleConfigSchema, entry.config, `${label} config`),
        createAppearance(entry.appearance),
        transforms,
      );
    case "rectangle":
      return new Rectangle(
        parseSchema(RectangleConfigSchema, entry.config, `${label} config`),
        createAppearance(entry.appearance),
        transforms,
      );
    case "polyline":
      return new Polyline(
        parseSchema(PolylineConfigSchema, entry.config, `${label} config`),
        createAppearance(entry.appearance),
        transforms,
      );
    case "text":
      rejectAppearance(entry, label);
      return new Text(parseSchema(TextConfigSchema, entry.config, `${label} config`), transforms);
    case "image":
      rejectAppearance(entry, label);
      return new Image(parseSchema(ImageConfigSchema, entry.config, `${label} config`), transforms);
    case "svg":
      rejectAppearance(entry, label);
      return new NestedSvg(
        parseSchema(NestedSvgConfigSchema, entry.config, `${label} config`),
        transforms,
      );
  }
}

export function buildScene(scene: SceneConfig): Component[] {
  return scene.components.map(buildComponent);
}

function rejectAppearance(entry: SceneComponentConfig, label: string): void {
  if (entry.appearance !== undefined) {
    throw new ConfigError(`Invalid ${label}: ${entry.type} components take no appearance`);
  }
}
