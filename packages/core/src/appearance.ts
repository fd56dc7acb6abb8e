import { n, type Attributes } from "./format.js";
import {
  AppearanceConfigSchema,
  parseSchema,
  type AppearanceConfig,
  type AppearanceConfigInput,
} from "./types/config.js";

export function createAppearance(input: AppearanceConfigInput = {}): AppearanceConfig {
  return parseSchema(AppearanceConfigSchema, input, "appearance config");
}

/**
 * Presentation attributes for the fields that are set, always in the order
 * fill, fill-opacity, stroke, stroke-width, stroke-dasharray.
 */
export function appearanceAttributes(appearance: AppearanceConfig): Attributes {
  const attrs: Attributes = [];
  if (appearance.fill !== undefined) attrs.push(["fill", appearance.fill]);
  if (appearance.fillOpacity !== undefined) attrs.push(["fill-opacity", n(appearance.fillOpacity)]);
  if (appearance.stroke !== undefined) attrs.push(["stroke", appearance.stroke]);
  if (appearance.strokeWidth !== undefined) attrs.push(["stroke-width", n(appearance.strokeWidth)]);
  if (appearance.strokeDasharray !== undefined) {
    attrs.push(["stroke-dasharray", appearance.strokeDasharray.map(n).join(",")]);
  }
  return attrs;
}
