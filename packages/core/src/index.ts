export * from "./types/config.js";
export * from "./types/geometry.js";
export * from "./types/scene.js";
export * from "./errors.js";
export { n, escapeXml, mergeAttributes, attrString, type Attributes } from "./format.js";
export { createAppearance, appearanceAttributes } from "./appearance.js";
export * from "./transform/matrix.js";
export { TransformStack, type TransformOp } from "./transform/transform-stack.js";
export { Component } from "./components/component.js";
export { Circle } from "./components/circle.js";
export { Rectangle } from "./components/rectangle.js";
export { Polyline } from "./components/polyline.js";
export { Text } from "./components/text.js";
export { Image } from "./components/image.js";
export { NestedSvg } from "./components/nested-svg.js";
export { parseScene } from "./parser/scene-parser.js";
export {
  buildComponent,
  buildScene,
  constructComponent,
  toTransformOp,
} from "./scene/build-components.js";
export { validateScene, sceneViewBox } from "./scene/validate-scene.js";
