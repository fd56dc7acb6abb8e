import { buildScene, type SceneConfig } from "@shapecraft/core";
import { Canvas } from "./canvas.js";

export interface SceneRenderOptions {
  width?: number;
  height?: number;
  background?: string;
}

/** Build every component of the scene onto a canvas. */
export function sceneToCanvas(scene: SceneConfig, options?: SceneRenderOptions): Canvas {
  const { canvas } = scene;
  const width = options?.width ?? canvas.width;
  const height = options?.height ?? canvas.height;
  // Overriding the output size keeps the scene's own coordinate space
  const [x, y, vw, vh] = canvas.viewBox ?? [0, 0, canvas.width, canvas.height];

  const doc = new Canvas({
    width,
    height,
    viewBox: { x, y, width: vw, height: vh },
    background: options?.background ?? canvas.background,
  });

  for (const component of buildScene(scene)) {
    doc.add(component);
  }
  return doc;
}

export function renderScene(scene: SceneConfig, options?: SceneRenderOptions): string {
  return sceneToCanvas(scene, options).render();
}
