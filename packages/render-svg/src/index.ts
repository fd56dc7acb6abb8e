export { Canvas, type CanvasOptions } from "./canvas.js";
export { renderScene, sceneToCanvas, type SceneRenderOptions } from "./render-scene.js";
