import type { Component } from "../components/component.js";
import { ConfigError, IndeterminateGeometryError } from "../errors.js";
import { boxesIntersect, type BoundingBox } from "../types/geometry.js";
import type {
  SceneComponentConfig,
  SceneConfig,
  SceneIssue,
  SceneValidationResult,
} from "../types/scene.js";
import { constructComponent } from "./build-components.js";

/**
 * Linter-style pass over a parsed scene. Every component is checked on its
 * own, so one invalid entry does not hide problems in the others.
 */
export function validateScene(scene: SceneConfig): SceneValidationResult {
  const errors: SceneIssue[] = [];
  const warnings: SceneIssue[] = [];
  const canvasBox = sceneViewBox(scene);

  scene.components.forEach((entry, index) => {
    const issue = (
      code: SceneIssue["code"],
      severity: SceneIssue["severity"],
      message: string,
      suggestion?: string,
    ): SceneIssue => ({
      code,
      severity,
      message,
      componentIndex: index,
      componentId: entry.id ?? null,
      ...(suggestion !== undefined ? { suggestion } : {}),
    });

    let component: Component;
    try {
      component = constructComponent(entry);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      errors.push(issue("invalid-component", "error", `${describe(entry, index)}: ${err.message}`));
      return;
    }

    if (entry.restrictSize) {
      try {
        component.restrictSize(entry.restrictSize[0], entry.restrictSize[1]);
      } catch (err) {
        if (!(err instanceof IndeterminateGeometryError)) throw err;
        errors.push(
          issue(
            "indeterminate-restrict-size",
            "error",
            `${describe(entry, index)}: ${err.message}`,
            "Remove restrictSize and set the font size directly",
          ),
        );
      }
    }

    const center = component.centralPoint();
    if (!center.ok) {
      warnings.push(
        issue(
          "indeterminate-center",
          "warning",
          `${describe(entry, index)}: central point is undefined (${center.error.message})`,
          'Use textAnchor "middle" with dominantBaseline "central" to make the anchor the center',
        ),
      );
    }

    const box = component.transformedBoundingBox();
    if (box.ok && !boxesIntersect(box.value, canvasBox)) {
      warnings.push(
        issue(
          "outside-canvas",
          "warning",
          `${describe(entry, index)} lies entirely outside the canvas`,
          "Check its position and transforms against the canvas size",
        ),
      );
    }
  });

  return { errors, warnings };
}

/** The scene's coordinate space as a bounding box. */
export function sceneViewBox(scene: SceneConfig): BoundingBox {
  const [x, y, width, height] = scene.canvas.viewBox ?? [0, 0, scene.canvas.width, scene.canvas.height];
  return { minX: x, minY: y, maxX: x + width, maxY: y + height };
}

function describe(entry: SceneComponentConfig, index: number): string {
  return entry.id ? `Component ${index} (${entry.type} "${entry.id}")` : `Component ${index} (${entry.type})`;
}
