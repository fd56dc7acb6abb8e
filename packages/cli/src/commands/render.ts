import { readFileSync } from "node:fs";
import { parseScene } from "@shapecraft/core";
import { sceneToCanvas } from "@shapecraft/render-svg";
import type { Logger } from "../logger.js";

export interface RenderOptions {
  output?: string;
  width?: string;
  height?: string;
  background?: string;
}

export function renderCommand(input: string, options: RenderOptions, logger: Logger): number {
  try {
    const content = readFileSync(input, "utf-8");
    const scene = parseScene(content);
    logger.debug(`Parsed ${scene.components.length} component(s) from ${input}`);

    const canvas = sceneToCanvas(scene, {
      width: parseDimensionOption("width", options.width),
      height: parseDimensionOption("height", options.height),
      background: options.background,
    });
    logger.debug(`Canvas ${canvas.width} x ${canvas.height}`);

    const outputPath = options.output ?? input.replace(/\.(ya?ml|json)$/i, "") + ".svg";
    canvas.save(outputPath);
    logger.info(`Rendered: ${outputPath}`);
    return 0;
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}

function parseDimensionOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}
