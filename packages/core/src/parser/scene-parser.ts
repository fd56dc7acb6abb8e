import yaml from "js-yaml";
import { ConfigError } from "../errors.js";
import { formatIssues } from "../types/config.js";
import { SceneConfigSchema, type SceneConfig } from "../types/scene.js";

/**
 * Parse a JSON or YAML string into a validated SceneConfig.
 * Detects format automatically (tries JSON first, then YAML).
 * Throws a ConfigError listing every schema issue.
 */
export function parseScene(input: string): SceneConfig {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new ConfigError(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = SceneConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid scene", formatIssues(result.error));
  }

  return result.data;
}
