import { readFileSync } from "node:fs";
import { parseScene, validateScene } from "@shapecraft/core";
import type { Logger } from "../logger.js";

export function validateCommand(input: string, logger: Logger): number {
  try {
    const content = readFileSync(input, "utf-8");
    const scene = parseScene(content);
    const { errors, warnings } = validateScene(scene);

    if (errors.length === 0 && warnings.length === 0) {
      logger.info("✓ Scene is valid. No issues found.");
      return 0;
    }

    if (errors.length > 0) {
      logger.error(`\n${errors.length} error(s):`);
      for (const err of errors) {
        logger.error(`  ✗ [${err.code}] ${err.message}`);
        if (err.suggestion) {
          logger.error(`    → ${err.suggestion}`);
        }
      }
    }

    if (warnings.length > 0) {
      logger.warn(`\n${warnings.length} warning(s):`);
      for (const warn of warnings) {
        logger.warn(`  ⚠ [${warn.code}] ${warn.message}`);
        if (warn.suggestion) {
          logger.warn(`    → ${warn.suggestion}`);
        }
      }
    }

    logger.info(`\nSummary: ${errors.length} error(s), ${warnings.length} warning(s)`);
    return errors.length > 0 ? 1 : 0;
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
