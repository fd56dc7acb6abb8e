import type { Logger } from "../logger.js";
import { badgeTemplate } from "../templates/badge.js";
import { basicShapesTemplate } from "../templates/basic-shapes.js";

export const templates: Record<string, string> = {
  "basic-shapes": basicShapesTemplate,
  badge: badgeTemplate,
};

export interface InitOptions {
  template: string;
}

export function initCommand(
  options: InitOptions,
  logger: Logger,
  write: (text: string) => void = (text) => process.stdout.write(text),
): number {
  const tmpl = templates[options.template];
  if (tmpl === undefined) {
    logger.error(`Unknown template: ${options.template}`);
    logger.error(`Available: ${Object.keys(templates).join(", ")}`);
    return 1;
  }

  write(tmpl);
  return 0;
}
