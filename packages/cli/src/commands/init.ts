import { gradientTemplate } from "../templates/gradient.js";
import { overlapTemplate } from "../templates/overlap.js";
import { shadowTemplate } from "../templates/shadow.js";

export const templates: Record<string, string | undefined> = {
  overlap: overlapTemplate,
  gradient: gradientTemplate,
  shadow: shadowTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}
