import { logLogTemplate } from "../templates/log-log.js";
import { singleAxisTemplate } from "../templates/single-axis.js";

const templates: Record<string, string> = {
  "single-axis": singleAxisTemplate,
  "log-log": logLogTemplate,
};

export interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): number {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    return 1;
  }

  process.stdout.write(tmpl);
  return 0;
}
