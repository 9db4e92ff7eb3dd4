import { templates } from "../templates/index.js";

export interface InitOptions {
  template: string;
}

/** Print the named template scene to stdout */
export function initCommand(options: InitOptions): void {
  const text = templates[options.template];
  if (text === undefined) {
    throw new Error(
      `No template "${options.template}" (choose from: ${Object.keys(templates).join(", ")})`,
    );
  }
  process.stdout.write(text);
}
