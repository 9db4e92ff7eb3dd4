import { readFileSync } from "node:fs";
import { buildScene, parseScene } from "@svgtree/core";
import type { RenderMode } from "@svgtree/core";
import { FileSink, render, renderToString } from "@svgtree/render-svg";

export interface RenderOptions {
  output?: string;
  fragment?: boolean;
  document?: boolean;
}

function modeOverride(options: RenderOptions): RenderMode | undefined {
  if (options.fragment && options.document) {
    throw new Error("--fragment and --document are mutually exclusive");
  }
  if (options.fragment) return "fragment";
  if (options.document) return "document";
  return undefined;
}

/** `scene.yaml` → `scene.svg` */
export function defaultOutputPath(input: string): string {
  return input.replace(/\.(ya?ml|json)$/i, "") + ".svg";
}

export function renderCommand(input: string, options: RenderOptions): void {
  const mode = modeOverride(options);
  const svg = buildScene(parseScene(readFileSync(input, "utf-8")));
  svg.mode = mode ?? svg.mode;

  const outputPath = options.output ?? defaultOutputPath(input);
  if (outputPath === "-") {
    process.stdout.write(renderToString(svg));
    return;
  }

  const sink = FileSink.open(outputPath);
  try {
    render(svg, sink);
  } finally {
    sink.close();
  }
  console.log(`Rendered: ${outputPath}`);
}
