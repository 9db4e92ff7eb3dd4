import { readFileSync } from "node:fs";
import { buildScene, isContainer, parseScene } from "@svgtree/core";
import type { SvgNode } from "@svgtree/core";

export function countNodes(node: SvgNode): number {
  if (!isContainer(node)) return 1;
  let total = 1;
  for (const child of node.children) {
    total += countNodes(child);
  }
  return total;
}

export function validateCommand(input: string): void {
  const svg = buildScene(parseScene(readFileSync(input, "utf-8")));
  console.log(`✓ Scene is valid. ${countNodes(svg)} node(s).`);
}
