import type { RenderMode, Svg, SvgNode } from "@svgtree/core";
import { attrFragments, elementName, joinAttrs } from "@svgtree/core";
import type { OutputSink } from "./sink.js";
import { StringSink } from "./sink.js";

export const XML_PROLOG = `<?xml version="1.0"?>`;

/**
 * Write a node and its subtree depth-first, children in insertion order.
 * Leaves self-close; containers wrap their children in open/close tags.
 */
export function renderNode(node: SvgNode, sink: OutputSink): void {
  const name = elementName(node);
  const attrs = joinAttrs(attrFragments(node));

  switch (node.kind) {
    case "svg":
    case "g":
      sink.write(`<${name} ${attrs}>`);
      for (const child of node.children) {
        renderNode(child, sink);
      }
      sink.write(`</${name}>`);
      return;
    case "circle":
    case "ellipse":
    case "rect":
    case "polygon":
    case "polyline":
    case "line":
    case "path":
      sink.write(`<${name} ${attrs}/>`);
      return;
  }
}

/** Complete document: the XML prolog followed by the root element */
export function renderDocument(svg: Svg, sink: OutputSink): void {
  sink.write(XML_PROLOG);
  renderNode(svg, sink);
}

/** The root element alone, for embedding in other markup */
export function renderFragment(svg: Svg, sink: OutputSink): void {
  renderNode(svg, sink);
}

/** Render in the root's own `mode` */
export function render(svg: Svg, sink: OutputSink): void {
  if (svg.mode === "document") {
    renderDocument(svg, sink);
  } else {
    renderFragment(svg, sink);
  }
}

export function renderToString(svg: Svg, mode: RenderMode = svg.mode): string {
  const sink = new StringSink();
  if (mode === "document") {
    renderDocument(svg, sink);
  } else {
    renderFragment(svg, sink);
  }
  return sink.toString();
}
