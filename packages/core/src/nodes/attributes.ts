import { floatAttr, n, stringAttr } from "../format.js";
import type { Point } from "../types/geometry.js";
import type { Group, NodeKind, Svg, SvgNode } from "./containers.js";

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";

function pointsAttr(points: readonly Point[]): string {
  return stringAttr("points", points.map((p) => `${n(p.x)},${n(p.y)}`).join(" "));
}

/**
 * Attribute fragments of a node in their fixed output order. Unset
 * attributes appear as empty strings; callers drop them when joining.
 */
export function attrFragments(node: SvgNode): string[] {
  switch (node.kind) {
    case "svg":
      return [
        ...node.attrs.attrFragments(),
        node.viewBox.attrFragment(),
        floatAttr("width", node.width),
        floatAttr("height", node.height),
        floatAttr("x", node.x),
        floatAttr("y", node.y),
        stringAttr("xmlns", SVG_NAMESPACE),
      ];
    case "g":
      return node.attrs.attrFragments();
    case "circle":
      return [
        ...node.attrs.attrFragments(),
        floatAttr("cx", node.cx),
        floatAttr("cy", node.cy),
        floatAttr("r", node.r),
      ];
    case "ellipse":
      return [
        ...node.attrs.attrFragments(),
        floatAttr("cx", node.cx),
        floatAttr("cy", node.cy),
        floatAttr("rx", node.rx),
        floatAttr("ry", node.ry),
      ];
    case "rect":
      return [
        ...node.attrs.attrFragments(),
        floatAttr("width", node.width),
        floatAttr("height", node.height),
        floatAttr("x", node.x),
        floatAttr("y", node.y),
      ];
    case "polygon":
    case "polyline":
      return [...node.attrs.attrFragments(), pointsAttr(node.points)];
    case "line":
      return [
        ...node.attrs.attrFragments(),
        floatAttr("x1", node.x1),
        floatAttr("y1", node.y1),
        floatAttr("x2", node.x2),
        floatAttr("y2", node.y2),
      ];
    case "path":
      return [
        ...node.attrs.attrFragments(),
        stringAttr("d", node.data()),
        node.pathLength === undefined ? "" : floatAttr("pathLength", node.pathLength),
      ];
  }
}

/** Element names coincide with node kinds */
export function elementName(node: SvgNode): NodeKind {
  return node.kind;
}

export function isContainer(node: SvgNode): node is Svg | Group {
  return node.kind === "svg" || node.kind === "g";
}
