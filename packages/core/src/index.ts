export * from "./types/geometry.js";
export * from "./types/scene.js";
export { n, floatAttr, boolAttr, stringAttr, joinAttrs, escapeXml } from "./format.js";
export { Style } from "./attrs/style.js";
export { Transform, formatTransformOp } from "./attrs/transform.js";
export type { TransformOp } from "./attrs/transform.js";
export { ViewBox } from "./attrs/view-box.js";
export { BaseAttrs, ShapeAttrs } from "./attrs/base-attrs.js";
export {
  MAX_PATH_LINE_LENGTH,
  commandTokens,
  commandValues,
  encodePathData,
} from "./path/path-command.js";
export type { PathCommand, PathCommandCode } from "./path/path-command.js";
export { ShapeNode, Circle, Ellipse, Rect, Polygon, Polyline, Line } from "./nodes/shapes.js";
export { Path } from "./nodes/path.js";
export { ContainerNode, Group, Svg } from "./nodes/containers.js";
export type { NodeKind, RenderMode, SvgNode } from "./nodes/containers.js";
export { SVG_NAMESPACE, attrFragments, elementName, isContainer } from "./nodes/attributes.js";
export { parseScene } from "./parser/scene-parser.js";
export { buildScene } from "./builder/scene-builder.js";
