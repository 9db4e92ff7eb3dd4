import type { BaseAttrs, ShapeAttrs } from "../attrs/base-attrs.js";
import type { Transform } from "../attrs/transform.js";
import { escapeXml } from "../format.js";
import type { ContainerNode } from "../nodes/containers.js";
import { Svg } from "../nodes/containers.js";
import type { Path } from "../nodes/path.js";
import type { Point } from "../types/geometry.js";
import type {
  BaseNodeConfig,
  PathCommandConfig,
  SceneConfig,
  SceneNodeConfig,
  ShapeNodeConfig,
  TransformConfig,
  Vec2,
} from "../types/scene.js";
import { PATH_COMMAND_ARITY } from "../types/scene.js";

/**
 * Build a document tree from a parsed scene.
 *
 * Style entries and class names come from a text file, so they are
 * XML-escaped on the way in; the tree itself writes values verbatim.
 */
export function buildScene(scene: SceneConfig): Svg {
  const doc = scene.document;
  const svg = new Svg(doc.width, doc.height);
  svg.x = doc.x ?? 0;
  svg.y = doc.y ?? 0;
  if (doc.viewBox) svg.viewBox.set(...doc.viewBox);
  if (doc.mode) svg.mode = doc.mode;
  applyBase(svg.attrs, doc);

  for (const child of doc.children ?? []) {
    addNode(svg, child);
  }
  return svg;
}

function addNode(parent: ContainerNode, config: SceneNodeConfig): void {
  switch (config.type) {
    case "svg": {
      const svg = parent.svg(config.x ?? 0, config.y ?? 0, config.width, config.height);
      if (config.viewBox) svg.viewBox.set(...config.viewBox);
      applyBase(svg.attrs, config);
      for (const child of config.children ?? []) addNode(svg, child);
      return;
    }
    case "group": {
      const group = parent.group();
      applyShape(group.attrs, config);
      for (const child of config.children ?? []) addNode(group, child);
      return;
    }
    case "circle": {
      const circle = parent.circle(config.cx, config.cy, config.r);
      applyShape(circle.attrs, config);
      return;
    }
    case "ellipse": {
      const ellipse = parent.ellipse(config.cx, config.cy, config.rx, config.ry);
      applyShape(ellipse.attrs, config);
      return;
    }
    case "rect": {
      const rect = parent.rect(config.x ?? 0, config.y ?? 0, config.width, config.height);
      applyShape(rect.attrs, config);
      return;
    }
    case "polygon": {
      const polygon = parent.polygon(...config.points.map(toPoint));
      applyShape(polygon.attrs, config);
      return;
    }
    case "polyline": {
      const polyline = parent.polyline(...config.points.map(toPoint));
      applyShape(polyline.attrs, config);
      return;
    }
    case "line": {
      const line = parent.line(config.x1, config.y1, config.x2, config.y2);
      applyShape(line.attrs, config);
      return;
    }
    case "path": {
      const path = parent.path();
      for (const cmd of config.d) appendCommand(path, cmd);
      path.pathLength = config.pathLength;
      applyShape(path.attrs, config);
      return;
    }
  }
}

function applyBase(attrs: BaseAttrs, config: BaseNodeConfig): void {
  for (const [key, value] of Object.entries(config.style ?? {})) {
    attrs.style.set(escapeXml(key), escapeXml(value));
  }
  attrs.externalResourcesRequired = config.externalResourcesRequired ?? false;
  attrs.className = escapeXml(config.class ?? "");
}

function applyShape(attrs: ShapeAttrs, config: ShapeNodeConfig): void {
  applyBase(attrs.base, config);
  for (const op of config.transform ?? []) applyTransform(attrs.transform, op);
}

function applyTransform(transform: Transform, op: TransformConfig): void {
  if ("matrix" in op) transform.matrix(...op.matrix);
  else if ("translate" in op) transform.translate(...op.translate);
  else if ("scale" in op) transform.scale(...op.scale);
  else if ("rotate" in op) transform.rotate(...op.rotate);
  else if ("skewX" in op) transform.skewX(op.skewX);
  else transform.skewY(op.skewY);
}

function toPoint([x, y]: Vec2): Point {
  return { x, y };
}

/** Split a flat argument list into groups of `size` */
function groups(args: readonly number[], size: number): number[][] {
  const out: number[][] = [];
  for (let i = 0; i + size <= args.length; i += size) {
    out.push(args.slice(i, i + size));
  }
  return out;
}

function appendCommand(path: Path, cmd: PathCommandConfig): void {
  const args = cmd.args ?? [];
  const arity = PATH_COMMAND_ARITY[cmd.command];
  const g = arity > 0 ? groups(args, arity) : [];
  const points = (): Point[] => g.map(([x, y]) => ({ x, y }));

  switch (cmd.command) {
    case "M":
      path.moveTo(...points());
      return;
    case "m":
      path.moveBy(...points());
      return;
    case "Z":
    case "z":
      path.close();
      return;
    case "L":
      path.lineTo(...points());
      return;
    case "l":
      path.lineBy(...points());
      return;
    case "H":
      path.horizontalTo(...args);
      return;
    case "h":
      path.horizontalBy(...args);
      return;
    case "V":
      path.verticalTo(...args);
      return;
    case "v":
      path.verticalBy(...args);
      return;
    case "C":
    case "c": {
      const curves = g.map(([x1, y1, x2, y2, x, y]) => ({ x1, y1, x2, y2, x, y }));
      if (cmd.command === "C") path.cubicTo(...curves);
      else path.cubicBy(...curves);
      return;
    }
    case "S":
    case "s": {
      const curves = g.map(([x2, y2, x, y]) => ({ x2, y2, x, y }));
      if (cmd.command === "S") path.smoothCubicTo(...curves);
      else path.smoothCubicBy(...curves);
      return;
    }
    case "Q":
    case "q": {
      const curves = g.map(([x1, y1, x, y]) => ({ x1, y1, x, y }));
      if (cmd.command === "Q") path.quadraticTo(...curves);
      else path.quadraticBy(...curves);
      return;
    }
    case "T":
      path.smoothQuadraticTo(...points());
      return;
    case "t":
      path.smoothQuadraticBy(...points());
      return;
    case "A":
    case "a": {
      const arcs = g.map(([rx, ry, xAxisRotation, largeArc, sweep, x, y]) => ({
        rx,
        ry,
        xAxisRotation,
        largeArc: largeArc !== 0,
        sweep: sweep !== 0,
        x,
        y,
      }));
      if (cmd.command === "A") path.arcTo(...arcs);
      else path.arcBy(...arcs);
      return;
    }
  }
}
