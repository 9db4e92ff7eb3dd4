import { BaseAttrs, ShapeAttrs } from "../attrs/base-attrs.js";
import type { Style } from "../attrs/style.js";
import type { Transform } from "../attrs/transform.js";
import { ViewBox } from "../attrs/view-box.js";
import type { Point } from "../types/geometry.js";
import { Path } from "./path.js";
import { Circle, Ellipse, Line, Polygon, Polyline, Rect } from "./shapes.js";

/** Any node of the document tree, discriminated by `kind`. */
export type SvgNode =
  | Svg
  | Group
  | Circle
  | Ellipse
  | Rect
  | Polygon
  | Polyline
  | Line
  | Path;

export type NodeKind = SvgNode["kind"];

/** Whether the root renders with the XML prolog or as a bare fragment */
export type RenderMode = "document" | "fragment";

/**
 * Child list and construction calls shared by `<svg>` and `<g>`.
 * Each call creates the child, appends it and hands it back, so trees are
 * built top-down without registering children separately.
 */
export abstract class ContainerNode {
  private readonly contents: SvgNode[] = [];

  /** Children in insertion order */
  get children(): readonly SvgNode[] {
    return this.contents;
  }

  group(): Group {
    return this.append(new Group());
  }

  /** Nested `<svg>` viewport at (x, y) */
  svg(x: number, y: number, width: number, height: number): Svg {
    const child = new Svg(width, height);
    child.x = x;
    child.y = y;
    return this.append(child);
  }

  circle(cx: number, cy: number, r: number): Circle {
    return this.append(new Circle(cx, cy, r));
  }

  ellipse(cx: number, cy: number, rx: number, ry: number): Ellipse {
    return this.append(new Ellipse(cx, cy, rx, ry));
  }

  rect(x: number, y: number, width: number, height: number): Rect {
    return this.append(new Rect(x, y, width, height));
  }

  polygon(...points: Point[]): Polygon {
    return this.append(new Polygon(points));
  }

  polyline(...points: Point[]): Polyline {
    return this.append(new Polyline(points));
  }

  line(x1: number, y1: number, x2: number, y2: number): Line {
    return this.append(new Line(x1, y1, x2, y2));
  }

  path(): Path {
    return this.append(new Path());
  }

  private append<T extends SvgNode>(node: T): T {
    this.contents.push(node);
    return node;
  }
}

/** A `<g>` element */
export class Group extends ContainerNode {
  readonly kind = "g";
  readonly attrs = new ShapeAttrs();

  get style(): Style {
    return this.attrs.base.style;
  }

  get transform(): Transform {
    return this.attrs.transform;
  }
}

/**
 * An `<svg>` element. As the root of a tree it also decides whether
 * rendering emits the XML prolog (`mode`).
 */
export class Svg extends ContainerNode {
  readonly kind = "svg";
  readonly attrs = new BaseAttrs();
  readonly viewBox = new ViewBox();
  x = 0;
  y = 0;
  mode: RenderMode = "document";

  constructor(
    public width: number,
    public height: number,
  ) {
    super();
  }

  get style(): Style {
    return this.attrs.style;
  }
}
