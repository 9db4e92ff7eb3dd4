import { ShapeAttrs } from "../attrs/base-attrs.js";
import type { Style } from "../attrs/style.js";
import type { Transform } from "../attrs/transform.js";
import type { Point } from "../types/geometry.js";

/** Common surface of leaf shapes: an owned ShapeAttrs and shortcuts into it. */
export abstract class ShapeNode {
  readonly attrs = new ShapeAttrs();

  get style(): Style {
    return this.attrs.base.style;
  }

  get transform(): Transform {
    return this.attrs.transform;
  }
}

export class Circle extends ShapeNode {
  readonly kind = "circle";

  constructor(
    public cx: number,
    public cy: number,
    public r: number,
  ) {
    super();
  }
}

export class Ellipse extends ShapeNode {
  readonly kind = "ellipse";

  constructor(
    public cx: number,
    public cy: number,
    public rx: number,
    public ry: number,
  ) {
    super();
  }
}

export class Rect extends ShapeNode {
  readonly kind = "rect";

  constructor(
    public x: number,
    public y: number,
    public width: number,
    public height: number,
  ) {
    super();
  }
}

/** Closed, filled outline through `points` */
export class Polygon extends ShapeNode {
  readonly kind = "polygon";
  readonly points: Point[];

  constructor(points: readonly Point[]) {
    super();
    this.points = [...points];
  }
}

/** Open outline through `points` */
export class Polyline extends ShapeNode {
  readonly kind = "polyline";
  readonly points: Point[];

  constructor(points: readonly Point[]) {
    super();
    this.points = [...points];
  }
}

export class Line extends ShapeNode {
  readonly kind = "line";

  constructor(
    public x1: number,
    public y1: number,
    public x2: number,
    public y2: number,
  ) {
    super();
  }
}
