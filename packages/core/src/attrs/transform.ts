import { n, stringAttr } from "../format.js";

export type TransformOp =
  | { type: "matrix"; a: number; b: number; c: number; d: number; e: number; f: number }
  | { type: "translate"; tx: number; ty: number }
  | { type: "scale"; sx: number; sy: number }
  | { type: "rotate"; angle: number; cx: number; cy: number }
  | { type: "skewX"; angle: number }
  | { type: "skewY"; angle: number };

/**
 * An append-only list of SVG transform operations.
 * Operations are never merged or reordered.
 */
export class Transform {
  private readonly list: TransformOp[] = [];

  get ops(): readonly TransformOp[] {
    return this.list;
  }

  matrix(a: number, b: number, c: number, d: number, e: number, f: number): this {
    return this.push({ type: "matrix", a, b, c, d, e, f });
  }

  translate(tx: number, ty: number): this {
    return this.push({ type: "translate", tx, ty });
  }

  scale(sx: number, sy: number): this {
    return this.push({ type: "scale", sx, sy });
  }

  /** Rotate by `angle` degrees around (cx, cy) */
  rotate(angle: number, cx = 0, cy = 0): this {
    return this.push({ type: "rotate", angle, cx, cy });
  }

  skewX(angle: number): this {
    return this.push({ type: "skewX", angle });
  }

  skewY(angle: number): this {
    return this.push({ type: "skewY", angle });
  }

  attrFragment(): string {
    return stringAttr("transform", this.list.map(formatTransformOp).join(" "));
  }

  private push(op: TransformOp): this {
    this.list.push(op);
    return this;
  }
}

export function formatTransformOp(op: TransformOp): string {
  switch (op.type) {
    case "matrix":
      return `matrix(${[op.a, op.b, op.c, op.d, op.e, op.f].map(n).join(",")})`;
    case "translate":
      return `translate(${n(op.tx)},${n(op.ty)})`;
    case "scale":
      return `scale(${n(op.sx)},${n(op.sy)})`;
    case "rotate":
      return `rotate(${n(op.angle)},${n(op.cx)},${n(op.cy)})`;
    case "skewX":
      return `skewX(${n(op.angle)})`;
    case "skewY":
      return `skewY(${n(op.angle)})`;
  }
}
