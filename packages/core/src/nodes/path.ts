import type { PathCommand } from "../path/path-command.js";
import { encodePathData } from "../path/path-command.js";
import type {
  ArcCurve,
  CubicCurve,
  Point,
  QuadraticCurve,
  SmoothCubicCurve,
} from "../types/geometry.js";
import { ShapeNode } from "./shapes.js";

/**
 * A `<path>` element. Every append call records exactly one command,
 * even when it repeats the previous command's kind.
 */
export class Path extends ShapeNode {
  readonly kind = "path";
  /** Written as `pathLength` when set */
  pathLength: number | undefined = undefined;
  private readonly list: PathCommand[] = [];

  get commands(): readonly PathCommand[] {
    return this.list;
  }

  /** The `d` attribute text */
  data(): string {
    return encodePathData(this.list);
  }

  moveTo(...points: Point[]): this {
    return this.add({ type: "move", code: "M", points });
  }

  moveBy(...points: Point[]): this {
    return this.add({ type: "move", code: "m", points });
  }

  close(): this {
    return this.add({ type: "close", code: "z" });
  }

  lineTo(...points: Point[]): this {
    return this.add({ type: "line", code: "L", points });
  }

  lineBy(...points: Point[]): this {
    return this.add({ type: "line", code: "l", points });
  }

  horizontalTo(...xs: number[]): this {
    return this.add({ type: "horizontal", code: "H", xs });
  }

  horizontalBy(...xs: number[]): this {
    return this.add({ type: "horizontal", code: "h", xs });
  }

  verticalTo(...ys: number[]): this {
    return this.add({ type: "vertical", code: "V", ys });
  }

  verticalBy(...ys: number[]): this {
    return this.add({ type: "vertical", code: "v", ys });
  }

  cubicTo(...curves: CubicCurve[]): this {
    return this.add({ type: "cubic", code: "C", curves });
  }

  cubicBy(...curves: CubicCurve[]): this {
    return this.add({ type: "cubic", code: "c", curves });
  }

  smoothCubicTo(...curves: SmoothCubicCurve[]): this {
    return this.add({ type: "smoothCubic", code: "S", curves });
  }

  smoothCubicBy(...curves: SmoothCubicCurve[]): this {
    return this.add({ type: "smoothCubic", code: "s", curves });
  }

  quadraticTo(...curves: QuadraticCurve[]): this {
    return this.add({ type: "quadratic", code: "Q", curves });
  }

  quadraticBy(...curves: QuadraticCurve[]): this {
    return this.add({ type: "quadratic", code: "q", curves });
  }

  smoothQuadraticTo(...points: Point[]): this {
    return this.add({ type: "smoothQuadratic", code: "T", points });
  }

  smoothQuadraticBy(...points: Point[]): this {
    return this.add({ type: "smoothQuadratic", code: "t", points });
  }

  arcTo(...arcs: ArcCurve[]): this {
    return this.add({ type: "arc", code: "A", arcs });
  }

  arcBy(...arcs: ArcCurve[]): this {
    return this.add({ type: "arc", code: "a", arcs });
  }

  private add(cmd: PathCommand): this {
    this.list.push(cmd);
    return this;
  }
}
