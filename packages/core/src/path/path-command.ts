import { n } from "../format.js";
import type {
  ArcCurve,
  CubicCurve,
  Point,
  QuadraticCurve,
  SmoothCubicCurve,
} from "../types/geometry.js";

/** Token characters a line of `d` text holds before the next token wraps */
export const MAX_PATH_LINE_LENGTH = 255;

/**
 * One command of the path mini-language. The code's case selects
 * absolute (upper) or relative (lower) addressing.
 */
export type PathCommand =
  | { type: "move"; code: "M" | "m"; points: readonly Point[] }
  | { type: "close"; code: "z" }
  | { type: "line"; code: "L" | "l"; points: readonly Point[] }
  | { type: "horizontal"; code: "H" | "h"; xs: readonly number[] }
  | { type: "vertical"; code: "V" | "v"; ys: readonly number[] }
  | { type: "cubic"; code: "C" | "c"; curves: readonly CubicCurve[] }
  | { type: "smoothCubic"; code: "S" | "s"; curves: readonly SmoothCubicCurve[] }
  | { type: "quadratic"; code: "Q" | "q"; curves: readonly QuadraticCurve[] }
  | { type: "smoothQuadratic"; code: "T" | "t"; points: readonly Point[] }
  | { type: "arc"; code: "A" | "a"; arcs: readonly ArcCurve[] };

export type PathCommandCode = PathCommand["code"];

function pointValues(points: readonly Point[]): number[] {
  return points.flatMap((p) => [p.x, p.y]);
}

/** The command's numeric arguments, flattened in parameter order. */
export function commandValues(cmd: PathCommand): number[] {
  switch (cmd.type) {
    case "close":
      return [];
    case "move":
    case "line":
    case "smoothQuadratic":
      return pointValues(cmd.points);
    case "horizontal":
      return [...cmd.xs];
    case "vertical":
      return [...cmd.ys];
    case "cubic":
      return cmd.curves.flatMap((c) => [c.x1, c.y1, c.x2, c.y2, c.x, c.y]);
    case "smoothCubic":
      return cmd.curves.flatMap((c) => [c.x2, c.y2, c.x, c.y]);
    case "quadratic":
      return cmd.curves.flatMap((c) => [c.x1, c.y1, c.x, c.y]);
    case "arc":
      return cmd.arcs.flatMap((a) => [
        a.rx,
        a.ry,
        a.xAxisRotation,
        a.largeArc ? 1 : 0,
        a.sweep ? 1 : 0,
        a.x,
        a.y,
      ]);
  }
}

/** Code token followed by one token per numeric argument */
export function commandTokens(cmd: PathCommand): string[] {
  return [cmd.code, ...commandValues(cmd).map(n)];
}

/**
 * Serialize commands into the text of a `d` attribute.
 *
 * Tokens are separated by single spaces. The running count holds the
 * characters of the tokens on the current line, separators excluded; a
 * token that would take it past `maxTokenChars` goes on a new line, and the
 * count restarts at that token's length.
 */
export function encodePathData(
  commands: readonly PathCommand[],
  maxTokenChars: number = MAX_PATH_LINE_LENGTH,
): string {
  let out = "";
  let count = 0;
  let first = true;

  for (const cmd of commands) {
    for (const token of commandTokens(cmd)) {
      if (first) {
        out = token;
        count = token.length;
        first = false;
      } else if (count + token.length > maxTokenChars) {
        out += "\n" + token;
        count = token.length;
      } else {
        out += " " + token;
        count += token.length;
      }
    }
  }

  return out;
}
