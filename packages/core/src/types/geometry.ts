// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

// ---- Curve segments ----

/** One cubic Bézier segment: two control points and an end point. */
export interface CubicCurve {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  x: number;
  y: number;
}

/** Shorthand cubic segment; the first control point is reflected from the previous segment. */
export interface SmoothCubicCurve {
  x2: number;
  y2: number;
  x: number;
  y: number;
}

export interface QuadraticCurve {
  x1: number;
  y1: number;
  x: number;
  y: number;
}

/** Elliptical arc segment ending at (x, y). */
export interface ArcCurve {
  rx: number;
  ry: number;
  xAxisRotation: number;
  largeArc: boolean;
  sweep: boolean;
  x: number;
  y: number;
}
