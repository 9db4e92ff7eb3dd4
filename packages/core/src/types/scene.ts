import { z } from "zod";

// ---- Scalar types ----

export type Vec2 = [number, number];
export type ViewBoxTuple = [number, number, number, number];
export type SceneRenderMode = "document" | "fragment";

export type PathCommandLetter =
  | "M" | "m"
  | "Z" | "z"
  | "L" | "l"
  | "H" | "h"
  | "V" | "v"
  | "C" | "c"
  | "S" | "s"
  | "Q" | "q"
  | "T" | "t"
  | "A" | "a";

// ---- Scene interfaces ----

export interface SceneConfig {
  version: string;
  document: DocumentConfig;
}

export type TransformConfig =
  | { matrix: [number, number, number, number, number, number] }
  | { translate: Vec2 }
  | { scale: Vec2 }
  | { rotate: [number, number, number] }
  | { skewX: number }
  | { skewY: number };

export interface BaseNodeConfig {
  style?: Record<string, string>;
  class?: string;
  externalResourcesRequired?: boolean;
}

export interface ShapeNodeConfig extends BaseNodeConfig {
  transform?: TransformConfig[];
}

export interface DocumentConfig extends BaseNodeConfig {
  width: number;
  height: number;
  x?: number;
  y?: number;
  viewBox?: ViewBoxTuple;
  mode?: SceneRenderMode;
  children?: SceneNodeConfig[];
}

export interface NestedSvgConfig extends BaseNodeConfig {
  type: "svg";
  width: number;
  height: number;
  x?: number;
  y?: number;
  viewBox?: ViewBoxTuple;
  children?: SceneNodeConfig[];
}

export interface GroupConfig extends ShapeNodeConfig {
  type: "group";
  children?: SceneNodeConfig[];
}

export interface CircleConfig extends ShapeNodeConfig {
  type: "circle";
  cx: number;
  cy: number;
  r: number;
}

export interface EllipseConfig extends ShapeNodeConfig {
  type: "ellipse";
  cx: number;
  cy: number;
  rx: number;
  ry: number;
}

export interface RectConfig extends ShapeNodeConfig {
  type: "rect";
  x?: number;
  y?: number;
  width: number;
  height: number;
}

export interface PolygonConfig extends ShapeNodeConfig {
  type: "polygon";
  points: Vec2[];
}

export interface PolylineConfig extends ShapeNodeConfig {
  type: "polyline";
  points: Vec2[];
}

export interface LineConfig extends ShapeNodeConfig {
  type: "line";
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface PathCommandConfig {
  command: PathCommandLetter;
  args?: number[];
}

export interface PathConfig extends ShapeNodeConfig {
  type: "path";
  d: PathCommandConfig[];
  pathLength?: number;
}

export type SceneNodeConfig =
  | NestedSvgConfig
  | GroupConfig
  | CircleConfig
  | EllipseConfig
  | RectConfig
  | PolygonConfig
  | PolylineConfig
  | LineConfig
  | PathConfig;

// ---- Zod schemas ----

/** Numbers consumed by one repetition of each path command */
export const PATH_COMMAND_ARITY: Record<PathCommandLetter, number> = {
  M: 2, m: 2,
  Z: 0, z: 0,
  L: 2, l: 2,
  H: 1, h: 1,
  V: 1, v: 1,
  C: 6, c: 6,
  S: 4, s: 4,
  Q: 4, q: 4,
  T: 2, t: 2,
  A: 7, a: 7,
};

const Vec2Schema = z.tuple([z.number(), z.number()]);
const ViewBoxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const TransformSchema = z.union([
  z.object({
    matrix: z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]),
  }).strict(),
  z.object({ translate: Vec2Schema }).strict(),
  z.object({ scale: Vec2Schema }).strict(),
  z.object({ rotate: z.tuple([z.number(), z.number(), z.number()]) }).strict(),
  z.object({ skewX: z.number() }).strict(),
  z.object({ skewY: z.number() }).strict(),
]);

const baseFields = {
  style: z.record(z.string()).optional(),
  class: z.string().optional(),
  externalResourcesRequired: z.boolean().optional(),
};

const shapeFields = {
  ...baseFields,
  transform: z.array(TransformSchema).optional(),
};

const PathCommandSchema = z
  .object({
    command: z.enum([
      "M", "m", "Z", "z", "L", "l", "H", "h", "V", "v",
      "C", "c", "S", "s", "Q", "q", "T", "t", "A", "a",
    ]),
    args: z.array(z.number()).optional(),
  })
  .superRefine((cmd, ctx) => {
    const arity = PATH_COMMAND_ARITY[cmd.command];
    const count = cmd.args?.length ?? 0;
    if (arity === 0 ? count !== 0 : count % arity !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["args"],
        message: `"${cmd.command}" takes arguments in groups of ${arity}, got ${count}`,
      });
    }
  });

const ChildrenSchema = z.array(z.lazy(() => SceneNodeSchema)).optional();

const NestedSvgSchema = z.object({
  ...baseFields,
  type: z.literal("svg"),
  width: z.number(),
  height: z.number(),
  x: z.number().optional(),
  y: z.number().optional(),
  viewBox: ViewBoxSchema.optional(),
  children: ChildrenSchema,
});

const GroupSchema = z.object({
  ...shapeFields,
  type: z.literal("group"),
  children: ChildrenSchema,
});

const CircleSchema = z.object({
  ...shapeFields,
  type: z.literal("circle"),
  cx: z.number(),
  cy: z.number(),
  r: z.number(),
});

const EllipseSchema = z.object({
  ...shapeFields,
  type: z.literal("ellipse"),
  cx: z.number(),
  cy: z.number(),
  rx: z.number(),
  ry: z.number(),
});

const RectSchema = z.object({
  ...shapeFields,
  type: z.literal("rect"),
  x: z.number().optional(),
  y: z.number().optional(),
  width: z.number(),
  height: z.number(),
});

const PolygonSchema = z.object({
  ...shapeFields,
  type: z.literal("polygon"),
  points: z.array(Vec2Schema),
});

const PolylineSchema = z.object({
  ...shapeFields,
  type: z.literal("polyline"),
  points: z.array(Vec2Schema),
});

const LineSchema = z.object({
  ...shapeFields,
  type: z.literal("line"),
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
});

const PathSchema = z.object({
  ...shapeFields,
  type: z.literal("path"),
  d: z.array(PathCommandSchema),
  pathLength: z.number().optional(),
});

export const SceneNodeSchema: z.ZodType<SceneNodeConfig> = z.lazy(() =>
  z.discriminatedUnion("type", [
    NestedSvgSchema,
    GroupSchema,
    CircleSchema,
    EllipseSchema,
    RectSchema,
    PolygonSchema,
    PolylineSchema,
    LineSchema,
    PathSchema,
  ]),
);

const DocumentSchema = z.object({
  ...baseFields,
  width: z.number(),
  height: z.number(),
  x: z.number().optional(),
  y: z.number().optional(),
  viewBox: ViewBoxSchema.optional(),
  mode: z.enum(["document", "fragment"]).optional(),
  children: ChildrenSchema,
});

export const SceneConfigSchema = z.object({
  version: z.string(),
  document: DocumentSchema,
});
