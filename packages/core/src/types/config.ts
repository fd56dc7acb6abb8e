import { z } from "zod";
import { ConfigError } from "../errors.js";

// ---- Primitives ----

const Coordinate = z.number().finite();
const Length = z.number().finite().nonnegative();

const HEX_COLOR = /^#(?:[0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const FUNCTIONAL_COLOR = /^(?:rgba?|hsla?)\(\s*[-+0-9.%,\s/a-z]+\)$/i;
const KEYWORD_COLOR = /^[a-z]+$/i;

/** Lightweight color check: hex, rgb()/hsl() notation or a CSS keyword. */
export function isColor(value: string): boolean {
  return HEX_COLOR.test(value) || FUNCTIONAL_COLOR.test(value) || KEYWORD_COLOR.test(value);
}

export const ColorSchema = z
  .string()
  .trim()
  .refine(isColor, (value) => ({ message: `Invalid color "${value}"` }));

export const PointTupleSchema = z.tuple([Coordinate, Coordinate]);
export type PointTuple = [number, number];

// ---- Appearance ----

export const AppearanceConfigSchema = z
  .object({
    fill: ColorSchema.optional(),
    fillOpacity: z.number().min(0).max(1).optional(),
    stroke: ColorSchema.optional(),
    strokeWidth: Length.optional(),
    strokeDasharray: z.array(Length).min(1).optional(),
  })
  .strict();

// ---- Geometry, one schema per component kind ----

export const CircleConfigSchema = z
  .object({
    cx: Coordinate.default(50),
    cy: Coordinate.default(50),
    r: Length.default(50),
  })
  .strict();

export const RectangleConfigSchema = z
  .object({
    x: Coordinate.default(0),
    y: Coordinate.default(0),
    width: Length.default(200),
    height: Length.default(100),
    rx: Length.optional(),
    ry: Length.optional(),
  })
  .strict();

export const PolylineConfigSchema = z
  .object({
    points: z.array(PointTupleSchema).min(1, "Polyline must have at least one point"),
  })
  .strict();

export const TextAnchorSchema = z.enum(["start", "middle", "end"]);
export const DominantBaselineSchema = z.enum(["auto", "middle", "hanging", "central"]);

export const TextConfigSchema = z
  .object({
    x: Coordinate.default(0),
    y: Coordinate.default(0),
    text: z.string().default(""),
    fontSize: Length.default(12),
    fontFamily: z.string().min(1).default("Arial"),
    color: ColorSchema.default("black"),
    textAnchor: TextAnchorSchema.default("middle"),
    dominantBaseline: DominantBaselineSchema.default("central"),
  })
  .strict();

export const ImageConfigSchema = z
  .object({
    x: Coordinate.default(0),
    y: Coordinate.default(0),
    width: Length.default(100),
    height: Length.default(100),
    href: z.string().min(1, "Image href is required"),
    preserveAspectRatio: z.string().min(1).default("xMidYMid meet"),
  })
  .strict();

export const NestedSvgConfigSchema = z
  .object({
    x: Coordinate.default(0),
    y: Coordinate.default(0),
    width: Length.default(100),
    height: Length.default(100),
    content: z.string(),
  })
  .strict();

// ---- Inferred types ----

export type AppearanceConfig = Readonly<z.output<typeof AppearanceConfigSchema>>;
export type AppearanceConfigInput = z.input<typeof AppearanceConfigSchema>;

export type CircleConfig = Readonly<z.output<typeof CircleConfigSchema>>;
export type CircleConfigInput = z.input<typeof CircleConfigSchema>;

export type RectangleConfig = Readonly<z.output<typeof RectangleConfigSchema>>;
export type RectangleConfigInput = z.input<typeof RectangleConfigSchema>;

export type PolylineConfig = z.output<typeof PolylineConfigSchema>;
export type PolylineConfigInput = z.input<typeof PolylineConfigSchema>;

export type TextAnchor = z.output<typeof TextAnchorSchema>;
export type DominantBaseline = z.output<typeof DominantBaselineSchema>;
export type TextConfig = Readonly<z.output<typeof TextConfigSchema>>;
export type TextConfigInput = z.input<typeof TextConfigSchema>;

export type ImageConfig = Readonly<z.output<typeof ImageConfigSchema>>;
export type ImageConfigInput = z.input<typeof ImageConfigSchema>;

export type NestedSvgConfig = Readonly<z.output<typeof NestedSvgConfigSchema>>;
export type NestedSvgConfigInput = z.input<typeof NestedSvgConfigSchema>;

/**
 * Validate `input` against `schema`, throwing a ConfigError that lists every
 * issue as `path: message`.
 */
export function parseSchema<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
  );
}
