import { z } from "zod";
import { ColorSchema, PointTupleSchema } from "./config.js";

// ---- Scene file schema ----

const Num = z.number().finite();
const Limit = z.number().finite().nonnegative();
const Extent = z.number().finite().positive();

const TranslateEntrySchema = z.object({ translate: z.tuple([Num, Num]) }).strict();

const ScaleEntrySchema = z
  .object({ scale: z.union([Num, z.tuple([Num, Num])]) })
  .strict();

const RotateEntrySchema = z
  .object({
    rotate: z.union([
      Num,
      z.object({ angle: Num, pivot: PointTupleSchema.optional() }).strict(),
    ]),
  })
  .strict();

export const TransformEntrySchema = z.union([
  TranslateEntrySchema,
  ScaleEntrySchema,
  RotateEntrySchema,
]);

export const ComponentTypeSchema = z.enum([
  "circle",
  "rectangle",
  "polyline",
  "text",
  "image",
  "svg",
]);

// Geometry and appearance stay loose here; the component constructors
// validate them so one bad component can be reported on its own.
export const SceneComponentSchema = z.object({
  type: ComponentTypeSchema,
  id: z.string().optional(),
  config: z.record(z.unknown()).default({}),
  appearance: z.record(z.unknown()).optional(),
  transforms: z.array(TransformEntrySchema).default([]),
  restrictSize: z.tuple([Limit, Limit]).optional(),
}).strict();

export const CanvasConfigSchema = z.object({
  width: Extent,
  height: Extent,
  viewBox: z.tuple([Num, Num, Extent, Extent]).optional(),
  background: ColorSchema.optional(),
}).strict();

export const SceneConfigSchema = z.object({
  version: z.string(),
  title: z.string().optional(),
  canvas: CanvasConfigSchema,
  components: z.array(SceneComponentSchema).default([]),
}).strict();

export type TransformEntry = z.output<typeof TransformEntrySchema>;
export type ComponentType = z.output<typeof ComponentTypeSchema>;
export type SceneComponentConfig = z.output<typeof SceneComponentSchema>;
export type CanvasConfig = z.output<typeof CanvasConfigSchema>;
export type SceneConfig = z.output<typeof SceneConfigSchema>;

// ---- Validation results ----

export type SceneIssueCode =
  | "invalid-component"
  | "indeterminate-restrict-size"
  | "indeterminate-center"
  | "outside-canvas";

export interface SceneIssue {
  code: SceneIssueCode;
  severity: "error" | "warning";
  message: string;
  componentIndex: number;
  componentId: string | null;
  suggestion?: string;
}

export interface SceneValidationResult {
  errors: SceneIssue[];
  warnings: SceneIssue[];
}
