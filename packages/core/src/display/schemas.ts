/**
 * Zod schemas for untyped data and options arriving at the dispatcher.
 */

import { z } from "zod";

import { InvalidInputError } from "../errors";
import { LIST_STYLES } from "../render/glyphs";

export const ScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

/** Plain nested data as it arrives in JSON */
export type TreeJson =
  | string
  | number
  | boolean
  | null
  | TreeJson[]
  | { [key: string]: TreeJson };

export const TreeJsonSchema: z.ZodType<TreeJson> = z.lazy(() =>
  z.union([
    ScalarSchema,
    z.array(TreeJsonSchema),
    z.record(TreeJsonSchema),
  ])
);

// Widths are only checked for type here; renderers reject non-positive
// widths as configuration errors.
const WidthSchema = z.number().optional();

// ---------------------------------------------------------------------------
// Data
// ---------------------------------------------------------------------------

export const BoxDataSchema = z.union([
  z.string(),
  z.object({
    content: z.string(),
    title: z.string().optional(),
  }),
]);

export const TableDataSchema = z.array(
  z.union([z.array(ScalarSchema), z.record(ScalarSchema)])
);

// Plain objects follow JavaScript key order (integer-like keys first);
// `[key, value]` pairs keep the order they are given in.
export const TreeDataSchema = z.union([
  z.record(TreeJsonSchema),
  z.array(z.tuple([z.string(), TreeJsonSchema])),
]);

export const ListDataSchema = z.array(ScalarSchema);

export const BarChartDataSchema = z.union([
  z.record(z.number()),
  z.array(z.tuple([z.string(), z.number()])),
]);

export const ProgressDataSchema = z.object({
  value: z.number(),
  total: z.number(),
  label: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

// Unknown option names are rejected so misspellings surface.

export const BoxOptionsSchema = z
  .object({
    title: z.string().optional(),
    width: WidthSchema,
  })
  .strict();

export const TableOptionsSchema = z
  .object({
    headers: z.array(z.string()).optional(),
    width: WidthSchema,
  })
  .strict();

export const TreeOptionsSchema = z.object({}).strict();

export const ListOptionsSchema = z
  .object({
    numbered: z.boolean().optional(),
    style: z.enum(LIST_STYLES).optional(),
    width: WidthSchema,
  })
  .strict();

export const BarChartOptionsSchema = z
  .object({
    width: WidthSchema,
    show_values: z.boolean().optional(),
  })
  .strict();

export const ProgressOptionsSchema = z
  .object({
    width: WidthSchema,
    label: z.string().optional(),
  })
  .strict();

/**
 * Parse a value, turning the first zod issue into an InvalidInputError.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const path = issue && issue.path.length > 0 ? issue.path.join(".") : "";
  const where = path ? ` at ${path}` : "";
  throw new InvalidInputError(
    `Invalid ${what}${where}: ${issue?.message ?? "invalid value"}`,
    path ? { path } : {}
  );
}
