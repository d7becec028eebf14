import { z } from "zod";

import { DEFAULT_WIDTH } from "../render/config";
import { LIST_STYLES } from "../render/glyphs";

/**
 * List display defaults.
 */
export const ListConfigSchema = z.object({
  /** Bullet style for unnumbered lists */
  style: z.enum(LIST_STYLES).default("bullet"),
  /** Number list items by default */
  numbered: z.boolean().default(false),
});

export type ListConfig = z.infer<typeof ListConfigSchema>;

/**
 * Bar chart defaults.
 */
export const ChartConfigSchema = z.object({
  /** Append raw values to bars */
  show_values: z.boolean().default(false),
});

export type ChartConfig = z.infer<typeof ChartConfigSchema>;

/**
 * Textblock configuration schema.
 * Stored in <config dir>/textblock/config.toml (user) and .textblock.toml (project)
 */
export const TextblockConfigSchema = z.object({
  /** Default layout width in columns */
  width: z.number().int().positive().default(DEFAULT_WIDTH),
  list: ListConfigSchema.default({}),
  chart: ChartConfigSchema.default({}),
});

export type TextblockConfig = z.infer<typeof TextblockConfigSchema>;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TextblockConfig = TextblockConfigSchema.parse({});
