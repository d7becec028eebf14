import type { Block } from "../render/types";
import type { Dispatcher } from "./dispatcher";

/** Kinds registered on every dispatcher */
export const BUILTIN_KINDS = [
  "box",
  "table",
  "tree",
  "list",
  "bar_chart",
  "progress",
] as const;

export type BuiltinKind = (typeof BUILTIN_KINDS)[number];

/** Recognized option names mapped to their values */
export type DisplayOptions = Readonly<Record<string, unknown>>;

/** Selects the renderer that interprets a data value */
export interface DisplaySpec {
  kind: string;
  options?: DisplayOptions | undefined;
}

/**
 * A renderer for one display kind. Receives the dispatcher so it can render
 * nested sections through built-in or other custom kinds.
 */
export type DisplayRenderer = (
  data: unknown,
  options: DisplayOptions,
  dispatcher: Dispatcher
) => Block;

/** Per-kind option defaults, merged under the options of each spec */
export type DisplayDefaults = Readonly<Record<string, DisplayOptions>>;
