import { blockFromText, stack, type StackOptions } from "./block";
import type { Block } from "./types";

export type ComposeOptions = StackOptions;

/**
 * Stack blocks (or plain text) vertically with `spacing` blank lines
 * between them. This is how custom displays assemble built-in output,
 * e.g. a box above a table.
 */
export function compose(
  items: readonly (Block | string)[],
  options: ComposeOptions = {}
): Block {
  return stack(
    items.map((item) => (typeof item === "string" ? blockFromText(item) : item)),
    options
  );
}
