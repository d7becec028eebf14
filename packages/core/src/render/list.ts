/**
 * List rendering: bulleted or numbered items.
 */

import { assertWidth } from "../errors";
import { EMPTY_BLOCK, newBlock } from "./block";
import { LIST_PREFIX, type ListStyle } from "./glyphs";
import { scalarText, splitLines, wrap } from "./text";
import type { Block, Scalar } from "./types";

export interface ListOptions {
  /** Number items (`1. `) instead of using a bullet. Default: false */
  numbered?: boolean | undefined;
  /** Bullet style when not numbered. Default: "bullet" */
  style?: ListStyle | undefined;
  /** Wrap items to this total width, under a hanging indent */
  width?: number | undefined;
}

/**
 * Render items one per line. Numbers are right-aligned to the widest
 * ordinal; continuation lines hang under the item text.
 */
export function listDisplay(
  items: readonly Scalar[],
  options: ListOptions = {}
): Block {
  if (options.width !== undefined) {
    assertWidth(options.width);
  }
  if (items.length === 0) {
    return EMPTY_BLOCK;
  }

  const digits = String(items.length).length;
  const bullet = LIST_PREFIX[options.style ?? "bullet"];

  const lines: string[] = [];
  for (const [i, item] of items.entries()) {
    const prefix = options.numbered
      ? `${String(i + 1).padStart(digits)}. `
      : bullet;
    const text = scalarText(item);
    const body =
      options.width === undefined
        ? splitLines(text)
        : wrap(text, Math.max(1, options.width - prefix.length));

    const hanging = " ".repeat(prefix.length);
    for (const [j, line] of body.entries()) {
      lines.push(`${j === 0 ? prefix : hanging}${line}`);
    }
  }

  return newBlock(lines);
}
