/**
 * Box renderer: frames content with an optional title.
 *
 * ```
 * +-- Title -------+
 * | Content line 1 |
 * | Content line 2 |
 * +----------------+
 * ```
 */

import { InvalidConfigError } from "../errors";
import { isBlock, newBlock } from "./block";
import { DEFAULT_RENDER_CONFIG } from "./config";
import { FRAME } from "./glyphs";
import { cleanText, normalizeWhitespace, truncate, wrap } from "./text";
import type { Block, RenderConfig } from "./types";

/** Border plus one column of padding on each side */
const FRAME_OVERHEAD = 4;
/** "+--" before the title, " " either side of it, "+" at the end */
const TITLE_OVERHEAD = 6;
const TITLE_LEAD = 2;

export interface BoxOptions {
  title?: string | undefined;
  /** Total frame width including borders. Defaults to the config width. */
  width?: number | undefined;
}

function contentLines(content: string | Block, inner: number): string[] {
  if (isBlock(content)) {
    const lines: string[] = [];
    for (const line of content.lines.map((raw) => cleanText(raw))) {
      if (line.length <= inner) {
        lines.push(line);
        continue;
      }
      // Pre-rendered lines keep their spacing; cut them instead of re-wrapping.
      for (let start = 0; start < line.length; start += inner) {
        lines.push(line.slice(start, start + inner));
      }
    }
    return lines.length > 0 ? lines : [""];
  }

  const lines: string[] = [];
  for (const line of cleanText(content).trim().split("\n")) {
    if (line.length <= inner) {
      lines.push(line.trimEnd());
    } else {
      lines.push(...wrap(line, inner));
    }
  }
  return lines;
}

function topBorder(width: number, title: string | undefined): string {
  const plain = `${FRAME.corner}${FRAME.horizontal.repeat(width - 2)}${FRAME.corner}`;
  if (title === undefined) {
    return plain;
  }

  // Keep at least one dash after the title.
  const room = width - TITLE_OVERHEAD - 1;
  const text = truncate(normalizeWhitespace(title), room);
  if (room <= 0 || text === "") {
    return plain;
  }

  const trailing = width - TITLE_OVERHEAD - text.length;
  return (
    FRAME.corner +
    FRAME.horizontal.repeat(TITLE_LEAD) +
    ` ${text} ` +
    FRAME.horizontal.repeat(trailing) +
    FRAME.corner
  );
}

/**
 * Draw a box of exactly `width` columns around content.
 *
 * Text content is trimmed and lines wider than the usable width are
 * wrapped. Block content keeps its layout; over-wide lines are cut at the
 * usable width. Titles that do not fit are truncated.
 */
export function box(
  content: string | Block,
  options: BoxOptions = {},
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): Block {
  const width = options.width ?? config.width;
  if (!Number.isInteger(width) || width <= FRAME_OVERHEAD) {
    throw new InvalidConfigError(
      `box width must be an integer greater than ${FRAME_OVERHEAD}, got ${String(width)}`
    );
  }

  const inner = width - FRAME_OVERHEAD;
  const lines = [topBorder(width, options.title)];
  for (const line of contentLines(content, inner)) {
    lines.push(
      `${FRAME.vertical} ${line.padEnd(inner)} ${FRAME.vertical}`
    );
  }
  lines.push(
    `${FRAME.corner}${FRAME.horizontal.repeat(width - 2)}${FRAME.corner}`
  );

  return newBlock(lines);
}
