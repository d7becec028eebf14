/**
 * Block model: the common currency between renderers.
 */

import { InvalidConfigError } from "../errors";
import { cleanText, hr, maxLineLength, splitLines } from "./text";
import type { Block } from "./types";

function freezeBlock(lines: string[], width: number): Block {
  return Object.freeze({ lines: Object.freeze(lines), width });
}

/**
 * Build a block from lines, padding every line to the longest one.
 * Embedded newlines split into separate lines; control characters are
 * cleaned out first.
 */
export function newBlock(lines: readonly string[]): Block {
  const flat = lines.flatMap((line) => splitLines(cleanText(line)));
  if (lines.length === 0) {
    return freezeBlock([], 0);
  }
  const width = maxLineLength(flat);
  return freezeBlock(
    flat.map((line) => line.padEnd(width)),
    width
  );
}

/** Build a block from multi-line text. */
export function blockFromText(text: string): Block {
  return newBlock(splitLines(text));
}

/** The empty block: no lines, width 0. */
export const EMPTY_BLOCK: Block = freezeBlock([], 0);

export function isBlock(value: unknown): value is Block {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("lines" in value) || !("width" in value)) {
    return false;
  }
  return (
    Array.isArray(value.lines) &&
    value.lines.every((line: unknown) => typeof line === "string") &&
    typeof value.width === "number"
  );
}

export interface StackOptions {
  /** Blank lines between consecutive blocks. Default: 0 */
  spacing?: number;
  /** Rule character drawn across the full width inside each gap */
  separator?: string;
}

/**
 * Vertical concatenation. Output width is the widest input; narrower
 * blocks are right-padded and keep their own alignment.
 */
export function stack(
  blocks: readonly Block[],
  options: StackOptions = {}
): Block {
  const spacing = options.spacing ?? 0;
  if (!Number.isInteger(spacing) || spacing < 0) {
    throw new InvalidConfigError(
      `spacing must be a non-negative integer, got ${String(spacing)}`
    );
  }

  const width = Math.max(0, ...blocks.map((block) => block.width));
  const blank = " ".repeat(width);
  const gap: string[] = Array.from({ length: spacing }, () => blank);
  if (options.separator !== undefined && width > 0) {
    gap.splice(Math.floor(spacing / 2), 0, hr(width, options.separator));
  }

  const lines: string[] = [];
  for (const [i, block] of blocks.entries()) {
    if (i > 0) {
      lines.push(...gap);
    }
    for (const line of block.lines) {
      lines.push(line.padEnd(width));
    }
  }

  return freezeBlock(lines, width);
}

/** Serialize a block: lines joined by newlines. */
export function toText(block: Block): string {
  return block.lines.join("\n");
}
