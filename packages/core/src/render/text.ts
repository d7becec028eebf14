/**
 * Text primitives operating on single strings.
 */

import { assertWidth, InvalidInputError } from "../errors";
import { ELLIPSIS, RULE } from "./glyphs";
import type { Scalar } from "./types";

export type AlignMode = "left" | "center" | "right";

/** Columns between tab stops */
export const TAB_WIDTH = 4;

/** CSI escape sequences such as color codes */
const ESCAPE_SEQUENCE = /\u001b\[[0-?]*[ -/]*[@-~]/g;
/** C0 controls other than tab and newline, DEL, and C1 controls */
const CONTROL_CHAR = /[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g;

function expandTabs(line: string): string {
  if (!line.includes("\t")) {
    return line;
  }
  let out = "";
  for (const char of line) {
    out +=
      char === "\t" ? " ".repeat(TAB_WIDTH - (out.length % TAB_WIDTH)) : char;
  }
  return out;
}

/**
 * Make text safe to lay out: escape sequences and control characters are
 * removed and tabs expand to the next tab stop. Newlines are kept.
 */
export function cleanText(text: string): string {
  return text
    .replace(ESCAPE_SEQUENCE, "")
    .split("\n")
    .map((line) => expandTabs(line.replace(CONTROL_CHAR, "")))
    .join("\n");
}

/**
 * Wrap text to lines of at most `width` characters.
 *
 * Breaks at whitespace; a token longer than `width` is hard-broken at the
 * width boundary. Each input line is trimmed first and an empty input line
 * yields one empty output line, so the result is never empty.
 */
export function wrap(text: string, width: number): string[] {
  assertWidth(width);

  const lines: string[] = [];
  for (const rawLine of cleanText(text).split("\n")) {
    const trimmed = rawLine.trim();
    if (trimmed === "") {
      lines.push("");
      continue;
    }

    let current = "";
    for (const word of trimmed.split(/\s+/)) {
      if (current.length > 0 && current.length + 1 + word.length <= width) {
        current += ` ${word}`;
        continue;
      }
      if (current.length > 0) {
        lines.push(current);
      }
      let rest = word;
      while (rest.length > width) {
        lines.push(rest.slice(0, width));
        rest = rest.slice(width);
      }
      current = rest;
    }

    if (current.length > 0) {
      lines.push(current);
    }
  }

  return lines;
}

/**
 * Pad text to exactly `width` columns. Text already wider than `width` is
 * returned unchanged; wrap first when truncation is needed.
 */
export function align(
  text: string,
  width: number,
  mode: AlignMode = "left"
): string {
  assertWidth(width);
  if (text.length >= width) {
    return text;
  }

  const slack = width - text.length;
  switch (mode) {
    case "left":
      return text + " ".repeat(slack);
    case "right":
      return " ".repeat(slack) + text;
    case "center": {
      const left = Math.floor(slack / 2);
      return " ".repeat(left) + text + " ".repeat(slack - left);
    }
  }
}

/** A horizontal rule of `char` repeated `width` times. */
export function hr(width: number, char: string = RULE): string {
  assertWidth(width);
  if (!/^[ -~]$/.test(char)) {
    throw new InvalidInputError(
      `Rule character must be a single printable character, got ${JSON.stringify(char)}`
    );
  }
  return char.repeat(width);
}

/**
 * Truncate a string to a maximum length, marking the cut with "...".
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  if (maxLength <= ELLIPSIS.length) {
    return str.slice(0, Math.max(maxLength, 0));
  }
  return `${str.slice(0, maxLength - ELLIPSIS.length)}${ELLIPSIS}`;
}

/**
 * Normalize whitespace in a string (clean, collapse newlines, trim).
 */
export function normalizeWhitespace(str: string): string {
  return cleanText(str).replaceAll(/\s+/g, " ").trim();
}

/** Split text into lines, one per newline. */
export function splitLines(text: string): string[] {
  return text.split("\n");
}

/** Length of the longest line. */
export function maxLineLength(lines: readonly string[]): number {
  let max = 0;
  for (const line of lines) {
    max = Math.max(max, line.length);
  }
  return max;
}

/** Display text for a scalar; null and undefined render empty. */
export function scalarText(value: Scalar): string {
  if (value === null || value === undefined) {
    return "";
  }
  return cleanText(String(value));
}
