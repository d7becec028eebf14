/**
 * Glyphs used across rendered output.
 *
 * Everything here is 7-bit ASCII; no box-drawing characters.
 */

/** Frame characters for boxes */
export const FRAME = {
  /** Corner joint (+) */
  corner: "+",
  /** Horizontal edge (-) */
  horizontal: "-",
  /** Vertical edge (|) */
  vertical: "|",
} as const;

/** Tree guides. Every segment is one indentation level wide. */
export const TREE = {
  /** Branch connector, used for last and non-last siblings alike */
  branch: "+-- ",
  /** Continuation under a still-open ancestor */
  pipe: "|   ",
  /** Continuation under a closed ancestor */
  empty: "    ",
} as const;

export const LIST_STYLES = [
  "bullet",
  "arrow",
  "dash",
  "check",
  "uncheck",
] as const;

export type ListStyle = (typeof LIST_STYLES)[number];

/** List item prefixes by style */
export const LIST_PREFIX: Record<ListStyle, string> = {
  bullet: "* ",
  arrow: "-> ",
  dash: "- ",
  check: "[x] ",
  uncheck: "[ ] ",
};

/** Bar and progress fill */
export const BAR = {
  filled: "#",
  empty: ".",
  open: "[",
  close: "]",
} as const;

/** Rule drawn under a table header */
export const RULE = "-";

/** Gap between table columns */
export const COLUMN_GAP = "  ";

/** Marker appended to truncated text */
export const ELLIPSIS = "...";
