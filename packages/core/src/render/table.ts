/**
 * Table renderer.
 *
 * ```
 * name   age  city
 * ----------------------
 * Alice  30   New York
 * Bob    25   London
 * ```
 */

import { assertWidth, InvalidInputError } from "../errors";
import { newBlock } from "./block";
import { DEFAULT_RENDER_CONFIG } from "./config";
import { COLUMN_GAP } from "./glyphs";
import {
  cleanText,
  hr,
  maxLineLength,
  scalarText,
  splitLines,
  wrap,
} from "./text";
import type {
  Block,
  KeyedRow,
  PositionalRow,
  RenderConfig,
  Scalar,
  TableRow,
} from "./types";

export interface TableOptions {
  /**
   * Column order. Inferred from the first keyed row when omitted, in
   * JavaScript key order (integer-like keys first).
   */
  headers?: readonly string[] | undefined;
  /** Maximum table width. Defaults to the config width. */
  width?: number | undefined;
}

/** Loosely shaped row as it arrives from callers that hold plain data */
export type RawRow = readonly Scalar[] | Readonly<Record<string, Scalar>>;

export function positionalRow(cells: readonly Scalar[]): PositionalRow {
  return { kind: "positional", cells };
}

export function keyedRow(cells: Readonly<Record<string, Scalar>>): KeyedRow {
  return { kind: "keyed", cells };
}

/**
 * Resolve raw rows into tagged rows. The first row decides the shape;
 * a row of the other shape is rejected.
 */
export function rowsFrom(raw: readonly RawRow[]): TableRow[] {
  const [first] = raw;
  if (first === undefined) {
    return [];
  }
  const positional = Array.isArray(first);

  return raw.map((row, index) => {
    if (Array.isArray(row) !== positional) {
      throw new InvalidInputError(
        `Row ${index} mixes row shapes: expected ${positional ? "a list of values" : "a mapping"} like row 0`,
        { path: `rows.${index}` }
      );
    }
    return isPositional(row) ? positionalRow(row) : keyedRow(row);
  });
}

function isPositional(row: RawRow): row is readonly Scalar[] {
  return Array.isArray(row);
}

function resolveHeaders(
  rows: readonly TableRow[],
  headers: readonly string[] | undefined
): string[] {
  if (headers !== undefined) {
    if (headers.length === 0) {
      throw new InvalidInputError("Table requires at least one header", {
        path: "headers",
      });
    }
    const seen = new Set<string>();
    for (const header of headers) {
      if (seen.has(header)) {
        throw new InvalidInputError(`Duplicate table header: ${header}`, {
          path: "headers",
        });
      }
      seen.add(header);
    }
    return [...headers];
  }

  const [first] = rows;
  if (first === undefined) {
    throw new InvalidInputError(
      "Table headers cannot be determined: no headers and no rows",
      { path: "headers" }
    );
  }
  if (first.kind === "positional") {
    throw new InvalidInputError(
      "Table headers are required when rows are lists of values",
      { path: "headers" }
    );
  }
  const inferred = Object.keys(first.cells);
  if (inferred.length === 0) {
    throw new InvalidInputError(
      "Table headers cannot be determined: first row is empty",
      { path: "headers" }
    );
  }
  return inferred;
}

function resolveCells(
  rows: readonly TableRow[],
  headers: readonly string[]
): string[][] {
  const shape = rows[0]?.kind;

  return rows.map((row, index) => {
    if (row.kind !== shape) {
      throw new InvalidInputError(
        `Row ${index} is ${row.kind} but row 0 is ${String(shape)}; mixed row shapes are not supported`,
        { path: `rows.${index}` }
      );
    }

    if (row.kind === "positional") {
      if (row.cells.length > headers.length) {
        throw new InvalidInputError(
          `Row ${index} has ${row.cells.length} cells but there are only ${headers.length} headers`,
          { path: `rows.${index}` }
        );
      }
      return headers.map((_, column) => scalarText(row.cells[column]));
    }

    return headers.map((header) =>
      Object.hasOwn(row.cells, header) ? scalarText(row.cells[header]) : ""
    );
  });
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

interface ColumnShare {
  index: number;
  natural: number;
  width: number;
  remainder: number;
}

/**
 * Shrink columns to fit `available` characters, each column giving up
 * space in proportion to its own width. Largest remainders get the
 * leftover columns so the result is exact and deterministic.
 */
export function shrinkColumns(
  natural: readonly number[],
  available: number
): number[] {
  const total = sum(natural);
  if (total <= available) {
    return [...natural];
  }
  if (available <= natural.length) {
    return natural.map(() => 1);
  }

  const shares: ColumnShare[] = natural.map((width, index) => {
    const exact = (width * available) / total;
    return {
      index,
      natural: width,
      width: Math.max(1, Math.floor(exact)),
      remainder: exact - Math.floor(exact),
    };
  });

  let used = sum(shares.map((share) => share.width));

  const byRemainder = [...shares].sort(
    (a, b) => b.remainder - a.remainder || a.index - b.index
  );
  while (used < available) {
    let grew = false;
    for (const share of byRemainder) {
      if (used >= available) {
        break;
      }
      if (share.width < share.natural) {
        share.width += 1;
        used += 1;
        grew = true;
      }
    }
    if (!grew) {
      break;
    }
  }

  // Floors of 1 can overshoot; take the excess back from the widest.
  while (used > available) {
    let widest: ColumnShare | undefined;
    for (const share of shares) {
      if (share.width > 1 && (!widest || share.width > widest.width)) {
        widest = share;
      }
    }
    if (!widest) {
      break;
    }
    widest.width -= 1;
    used -= 1;
  }

  return shares.map((share) => share.width);
}

function cellLines(text: string, width: number): string[] {
  const lines = splitLines(text);
  if (lines.every((line) => line.length <= width)) {
    return lines;
  }
  return wrap(text, width);
}

function renderRow(
  cells: readonly string[],
  widths: readonly number[]
): string[] {
  const columns = widths.map((width, column) => ({
    width,
    lines: cellLines(cells[column] ?? "", width),
  }));
  const height = Math.max(1, ...columns.map((col) => col.lines.length));

  const lines: string[] = [];
  for (let row = 0; row < height; row += 1) {
    lines.push(
      columns
        .map((col) => (col.lines[row] ?? "").padEnd(col.width))
        .join(COLUMN_GAP)
    );
  }
  return lines;
}

/**
 * Render rows as a table: header, one rule, then the data rows.
 *
 * Columns are as wide as their widest cell. When the table would exceed
 * the width limit, columns shrink proportionally and cells wrap, padding
 * every cell in a row to the row's tallest cell.
 */
export function table(
  rows: readonly TableRow[],
  options: TableOptions = {},
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): Block {
  const limit = options.width ?? config.width;
  assertWidth(limit);

  const headers = resolveHeaders(rows, options.headers);
  const cells = resolveCells(rows, headers);
  // Headers stay raw for cell lookup; only their display text is cleaned.
  const labels = headers.map((header) => cleanText(header));

  const natural = labels.map((header, column) => {
    let width = Math.max(1, maxLineLength(splitLines(header)));
    for (const row of cells) {
      width = Math.max(width, maxLineLength(splitLines(row[column] ?? "")));
    }
    return width;
  });

  const gaps = COLUMN_GAP.length * (labels.length - 1);
  const widths = shrinkColumns(natural, limit - gaps);
  const tableWidth = sum(widths) + gaps;

  const lines = [...renderRow(labels, widths), hr(tableWidth)];
  for (const row of cells) {
    lines.push(...renderRow(row, widths));
  }

  return newBlock(lines);
}
