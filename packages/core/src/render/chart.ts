/**
 * Bar charts and progress bars.
 *
 * ```
 * apples ########## 10
 * pears  #####       5
 *
 * [#####.....] 50%
 * ```
 */

import { assertWidth, InvalidInputError } from "../errors";
import { EMPTY_BLOCK, newBlock } from "./block";
import { DEFAULT_RENDER_CONFIG } from "./config";
import { BAR } from "./glyphs";
import { maxLineLength, normalizeWhitespace } from "./text";
import type { Block, ChartData, RenderConfig } from "./types";

/** " 100%" */
const PERCENT_SUFFIX_WIDTH = 5;

export interface BarChartOptions {
  /** Total chart width. Defaults to the config width. */
  width?: number | undefined;
  /** Append each raw value right of its bar. Default: false */
  showValues?: boolean | undefined;
}

export interface ProgressOptions {
  /** Number of bar cells. Defaults to what fits the config width. */
  width?: number | undefined;
  label?: string | undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Horizontal bar chart. Bars scale to the largest value; the label column
 * is as wide as the longest label.
 */
export function barChart(
  data: ChartData,
  options: BarChartOptions = {},
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): Block {
  const width = options.width ?? config.width;
  assertWidth(width);

  for (const [label, value] of data) {
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(
        `Bar chart value for "${label}" must be a non-negative number, got ${String(value)}`,
        { path: `values.${label}` }
      );
    }
  }
  if (data.length === 0) {
    return EMPTY_BLOCK;
  }

  const showValues = options.showValues ?? false;
  const labels = data.map(([label]) => normalizeWhitespace(label));
  const values = data.map(([, value]) => String(value));
  const labelWidth = maxLineLength(labels);
  const valueWidth = maxLineLength(values);

  const reserved = labelWidth + 1 + (showValues ? 1 + valueWidth : 0);
  const available = Math.max(1, width - reserved);
  const maxValue = Math.max(...data.map(([, value]) => value));

  const lines = data.map(([, value], i) => {
    const length =
      maxValue > 0 ? Math.round((value / maxValue) * available) : 0;
    const bar = BAR.filled.repeat(length).padEnd(available);
    const label = (labels[i] ?? "").padEnd(labelWidth);
    const suffix = showValues ? ` ${(values[i] ?? "").padStart(valueWidth)}` : "";
    return `${label} ${bar}${suffix}`;
  });

  return newBlock(lines);
}

/**
 * Progress bar: `[#####.....] 50%`.
 *
 * The filled portion and the percentage are clamped, so values past the
 * total (or below zero) render as a full (or empty) bar.
 */
export function progress(
  value: number,
  total: number,
  options: ProgressOptions = {},
  config: RenderConfig = DEFAULT_RENDER_CONFIG
): Block {
  if (!Number.isFinite(total) || total <= 0) {
    throw new InvalidInputError(
      `Progress total must be a positive number, got ${String(total)}`,
      { path: "total" }
    );
  }
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(
      `Progress value must be a finite number, got ${String(value)}`,
      { path: "value" }
    );
  }

  const label =
    options.label === undefined ? "" : normalizeWhitespace(options.label);
  const lead = label === "" ? "" : `${label} `;

  let cells: number;
  if (options.width === undefined) {
    assertWidth(config.width);
    const decoration =
      lead.length + BAR.open.length + BAR.close.length + PERCENT_SUFFIX_WIDTH;
    cells = Math.max(1, config.width - decoration);
  } else {
    assertWidth(options.width);
    cells = options.width;
  }

  const ratio = value / total;
  const filled = clamp(Math.round(ratio * cells), 0, cells);
  const percent = clamp(Math.round(ratio * 100), 0, 100);
  const bar = BAR.filled.repeat(filled) + BAR.empty.repeat(cells - filled);

  return newBlock([`${lead}${BAR.open}${bar}${BAR.close} ${percent}%`]);
}
