/**
 * Plain-ASCII layout engine.
 *
 * Renderers turn structured data into Blocks: immutable, width-uniform
 * multi-line text that composes into larger Blocks.
 *
 * @example
 * import { box, compose, table, positionalRow, toText } from "@textblock/core";
 *
 * const grid = table([positionalRow(["Alice", 30])], { headers: ["name", "age"] });
 * console.log(toText(compose([box("Report", { width: 20 }), grid], { spacing: 1 })));
 */

// Types
export type {
  Block,
  ChartData,
  KeyedRow,
  PositionalRow,
  RenderConfig,
  Scalar,
  TableRow,
  TreeLeaf,
  TreeList,
  TreeNode,
  TreeValue,
} from "./types";

// Config
export {
  createRenderConfig,
  DEFAULT_RENDER_CONFIG,
  DEFAULT_WIDTH,
} from "./config";

// Text primitives
export {
  align,
  cleanText,
  hr,
  maxLineLength,
  normalizeWhitespace,
  scalarText,
  splitLines,
  TAB_WIDTH,
  truncate,
  wrap,
  type AlignMode,
} from "./text";

// Glyphs
export {
  BAR,
  COLUMN_GAP,
  ELLIPSIS,
  FRAME,
  LIST_PREFIX,
  LIST_STYLES,
  RULE,
  TREE,
  type ListStyle,
} from "./glyphs";

// Block model
export {
  blockFromText,
  EMPTY_BLOCK,
  isBlock,
  newBlock,
  stack,
  toText,
  type StackOptions,
} from "./block";

// Renderers
export { box, type BoxOptions } from "./box";
export {
  keyedRow,
  positionalRow,
  rowsFrom,
  shrinkColumns,
  table,
  type RawRow,
  type TableOptions,
} from "./table";
export { leaf, list, node, orderedNode, tree } from "./tree";
export { listDisplay, type ListOptions } from "./list";
export {
  barChart,
  progress,
  type BarChartOptions,
  type ProgressOptions,
} from "./chart";

// Composition
export { compose, type ComposeOptions } from "./compose";
