/**
 * Core types for the render module.
 */

/**
 * Immutable, width-uniform multi-line text. Every line is exactly `width`
 * characters long.
 */
export interface Block {
  readonly lines: readonly string[];
  readonly width: number;
}

/** Process-wide rendering defaults, passed explicitly to every renderer */
export interface RenderConfig {
  readonly width: number;
}

/** Value allowed in a table cell or list item */
export type Scalar = string | number | boolean | null | undefined;

/** Row whose cells line up positionally with the headers */
export interface PositionalRow {
  readonly kind: "positional";
  readonly cells: readonly Scalar[];
}

/** Row whose cells are looked up by header name */
export interface KeyedRow {
  readonly kind: "keyed";
  readonly cells: Readonly<Record<string, Scalar>>;
}

export type TableRow = PositionalRow | KeyedRow;

/** Recursive tree value */
export type TreeValue = TreeLeaf | TreeList | TreeNode;

export interface TreeLeaf {
  readonly kind: "leaf";
  readonly value: string;
}

export interface TreeList {
  readonly kind: "list";
  readonly items: readonly TreeValue[];
}

export interface TreeNode {
  readonly kind: "node";
  /** Ordered entries; order is display order */
  readonly entries: readonly (readonly [string, TreeValue])[];
}

/** Label to value, in display order */
export type ChartData = readonly (readonly [string, number])[];
