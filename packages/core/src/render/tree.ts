/**
 * Tree rendering for hierarchical data.
 *
 * ```
 * +-- X
 * |   +-- a
 * |   +-- b
 * +-- Y
 *     +-- Z: c
 * ```
 */

import { newBlock } from "./block";
import { TREE } from "./glyphs";
import { normalizeWhitespace } from "./text";
import type { Block, TreeLeaf, TreeList, TreeNode, TreeValue } from "./types";

export function leaf(value: string | number | boolean | null): TreeLeaf {
  return { kind: "leaf", value: value === null ? "" : String(value) };
}

export function list(items: readonly TreeValue[]): TreeList {
  return { kind: "list", items };
}

/** A node from a record. Entries follow JavaScript key order. */
export function node(entries: Readonly<Record<string, TreeValue>>): TreeNode {
  return { kind: "node", entries: Object.entries(entries) };
}

/** A node whose entries keep the given order. */
export function orderedNode(
  entries: readonly (readonly [string, TreeValue])[]
): TreeNode {
  return { kind: "node", entries };
}

function guide(ancestorsOpen: readonly boolean[]): string {
  return ancestorsOpen.map((open) => (open ? TREE.pipe : TREE.empty)).join("");
}

function renderValue(
  label: string,
  value: TreeValue,
  ancestorsOpen: readonly boolean[],
  isLast: boolean,
  lines: string[]
): void {
  const prefix = guide(ancestorsOpen) + TREE.branch;
  const text = normalizeWhitespace(label);

  if (value.kind === "leaf") {
    lines.push(`${prefix}${text}: ${normalizeWhitespace(value.value)}`);
    return;
  }

  lines.push(`${prefix}${text}`);
  const childOpen = [...ancestorsOpen, !isLast];
  if (value.kind === "node") {
    renderEntries(value.entries, childOpen, lines);
  } else {
    renderItems(value.items, childOpen, lines);
  }
}

function renderEntries(
  entries: TreeNode["entries"],
  ancestorsOpen: readonly boolean[],
  lines: string[]
): void {
  const lastIndex = entries.length - 1;
  for (const [i, [key, value]] of entries.entries()) {
    renderValue(key, value, ancestorsOpen, i === lastIndex, lines);
  }
}

function renderItems(
  items: readonly TreeValue[],
  ancestorsOpen: readonly boolean[],
  lines: string[]
): void {
  const lastIndex = items.length - 1;
  for (const [i, item] of items.entries()) {
    if (item.kind === "leaf") {
      lines.push(
        `${guide(ancestorsOpen)}${TREE.branch}${normalizeWhitespace(item.value)}`
      );
      continue;
    }
    // Nested containers inside a list are labelled by position.
    renderValue(`[${i}]`, item, ancestorsOpen, i === lastIndex, lines);
  }
}

/**
 * Render a tree. Every key gets a guided line; scalar leaves render inline
 * as `key: value`; list items get their own guided lines one level deeper.
 * Indentation is four columns per level.
 *
 * Input must be acyclic.
 */
export function tree(data: TreeNode): Block {
  const lines: string[] = [];
  renderEntries(data.entries, [], lines);
  return newBlock(lines);
}
