/**
 * Built-in display kinds: validate untyped data and options, then hand
 * typed values to the renderers.
 */

import { isBlock } from "../render/block";
import { box } from "../render/box";
import { barChart, progress } from "../render/chart";
import { listDisplay } from "../render/list";
import { rowsFrom, table } from "../render/table";
import { leaf, list, node, orderedNode, tree } from "../render/tree";
import type { ChartData, TreeValue } from "../render/types";
import {
  BarChartDataSchema,
  BarChartOptionsSchema,
  BoxDataSchema,
  BoxOptionsSchema,
  ListDataSchema,
  ListOptionsSchema,
  parseWith,
  ProgressDataSchema,
  ProgressOptionsSchema,
  TableDataSchema,
  TableOptionsSchema,
  TreeDataSchema,
  TreeOptionsSchema,
  type TreeJson,
} from "./schemas";
import type { BuiltinKind, DisplayRenderer } from "./types";

/** Convert plain nested data into a tree value. */
export function toTreeValue(value: TreeJson): TreeValue {
  if (Array.isArray(value)) {
    return list(value.map((item) => toTreeValue(item)));
  }
  if (value !== null && typeof value === "object") {
    const entries: Record<string, TreeValue> = {};
    for (const [key, child] of Object.entries(value)) {
      entries[key] = toTreeValue(child);
    }
    return node(entries);
  }
  return leaf(value);
}

const renderBox: DisplayRenderer = (data, options, dispatcher) => {
  const opts = parseWith(BoxOptionsSchema, options, "box options");
  if (isBlock(data)) {
    return box(data, opts, dispatcher.config);
  }
  const parsed = parseWith(BoxDataSchema, data, "box data");
  if (typeof parsed === "string") {
    return box(parsed, opts, dispatcher.config);
  }
  return box(
    parsed.content,
    { title: opts.title ?? parsed.title, width: opts.width },
    dispatcher.config
  );
};

const renderTable: DisplayRenderer = (data, options, dispatcher) => {
  const opts = parseWith(TableOptionsSchema, options, "table options");
  const rows = rowsFrom(parseWith(TableDataSchema, data, "table rows"));
  return table(rows, opts, dispatcher.config);
};

const renderTree: DisplayRenderer = (data, options) => {
  parseWith(TreeOptionsSchema, options, "tree options");
  const parsed = parseWith(TreeDataSchema, data, "tree data");
  const pairs = Array.isArray(parsed) ? parsed : Object.entries(parsed);
  return tree(
    orderedNode(
      pairs.map(([key, value]): [string, TreeValue] => [key, toTreeValue(value)])
    )
  );
};

const renderList: DisplayRenderer = (data, options) => {
  const opts = parseWith(ListOptionsSchema, options, "list options");
  return listDisplay(parseWith(ListDataSchema, data, "list items"), opts);
};

const renderBarChart: DisplayRenderer = (data, options, dispatcher) => {
  const opts = parseWith(BarChartOptionsSchema, options, "bar chart options");
  const values = parseWith(BarChartDataSchema, data, "bar chart values");
  const series: ChartData = Array.isArray(values)
    ? values
    : Object.entries(values);
  return barChart(
    series,
    { width: opts.width, showValues: opts.show_values },
    dispatcher.config
  );
};

const renderProgress: DisplayRenderer = (data, options, dispatcher) => {
  const opts = parseWith(ProgressOptionsSchema, options, "progress options");
  const parsed = parseWith(ProgressDataSchema, data, "progress data");
  return progress(
    parsed.value,
    parsed.total,
    { width: opts.width, label: opts.label ?? parsed.label },
    dispatcher.config
  );
};

export const BUILTIN_RENDERERS: Readonly<Record<BuiltinKind, DisplayRenderer>> = {
  box: renderBox,
  table: renderTable,
  tree: renderTree,
  list: renderList,
  bar_chart: renderBarChart,
  progress: renderProgress,
};
