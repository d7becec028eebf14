import { describe, expect, test } from "vitest";

import { InvalidInputError } from "../src/errors";
import { barChart, progress } from "../src/render/chart";
import { createRenderConfig } from "../src/render/config";
import { thrown } from "./helpers";

describe("barChart", () => {
  test("scales bars to the largest value", () => {
    const block = barChart(
      [
        ["a", 10],
        ["bb", 5],
      ],
      { width: 13 }
    );
    expect(block.lines).toEqual(["a  ##########", "bb #####     "]);
  });

  test("appends right-aligned values", () => {
    const block = barChart(
      [
        ["a", 10],
        ["bb", 5],
      ],
      { width: 16, showValues: true }
    );
    expect(block.lines).toEqual(["a  ########## 10", "bb #####       5"]);
  });

  test("all-zero data draws empty bars", () => {
    expect(barChart([["a", 0]], { width: 5 }).lines).toEqual(["a    "]);
  });

  test("rejects negative values", () => {
    expect(thrown(() => barChart([["a", -1]], { width: 10 }))).toMatchObject({
      path: "values.a",
    });
  });

  test("rejects non-finite values", () => {
    expect(() => barChart([["a", Number.NaN]], { width: 10 })).toThrow(
      InvalidInputError
    );
  });

  test("empty data is empty", () => {
    expect(barChart([]).width).toBe(0);
  });
});

describe("progress", () => {
  test("fills in proportion", () => {
    expect(progress(50, 100, { width: 10 }).lines).toEqual([
      "[#####.....] 50%",
    ]);
  });

  test("clamps values past the total", () => {
    expect(progress(150, 100, { width: 10 }).lines).toEqual([
      "[##########] 100%",
    ]);
    expect(progress(-5, 100, { width: 4 }).lines).toEqual(["[....] 0%"]);
  });

  test("leads with the label", () => {
    expect(progress(1, 4, { width: 4, label: "Build" }).lines).toEqual([
      "Build [#...] 25%",
    ]);
  });

  test("fills the config width by default", () => {
    expect(progress(1, 2, {}, createRenderConfig(20)).lines).toEqual([
      "[#######......] 50%",
    ]);
  });

  test("rejects a non-positive total", () => {
    expect(thrown(() => progress(1, 0))).toMatchObject({ path: "total" });
  });
});
