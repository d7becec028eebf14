import { describe, expect, test } from "vitest";

import { InvalidConfigError } from "../src/errors";
import { newBlock } from "../src/render/block";
import { box } from "../src/render/box";
import { createRenderConfig } from "../src/render/config";

describe("box", () => {
  test("frames content under a title", () => {
    expect(box("hi", { title: "T", width: 10 }).lines).toEqual([
      "+-- T ---+",
      "| hi     |",
      "+--------+",
    ]);
  });

  test("truncates titles that do not fit", () => {
    const [top] = box("x", { title: "A very long title", width: 14 }).lines;
    expect(top).toBe("+-- A ve... -+");
  });

  test("drops the title when the frame is too narrow", () => {
    expect(box("x", { title: "T", width: 6 }).lines).toEqual([
      "+----+",
      "| x  |",
      "+----+",
    ]);
  });

  test("wraps long text lines", () => {
    expect(box("one two three", { width: 10 }).lines).toEqual([
      "+--------+",
      "| one    |",
      "| two    |",
      "| three  |",
      "+--------+",
    ]);
  });

  test("keeps explicit line breaks", () => {
    expect(box("a\nb", { width: 8 }).lines).toEqual([
      "+------+",
      "| a    |",
      "| b    |",
      "+------+",
    ]);
  });

  test("cuts over-wide block lines instead of re-wrapping", () => {
    expect(box(newBlock(["abcdefgh"]), { width: 8 }).lines).toEqual([
      "+------+",
      "| abcd |",
      "| efgh |",
      "+------+",
    ]);
  });

  test("cleans text and block content", () => {
    expect(box("a\tb\u001b[31m", { width: 12 }).lines).toEqual([
      "+----------+",
      "| a   b    |",
      "+----------+",
    ]);
    expect(box({ lines: ["x\u0007y"], width: 3 }, { width: 8 }).lines).toEqual([
      "+------+",
      "| xy   |",
      "+------+",
    ]);
  });

  test("defaults to the config width", () => {
    const block = box("hi", {}, createRenderConfig(12));
    expect(block.width).toBe(12);
    for (const line of block.lines) {
      expect(line).toHaveLength(12);
    }
  });

  test("rejects widths that leave no room for content", () => {
    expect(() => box("x", { width: 4 })).toThrow(InvalidConfigError);
    expect(() => box("x", { width: 10.5 })).toThrow(InvalidConfigError);
  });
});
