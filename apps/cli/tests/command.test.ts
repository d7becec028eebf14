import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  createWorkspace,
  openWorkspaceCount,
  removeWorkspaces,
  runCli,
  trimmedLines,
} from "./helpers";

let cwd = "";

async function writeJson(name: string, value: unknown): Promise<string> {
  const path = join(cwd, name);
  await writeFile(path, JSON.stringify(value));
  return path;
}

beforeEach(async () => {
  cwd = await createWorkspace();
});

afterEach(async () => {
  process.exitCode = undefined;
  await removeWorkspaces();
});

describe("render", () => {
  test("renders a table from a JSON file", async () => {
    const file = await writeJson("rows.json", [
      { A: 1, B: 2 },
      { A: 30, B: 4 },
    ]);
    const { stdout } = await runCli(cwd, ["render", "table", file]);
    expect(stdout).toBe("A   B\n-----\n1   2\n30  4\n");
  });

  test("passes --headers for positional rows", async () => {
    const file = await writeJson("positional.json", [["x", 1]]);
    const { stdout } = await runCli(cwd, [
      "render",
      "table",
      file,
      "--headers",
      "name,n",
    ]);
    expect(stdout).toBe("name  n\n-------\nx     1\n");
  });

  test("decodes --option values", async () => {
    const file = await writeJson("items.json", ["a", "b"]);
    const { stdout } = await runCli(cwd, [
      "render",
      "list",
      file,
      "-o",
      "numbered=true",
    ]);
    expect(stdout).toBe("1. a\n2. b\n");
  });

  test("applies --width and --title to boxes", async () => {
    const file = await writeJson("note.json", "hi");
    const { stdout } = await runCli(cwd, [
      "render",
      "box",
      file,
      "--width",
      "10",
      "--title",
      "T",
    ]);
    expect(stdout).toBe("+-- T ---+\n| hi     |\n+--------+\n");
  });

  test("takes the default width from the environment", async () => {
    const file = await writeJson("progress.json", { value: 1, total: 2 });
    const { stdout } = await runCli(cwd, ["render", "progress", file], {
      TEXTBLOCK_WIDTH: "20",
    });
    expect(stdout).toBe("[#######......] 50%\n");
  });

  test("--json prints the render result", async () => {
    const file = await writeJson("one.json", ["a"]);
    const { stdout } = await runCli(cwd, ["render", "list", file, "--json"]);
    expect(JSON.parse(stdout)).toEqual({
      kind: "list",
      text: "* a",
      width: 3,
      height: 1,
    });
  });

  test("reports unknown kinds on stderr", async () => {
    const file = await writeJson("any.json", {});
    const { stdout, stderr } = await runCli(cwd, ["render", "pie", file]);
    expect(stdout).toBe("");
    expect(stderr).toEqual([
      "error: Unknown display kind: pie (registered: box, table, tree, list, bar_chart, progress, report)",
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("reports invalid JSON on stderr", async () => {
    const path = join(cwd, "broken.json");
    await writeFile(path, "{ nope");
    const { stderr } = await runCli(cwd, ["render", "tree", path]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^error: Invalid JSON in .*broken\.json: /);
    expect(process.exitCode).toBe(1);
  });

  test("keeps the order of chart pairs from JSON", async () => {
    const file = await writeJson("pairs.json", [
      ["2024", 5],
      ["Q1", 3],
      ["2023", 1],
    ]);
    const { stdout } = await runCli(cwd, [
      "render",
      "bar_chart",
      file,
      "--width",
      "12",
    ]);
    expect(trimmedLines(stdout)).toEqual(["2024 #######", "Q1   ####", "2023 #"]);
  });

  test("reports misspelled option names", async () => {
    const file = await writeJson("chart.json", { a: 1 });
    const { stdout, stderr } = await runCli(cwd, [
      "render",
      "bar_chart",
      file,
      "-o",
      "showValues=true",
    ]);
    expect(stdout).toBe("");
    expect(stderr).toEqual([
      "error: Invalid bar chart options: Unrecognized key(s) in object: 'showValues'",
    ]);
    expect(process.exitCode).toBe(1);
  });

  test("reports malformed --option pairs", async () => {
    const file = await writeJson("pair.json", ["a"]);
    const { stderr } = await runCli(cwd, ["render", "list", file, "-o", "x"]);
    expect(stderr).toEqual(["error: Expected key=value, got: x"]);
  });
});

describe("kinds", () => {
  test("lists every registered kind", async () => {
    const { stdout } = await runCli(cwd, ["kinds"]);
    expect(trimmedLines(stdout)).toEqual([
      "- box",
      "- table",
      "- tree",
      "- list",
      "- bar_chart",
      "- progress",
      "- report",
    ]);
  });

  test("--json prints an array", async () => {
    const { stdout } = await runCli(cwd, ["kinds", "--json"]);
    expect(JSON.parse(stdout)).toEqual([
      "box",
      "table",
      "tree",
      "list",
      "bar_chart",
      "progress",
      "report",
    ]);
  });
});

describe("config", () => {
  test("prints the resolved config as a tree", async () => {
    const { stdout } = await runCli(cwd, ["config"]);
    expect(trimmedLines(stdout)).toEqual([
      "+-- width: 80",
      "+-- list",
      "|   +-- style: bullet",
      "|   +-- numbered: false",
      "+-- chart",
      "    +-- show_values: false",
    ]);
  });

  test("reads the project file", async () => {
    await writeFile(join(cwd, ".textblock.toml"), "width = 40\n");
    const { stdout } = await runCli(cwd, ["config", "--json"]);
    expect(JSON.parse(stdout)).toEqual({
      width: 40,
      list: { style: "bullet", numbered: false },
      chart: { show_values: false },
    });
  });

  test("--path shows config locations", async () => {
    const { stdout } = await runCli(cwd, ["config", "--path", "--json"]);
    expect(JSON.parse(stdout)).toEqual({
      user: join(cwd, "user-config.toml"),
    });
  });
});

describe("workspaces", () => {
  test("are deleted after each test", async () => {
    const dir = await createWorkspace();
    expect(openWorkspaceCount()).toBe(2);

    await removeWorkspaces();
    expect(openWorkspaceCount()).toBe(0);
    await expect(stat(dir)).rejects.toThrow();
  });
});
