import { createLogger } from "@textblock/shared";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import {
  applyEnvOverrides,
  displayDefaults,
  getConfigPaths,
  loadConfig,
  parseConfigText,
  toRenderConfig,
} from "../src/config";
import { InvalidConfigError } from "../src/errors";
import { DEFAULT_CONFIG } from "../src/schema/config";

let tempRoot = "";
let emptyDir = "";
let projectDir = "";
let userConfigPath = "";

beforeAll(async () => {
  tempRoot = await mkdtemp(join(tmpdir(), "textblock-config-"));
  emptyDir = join(tempRoot, "empty");
  projectDir = join(tempRoot, "project", "nested");
  userConfigPath = join(tempRoot, "user-config.toml");

  await mkdir(emptyDir, { recursive: true });
  await mkdir(projectDir, { recursive: true });
  await writeFile(
    userConfigPath,
    ["width = 100", "", "[list]", 'style = "arrow" # preferred'].join("\n")
  );
  await writeFile(
    join(tempRoot, "project", ".textblock.toml"),
    ["[list]", "numbered = true"].join("\n")
  );
});

afterAll(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

describe("loadConfig", () => {
  test("falls back to schema defaults", async () => {
    const config = await loadConfig({
      cwd: emptyDir,
      userConfigPath: join(tempRoot, "missing.toml"),
      env: {},
    });
    expect(config).toEqual({
      width: 80,
      list: { style: "bullet", numbered: false },
      chart: { show_values: false },
    });
  });

  test("merges the project file over the user file", async () => {
    const config = await loadConfig({ cwd: projectDir, userConfigPath, env: {} });
    expect(config).toEqual({
      width: 100,
      list: { style: "arrow", numbered: true },
      chart: { show_values: false },
    });
  });

  test("applies environment overrides last", async () => {
    const config = await loadConfig({
      cwd: projectDir,
      userConfigPath,
      env: {
        TEXTBLOCK_WIDTH: "60",
        TEXTBLOCK_LIST_NUMBERED: "0",
        TEXTBLOCK_CHART_SHOW_VALUES: "true",
      },
    });
    expect(config.width).toBe(60);
    expect(config.list.numbered).toBe(false);
    expect(config.chart.show_values).toBe(true);
  });

  test("warns and uses defaults for invalid values", async () => {
    const lines: string[] = [];
    const config = await loadConfig({
      cwd: emptyDir,
      userConfigPath: join(tempRoot, "missing.toml"),
      env: { TEXTBLOCK_WIDTH: "wide" },
      logger: createLogger({ write: (line) => lines.push(line) }),
    });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[warn\] Failed to load config, using defaults /);
  });

  test("strict mode rethrows", async () => {
    await expect(
      loadConfig({
        cwd: emptyDir,
        userConfigPath: join(tempRoot, "missing.toml"),
        env: { TEXTBLOCK_WIDTH: "-3" },
        strict: true,
      })
    ).rejects.toThrow();
  });
});

describe("parseConfigText", () => {
  test("reads sections, arrays and quoted comment characters", () => {
    const text = [
      "# heading",
      'title = "a # b" # note',
      "[table.columns]",
      'order = [1, "two"]',
      "ratio = 0.5",
    ].join("\n");
    expect(parseConfigText(text)).toEqual({
      title: "a # b",
      table: { columns: { order: [1, "two"], ratio: 0.5 } },
    });
  });

  test("rejects lines it does not understand", () => {
    expect(() => parseConfigText("width = 1\noops")).toThrow(
      new InvalidConfigError("Unrecognized config line 2: oops")
    );
  });
});

test("applyEnvOverrides keeps unparseable values for validation", () => {
  expect(
    applyEnvOverrides({}, { TEXTBLOCK_WIDTH: "wide", TEXTBLOCK_LIST_STYLE: " dash " })
  ).toEqual({ width: "wide", list: { style: "dash" } });
});

test("getConfigPaths finds the nearest project file", async () => {
  expect(await getConfigPaths(projectDir, userConfigPath)).toEqual({
    user: userConfigPath,
    project: join(tempRoot, "project", ".textblock.toml"),
  });
  expect(await getConfigPaths(emptyDir, userConfigPath)).toEqual({
    user: userConfigPath,
  });
});

test("config maps onto render config and display defaults", () => {
  const config = {
    width: 42,
    list: { style: "check" as const, numbered: true },
    chart: { show_values: true },
  };
  expect(toRenderConfig(config)).toEqual({ width: 42 });
  expect(displayDefaults(config)).toEqual({
    list: { style: "check", numbered: true },
    bar_chart: { show_values: true },
  });
});
