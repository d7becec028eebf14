import type { Logger } from "@outfitter/contracts";
import { silentLogger } from "@textblock/shared";
import envPaths from "env-paths";
import { readFile, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import type { DisplayDefaults } from "./display/types";
import { InvalidConfigError } from "./errors";
import { createRenderConfig } from "./render/config";
import type { RenderConfig } from "./render/types";
import {
  DEFAULT_CONFIG,
  type TextblockConfig,
  TextblockConfigSchema,
} from "./schema/config";

const PROJECT_CONFIG_FILENAME = ".textblock.toml";

const paths = envPaths("textblock", { suffix: "" });

/**
 * Platform config locations.
 */
export const PATHS = {
  /** Config directory (~/.config/textblock on Linux) */
  config: paths.config,
  /** User config file */
  configFile: join(paths.config, "config.toml"),
} as const;

// --------------------------------------------------------------------------
// Environment variable overrides
// --------------------------------------------------------------------------

type EnvParser = (value: string) => unknown;

// Unparseable values pass through as strings so schema validation reports them.
const parseEnvBoolean: EnvParser = (value) => {
  const lower = value.trim().toLowerCase();
  if (lower === "true" || lower === "1") {
    return true;
  }
  if (lower === "false" || lower === "0") {
    return false;
  }
  return value;
};

const parseEnvInteger: EnvParser = (value) =>
  /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : value;

const parseEnvString: EnvParser = (value) => value.trim();

/**
 * Naming convention: TEXTBLOCK_{SECTION}_{KEY}
 *
 * Precedence (highest to lowest):
 * 1. Environment variables
 * 2. Project config (.textblock.toml)
 * 3. User config (<config dir>/config.toml)
 * 4. Schema defaults
 */
const ENV_MAP: Record<string, { path: string[]; parse: EnvParser }> = {
  TEXTBLOCK_WIDTH: { path: ["width"], parse: parseEnvInteger },
  TEXTBLOCK_LIST_STYLE: { path: ["list", "style"], parse: parseEnvString },
  TEXTBLOCK_LIST_NUMBERED: {
    path: ["list", "numbered"],
    parse: parseEnvBoolean,
  },
  TEXTBLOCK_CHART_SHOW_VALUES: {
    path: ["chart", "show_values"],
    parse: parseEnvBoolean,
  },
};

export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  for (const [envKey, { path, parse }] of Object.entries(ENV_MAP)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") {
      setNestedValue(config, path, parse(value));
    }
  }
  return config;
}

// --------------------------------------------------------------------------
// TOML subset
// --------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(
  target: Record<string, unknown>,
  path: readonly string[],
  value: unknown
): void {
  const [head, ...rest] = path;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const next: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  target[head] = next;
  setNestedValue(next, rest, value);
}

/** Index of the first `#` outside quotes, or -1. */
function commentStart(line: string): number {
  let quote: string | null = null;
  for (let i = 0; i < line.length; i += 1) {
    const char = line.charAt(i);
    if (quote) {
      if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "#") {
      return i;
    }
  }
  return -1;
}

function splitArrayItems(inner: string): string[] {
  const items: string[] = [];
  let quote: string | null = null;
  let current = "";

  for (const char of inner) {
    if (quote) {
      quote = char === quote ? null : quote;
      current += char;
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      current += char;
    } else if (char === ",") {
      items.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }
  items.push(current.trim());
  return items.filter((item) => item !== "");
}

function parseValue(raw: string): unknown {
  if (raw === "true" || raw === "false") {
    return raw === "true";
  }
  if (/^-?\d+$/.test(raw)) {
    return Number.parseInt(raw, 10);
  }
  if (/^-?\d+\.\d+$/.test(raw)) {
    return Number.parseFloat(raw);
  }
  if (
    raw.length >= 2 &&
    ((raw.startsWith('"') && raw.endsWith('"')) ||
      (raw.startsWith("'") && raw.endsWith("'")))
  ) {
    return raw.slice(1, -1);
  }
  if (raw.startsWith("[") && raw.endsWith("]")) {
    return splitArrayItems(raw.slice(1, -1)).map((item) => parseValue(item));
  }
  return raw;
}

/**
 * Parse the TOML subset used by config files: `[section]` headers and
 * `key = value` pairs with strings, numbers, booleans and flat arrays.
 */
export function parseConfigText(text: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  let section: string[] = [];

  for (const [index, rawLine] of text.split("\n").entries()) {
    const cut = commentStart(rawLine);
    const line = (cut === -1 ? rawLine : rawLine.slice(0, cut)).trim();
    if (line === "") {
      continue;
    }

    const header = /^\[\s*([A-Za-z0-9_.-]+)\s*\]$/.exec(line);
    if (header) {
      const [, name = ""] = header;
      section = name.split(".").filter(Boolean);
      continue;
    }

    const pair = /^([A-Za-z0-9_.-]+)\s*=\s*(.+)$/.exec(line);
    if (!pair) {
      throw new InvalidConfigError(
        `Unrecognized config line ${index + 1}: ${line}`
      );
    }
    const [, key = "", value = ""] = pair;
    setNestedValue(
      result,
      [...section, ...key.split(".").filter(Boolean)],
      parseValue(value.trim())
    );
  }

  return result;
}

// --------------------------------------------------------------------------
// Loading
// --------------------------------------------------------------------------

async function fileExists(path: string): Promise<boolean> {
  return stat(path).then(
    (info) => info.isFile(),
    () => false
  );
}

async function findFileUp(
  filename: string,
  startDir: string
): Promise<string | null> {
  let dir = resolve(startDir);
  for (;;) {
    const candidate = join(dir, filename);
    if (await fileExists(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export interface ConfigPaths {
  user: string;
  project?: string;
}

export async function getConfigPaths(
  cwd: string = process.cwd(),
  userConfigPath: string = PATHS.configFile
): Promise<ConfigPaths> {
  const project = await findFileUp(PROJECT_CONFIG_FILENAME, cwd);
  return {
    user: userConfigPath,
    ...(project && { project }),
  };
}

async function readConfigFile(
  path: string
): Promise<Record<string, unknown>> {
  if (!(await fileExists(path))) {
    return {};
  }
  return parseConfigText(await readFile(path, "utf8"));
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value)
        ? mergeDeep(existing, value)
        : value;
  }
  return result;
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Rethrow parse and validation errors instead of falling back */
  strict?: boolean;
  /** Override the user config location */
  userConfigPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load configuration: schema defaults, then the user file, then the
 * project file, then environment variables.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<TextblockConfig> {
  const logger = options.logger ?? silentLogger;

  try {
    const paths = await getConfigPaths(options.cwd, options.userConfigPath);
    const user = await readConfigFile(paths.user);
    const project = paths.project ? await readConfigFile(paths.project) : {};
    const merged = applyEnvOverrides(mergeDeep(user, project), options.env);
    return TextblockConfigSchema.parse(merged);
  } catch (error) {
    if (options.strict) {
      throw error;
    }
    logger.warn("Failed to load config, using defaults", {
      error: error instanceof Error ? error.message : String(error),
    });
    return DEFAULT_CONFIG;
  }
}

/** Render config for the engine. */
export function toRenderConfig(config: TextblockConfig): RenderConfig {
  return createRenderConfig(config.width);
}

/** Per-kind option defaults for the dispatcher. */
export function displayDefaults(config: TextblockConfig): DisplayDefaults {
  return {
    list: { style: config.list.style, numbered: config.list.numbered },
    bar_chart: { show_values: config.chart.show_values },
  };
}
