import { InvalidInputError } from "@textblock/core";
import { readFile } from "node:fs/promises";
import { text } from "node:stream/consumers";

/** Read JSON from a file path, or from stdin when the path is `-`. */
export async function readJsonInput(source: string): Promise<unknown> {
  const raw =
    source === "-" ? await text(process.stdin) : await readFile(source, "utf8");
  return parseJson(raw, source === "-" ? "stdin" : source);
}

export function parseJson(raw: string, origin: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Invalid JSON in ${origin}: ${reason}`);
  }
}

/**
 * Parse a `key=value` option. Values that read as JSON (numbers, booleans,
 * arrays, objects, quoted strings) are decoded; anything else stays a string.
 */
export function parseKeyValue(entry: string): [string, unknown] {
  const eq = entry.indexOf("=");
  if (eq <= 0) {
    throw new InvalidInputError(`Expected key=value, got: ${entry}`, {
      path: "option",
    });
  }
  const key = entry.slice(0, eq).trim();
  const raw = entry.slice(eq + 1);
  return [key, decodeOptionValue(raw)];
}

function decodeOptionValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (!/^(?:-?\d|true$|false$|null$|[[{"])/.test(trimmed)) {
    return raw;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    // Not JSON after all; keep the literal text.
    return raw;
  }
}
