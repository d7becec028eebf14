import { renderHandler, type DisplayOptions } from "@textblock/core";
import { Command, InvalidArgumentError } from "commander";

import type { ContextLoader } from "../context";
import { parseKeyValue, readJsonInput } from "../utils/input";
import { outputJson, outputText } from "../utils/json";

interface RenderCommandOptions {
  width?: number;
  title?: string;
  headers?: string[];
  numbered?: boolean;
  style?: string;
  showValues?: boolean;
  label?: string;
  option: string[];
  json?: boolean;
}

function parseWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidArgumentError("Width must be a positive integer.");
  }
  return width;
}

function parseHeaders(value: string): string[] {
  return value.split(",").map((header) => header.trim());
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Translate flags into display options. Flags win over `--option` pairs.
 */
export function buildDisplayOptions(
  options: RenderCommandOptions
): DisplayOptions {
  const display: Record<string, unknown> = Object.fromEntries(
    options.option.map((entry) => parseKeyValue(entry))
  );

  if (options.width !== undefined) display.width = options.width;
  if (options.title !== undefined) display.title = options.title;
  if (options.headers !== undefined) display.headers = options.headers;
  if (options.numbered) display.numbered = true;
  if (options.style !== undefined) display.style = options.style;
  if (options.showValues) display.show_values = true;
  if (options.label !== undefined) display.label = options.label;

  return display;
}

export function createRenderCommand(loadContext: ContextLoader): Command {
  return new Command("render")
    .description("Render JSON data as a display kind")
    .argument("<kind>", "Display kind (see `textblock kinds`)")
    .argument("[file]", "JSON file to read, - for stdin", "-")
    .option("-w, --width <columns>", "Layout width", parseWidth)
    .option("--title <text>", "Box title")
    .option("--headers <names>", "Comma-separated table headers", parseHeaders)
    .option("--numbered", "Number list items")
    .option("--style <style>", "List bullet style")
    .option("--show-values", "Print values after chart bars")
    .option("--label <text>", "Progress label")
    .option(
      "-o, --option <key=value>",
      "Extra display option (repeatable)",
      collect,
      []
    )
    .option("--json", "Output the render result as JSON")
    .action(
      async (kind: string, file: string, options: RenderCommandOptions) => {
        const ctx = await loadContext();

        let data: unknown;
        let displayOptions: DisplayOptions;
        try {
          data = await readJsonInput(file);
          displayOptions = buildDisplayOptions(options);
        } catch (error) {
          console.error(
            `error: ${error instanceof Error ? error.message : String(error)}`
          );
          process.exitCode = 1;
          return;
        }

        const result = renderHandler(
          { kind, data, options: displayOptions },
          ctx
        );
        if (result.isErr()) {
          console.error(`error: ${result.error.message}`);
          process.exitCode = 1;
          return;
        }

        if (options.json) {
          await outputJson(result.value);
          return;
        }
        await outputText(result.value.text);
      }
    );
}
