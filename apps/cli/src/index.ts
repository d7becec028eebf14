import type { LoadConfigOptions } from "@textblock/core";
import { VERSION } from "@textblock/shared";
import { Command } from "commander";

import { createConfigCommand } from "./commands/config";
import { createKindsCommand } from "./commands/kinds";
import { createRenderCommand } from "./commands/render";
import { createContext, type CliContext } from "./context";

export type ProgramOptions = LoadConfigOptions;

/**
 * Build the command tree. A fresh program per call keeps option state from
 * leaking between parses.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  let context: Promise<CliContext> | undefined;
  const loadContext = (): Promise<CliContext> => {
    context ??= createContext(options);
    return context;
  };

  const program = new Command();
  program
    .name("textblock")
    .description("Render JSON data as plain-text tables, trees, boxes and charts")
    .version(VERSION);

  program.addCommand(createRenderCommand(loadContext));
  program.addCommand(createKindsCommand(loadContext));
  program.addCommand(
    createConfigCommand(loadContext, {
      cwd: options.cwd,
      userConfigPath: options.userConfigPath,
    })
  );

  return program;
}

export async function run(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

export { createContext, type CliContext, type ContextLoader } from "./context";
export { renderReport } from "./kinds/report";
