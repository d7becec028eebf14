import { getConfigPaths } from "@textblock/core";
import { Command } from "commander";

import type { ContextLoader } from "../context";
import { outputJson, outputText } from "../utils/json";

interface ConfigCommandOptions {
  path?: boolean;
  json?: boolean;
}

export interface ConfigCommandSettings {
  cwd?: string;
  userConfigPath?: string;
}

export function createConfigCommand(
  loadContext: ContextLoader,
  settings: ConfigCommandSettings = {}
): Command {
  return new Command("config")
    .description("Show the resolved configuration")
    .option("--path", "Show config file locations")
    .option("--json", "Output as JSON")
    .action(async (options: ConfigCommandOptions) => {
      const { config, dispatcher } = await loadContext();

      if (options.path) {
        const paths = await getConfigPaths(
          settings.cwd,
          settings.userConfigPath
        );
        if (options.json) {
          await outputJson(paths);
          return;
        }
        await outputText(
          dispatcher.renderText(
            { user: paths.user, project: paths.project ?? "(none)" },
            { kind: "tree" }
          )
        );
        return;
      }

      if (options.json) {
        await outputJson(config);
        return;
      }
      await outputText(dispatcher.renderText(config, { kind: "tree" }));
    });
}
