import { Command } from "commander";

import type { ContextLoader } from "../context";
import { outputJson, outputText } from "../utils/json";

interface KindsCommandOptions {
  json?: boolean;
}

export function createKindsCommand(loadContext: ContextLoader): Command {
  return new Command("kinds")
    .description("List registered display kinds")
    .option("--json", "Output as a JSON array")
    .action(async (options: KindsCommandOptions) => {
      const { dispatcher } = await loadContext();
      const kinds = dispatcher.kinds();

      if (options.json) {
        await outputJson(kinds);
        return;
      }
      await outputText(
        dispatcher.renderText(kinds, {
          kind: "list",
          options: { style: "dash", numbered: false },
        })
      );
    });
}
