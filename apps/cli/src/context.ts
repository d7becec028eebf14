import type { Logger } from "@outfitter/contracts";
import {
  createDispatcher,
  displayDefaults,
  loadConfig,
  toRenderConfig,
  type Dispatcher,
  type HandlerContext,
  type LoadConfigOptions,
  type TextblockConfig,
} from "@textblock/core";
import { createLogger, parseLogLevel } from "@textblock/shared";

import { renderReport } from "./kinds/report";

export interface CliContext extends HandlerContext {
  config: TextblockConfig;
  dispatcher: Dispatcher;
  logger: Logger;
}

export type ContextLoader = () => Promise<CliContext>;

/**
 * Resolve config, logger and a dispatcher with every kind the CLI offers.
 */
export async function createContext(
  options: LoadConfigOptions = {}
): Promise<CliContext> {
  const env = options.env ?? process.env;
  const logger =
    options.logger ??
    createLogger({ level: parseLogLevel(env.TEXTBLOCK_LOG_LEVEL) });

  const config = await loadConfig({ ...options, env, logger });
  const dispatcher = createDispatcher({
    config: toRenderConfig(config),
    defaults: displayDefaults(config),
    logger: logger.child({ component: "dispatcher" }),
  });
  dispatcher.register("report", renderReport);

  return { config, dispatcher, logger };
}
