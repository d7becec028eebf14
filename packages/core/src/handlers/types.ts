import type { Logger, Result } from "@outfitter/contracts";

import type { Dispatcher } from "../display/dispatcher";

/**
 * Context passed to all handlers.
 * Transport-agnostic: the CLI (or any other collaborator) provides this.
 */
export interface HandlerContext {
  /** Dispatcher holding the registered kinds and render config */
  dispatcher: Dispatcher;
  /** Structured logger */
  logger: Logger;
}

/**
 * A handler function.
 * Takes typed input and context, returns a Result. Rendering never
 * suspends, so handlers are synchronous.
 */
export type Handler<TInput, TOutput, TError extends Error = Error> = (
  input: TInput,
  ctx: HandlerContext
) => Result<TOutput, TError>;
