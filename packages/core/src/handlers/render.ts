/**
 * Handler for rendering data as a display kind.
 *
 * Layout errors come back as `Result.err`; anything else is a bug and
 * propagates.
 */

import { Result } from "@outfitter/contracts";

import type { DisplayOptions } from "../display/types";
import { isLayoutError, type LayoutError } from "../errors";
import { toText } from "../render/block";
import type { HandlerContext } from "./types";

// =============================================================================
// Types
// =============================================================================

/** Input parameters for the render handler. */
export interface RenderInput {
  /** Display kind, e.g. "table" */
  kind: string;
  /** Data for the kind's renderer */
  data: unknown;
  /** Options merged over the kind's defaults */
  options?: DisplayOptions | undefined;
}

/** Structured output from the render handler. */
export interface RenderOutput {
  kind: string;
  /** Rendered block, lines joined by newlines */
  text: string;
  width: number;
  height: number;
}

// =============================================================================
// Handler
// =============================================================================

export function renderHandler(
  input: RenderInput,
  ctx: HandlerContext
): Result<RenderOutput, LayoutError> {
  try {
    const block = ctx.dispatcher.render(input.data, {
      kind: input.kind,
      options: input.options,
    });
    return Result.ok({
      kind: input.kind,
      text: toText(block),
      width: block.width,
      height: block.lines.length,
    });
  } catch (error) {
    if (!isLayoutError(error)) {
      throw error;
    }
    ctx.logger.debug("Render failed", { kind: input.kind, code: error.code });
    return Result.err(error);
  }
}
