import { assertWidth } from "../errors";
import type { RenderConfig } from "./types";

/** Width used when nothing else is configured */
export const DEFAULT_WIDTH = 80;

/**
 * Create a render config. Values are frozen; reconfiguring means creating
 * a new one.
 */
export function createRenderConfig(width: number = DEFAULT_WIDTH): RenderConfig {
  assertWidth(width);
  return Object.freeze({ width });
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = createRenderConfig();
