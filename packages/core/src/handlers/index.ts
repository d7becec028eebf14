export {
  renderHandler,
  type RenderInput,
  type RenderOutput,
} from "./render";
export type { Handler, HandlerContext } from "./types";
