export {
  BUILTIN_KINDS,
  type BuiltinKind,
  type DisplayDefaults,
  type DisplayOptions,
  type DisplayRenderer,
  type DisplaySpec,
} from "./types";

export {
  createDispatcher,
  Dispatcher,
  type DispatcherOptions,
} from "./dispatcher";

export { BUILTIN_RENDERERS, toTreeValue } from "./builtins";

export { parseWith, ScalarSchema, TreeJsonSchema, type TreeJson } from "./schemas";
