/**
 * Textblock Core Library
 *
 * Deterministic plain-ASCII layout: renderers, composition, the display
 * dispatcher and configuration.
 */

// Render engine
export * from "./render";

// Errors
export {
  assertWidth,
  InvalidConfigError,
  InvalidInputError,
  isLayoutError,
  LayoutError,
  UnknownDisplayKindError,
  type LayoutErrorCode,
} from "./errors";

// Dispatch
export {
  BUILTIN_KINDS,
  BUILTIN_RENDERERS,
  createDispatcher,
  Dispatcher,
  parseWith,
  ScalarSchema,
  toTreeValue,
  TreeJsonSchema,
  type BuiltinKind,
  type DispatcherOptions,
  type DisplayDefaults,
  type DisplayOptions,
  type DisplayRenderer,
  type DisplaySpec,
  type TreeJson,
} from "./display";

// Config
export {
  applyEnvOverrides,
  displayDefaults,
  getConfigPaths,
  loadConfig,
  parseConfigText,
  PATHS,
  toRenderConfig,
  type ConfigPaths,
  type LoadConfigOptions,
} from "./config";

// Schema
export {
  DEFAULT_CONFIG,
  TextblockConfigSchema,
  type TextblockConfig,
} from "./schema";

// Handlers
export {
  renderHandler,
  type Handler,
  type HandlerContext,
  type RenderInput,
  type RenderOutput,
} from "./handlers";
