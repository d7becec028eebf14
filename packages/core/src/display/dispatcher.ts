/**
 * Maps display kinds to renderers and owns the default render config.
 */

import type { Logger } from "@outfitter/contracts";
import { silentLogger } from "@textblock/shared";

import { InvalidInputError, UnknownDisplayKindError } from "../errors";
import { toText } from "../render/block";
import { createRenderConfig, DEFAULT_RENDER_CONFIG } from "../render/config";
import type { Block, RenderConfig } from "../render/types";
import { BUILTIN_RENDERERS } from "./builtins";
import type {
  DisplayDefaults,
  DisplayOptions,
  DisplayRenderer,
  DisplaySpec,
} from "./types";

export interface DispatcherOptions {
  /** Starting render config. Default: 80 columns */
  config?: RenderConfig;
  /** Per-kind option defaults, merged under each spec's options */
  defaults?: DisplayDefaults;
  logger?: Logger;
  /** Register the built-in kinds. Default: true */
  builtins?: boolean;
}

export class Dispatcher {
  private readonly renderers = new Map<string, DisplayRenderer>();
  private readonly defaults: DisplayDefaults;
  private readonly logger: Logger;
  private current: RenderConfig;

  constructor(options: DispatcherOptions = {}) {
    this.current = options.config ?? DEFAULT_RENDER_CONFIG;
    this.defaults = options.defaults ?? {};
    this.logger = options.logger ?? silentLogger;

    if (options.builtins ?? true) {
      for (const [kind, renderer] of Object.entries(BUILTIN_RENDERERS)) {
        this.renderers.set(kind, renderer);
      }
    }
  }

  /** The render config every render call reads. */
  get config(): RenderConfig {
    return this.current;
  }

  /**
   * Replace the default width. Must not be called while a render through
   * this dispatcher is in progress; pass an explicit `width` option for
   * per-call isolation instead.
   */
  configure(width: number): RenderConfig {
    this.current = createRenderConfig(width);
    this.logger.debug("Render config updated", { width });
    return this.current;
  }

  /**
   * A dispatcher with the same registrations and defaults but its own
   * config. Later registrations on either one do not affect the other.
   */
  withConfig(config: RenderConfig): Dispatcher {
    const scoped = new Dispatcher({
      config,
      defaults: this.defaults,
      logger: this.logger,
      builtins: false,
    });
    for (const [kind, renderer] of this.renderers) {
      scoped.renderers.set(kind, renderer);
    }
    return scoped;
  }

  /** Register a renderer. An existing registration for `kind` is replaced. */
  register(kind: string, renderer: DisplayRenderer): this {
    if (kind.trim() === "") {
      throw new InvalidInputError("Display kind must be a non-empty string", {
        path: "kind",
      });
    }
    const replaced = this.renderers.has(kind);
    this.renderers.set(kind, renderer);
    this.logger.debug("Display kind registered", { kind, replaced });
    return this;
  }

  unregister(kind: string): boolean {
    return this.renderers.delete(kind);
  }

  has(kind: string): boolean {
    return this.renderers.has(kind);
  }

  /** Registered kinds in registration order. */
  kinds(): string[] {
    return [...this.renderers.keys()];
  }

  /**
   * Render data with the renderer registered for `spec.kind`, merging the
   * spec's options over that kind's defaults. Renderer errors propagate
   * unchanged.
   */
  render(data: unknown, spec: DisplaySpec): Block {
    const renderer = this.renderers.get(spec.kind);
    if (!renderer) {
      throw new UnknownDisplayKindError(spec.kind, this.kinds());
    }

    const options: DisplayOptions = {
      ...this.defaults[spec.kind],
      ...spec.options,
    };
    this.logger.debug("Rendering", {
      kind: spec.kind,
      width: this.current.width,
    });
    return renderer(data, options, this);
  }

  /** Render and serialize to a multi-line string. */
  renderText(data: unknown, spec: DisplaySpec): string {
    return toText(this.render(data, spec));
  }
}

export function createDispatcher(options: DispatcherOptions = {}): Dispatcher {
  return new Dispatcher(options);
}
