import type { Insets } from "../types";
import type { ShadowFrameAttributes, ShadowFrameConfig } from "../config/FrameConfig";
import { resolveConfig } from "../config/FrameConfig";
import { computeInsets } from "../layout/PaddingPolicy";
import type { FrameGeometry } from "../layout/FrameGeometry";
import { resolveGeometry } from "../layout/FrameGeometry";
import type { DrawingBackend } from "../rendering/DrawingBackend";
import type { DrawChildren } from "../rendering/FramePipeline";
import { drawFrame } from "../rendering/FramePipeline";
import { ScratchResources } from "../rendering/ScratchResources";

export interface ShadowFrameOptions {
  /** Physical pixels per density-independent unit. Defaults to 1. */
  density?: number;
}

export interface FrameSize {
  width: number;
  height: number;
}

/**
 * Rounded container that draws a drop shadow behind its children, clips
 * them to rounded corners and optionally strokes a border over them.
 *
 * The host drives it: `onSizeChanged` whenever its resolved size changes,
 * then `draw` once per frame with the child tree's draw callback. The frame
 * reserves shadow room through `padding`; laying children out inside that
 * padding is the host's job.
 */
export class ShadowFrame {
  private readonly density: number;
  private readonly resources = new ScratchResources();
  private _config: ShadowFrameConfig;
  private _padding: Insets;
  private _size: FrameSize | null = null;
  private _geometry: FrameGeometry | null = null;
  private warnedUnsized = false;

  constructor(attributes?: Partial<ShadowFrameAttributes> | null, options: ShadowFrameOptions = {}) {
    this.density = options.density ?? 1;
    this._config = resolveConfig(attributes, this.density);
    this._padding = computeInsets(this._config);
  }

  get config(): ShadowFrameConfig {
    return this._config;
  }

  get padding(): Readonly<Insets> {
    return this._padding;
  }

  get size(): Readonly<FrameSize> | null {
    return this._size;
  }

  /** Null until the first size change. */
  get geometry(): Readonly<FrameGeometry> | null {
    return this._geometry;
  }

  /**
   * Reload configuration. Padding is recomputed, and so is geometry when a
   * size is already known.
   */
  setAttributes(attributes: Partial<ShadowFrameAttributes> | null): void {
    this._config = resolveConfig(attributes, this.density);
    this._padding = computeInsets(this._config);
    if (this._size) {
      this._geometry = resolveGeometry(
        this._size.width,
        this._size.height,
        this._padding,
        this._config.borderWidth,
      );
    }
  }

  onSizeChanged(width: number, height: number): void {
    this._geometry = resolveGeometry(width, height, this._padding, this._config.borderWidth);
    this._size = { width, height };
  }

  /**
   * Draw one frame. Skips when there is no canvas or no size yet.
   * Errors raised while drawing are logged and never propagate.
   *
   * The shadow pass draws straight onto `canvas`, so a frame whose children
   * throw still leaves its shadow there, without content or border. Callers
   * that get `false` back should redraw the frame.
   *
   * @returns Whether the frame was drawn to completion.
   */
  draw<B extends DrawingBackend>(canvas: B | null | undefined, drawChildren: DrawChildren<B>): boolean {
    if (!canvas) return false;

    const geometry = this._geometry;
    if (!geometry) {
      if (!this.warnedUnsized) {
        this.warnedUnsized = true;
        console.warn("[ShadowFrame] draw skipped: size not resolved yet");
      }
      return false;
    }

    try {
      drawFrame(canvas, geometry, this._config, this.resources, drawChildren);
      return true;
    } catch (e) {
      console.error("[ShadowFrame] frame failed:", e);
      return false;
    }
  }
}
