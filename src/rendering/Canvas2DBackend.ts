/**
 * Canvas2D implementation of DrawingBackend.
 *
 * Wraps a CanvasRenderingContext2D (or OffscreenCanvasRenderingContext2D).
 * Paint state is applied inside a save/restore pair per draw call, so no
 * style set here outlives the call. Layers are offscreen canvases the size
 * of the current target, composited back with drawImage.
 */

import type { DrawingBackend } from "./DrawingBackend";
import type { PaintState } from "./Paint";
import type { FramePath } from "./FramePath";
import type { BlendMode, Rect } from "../types";
import { rectWidth, rectHeight } from "../types";
import { toCssColor } from "../color/ColorUtils";

// ─── Types ──────────────────────────────────────────────────

export type Ctx2D = CanvasRenderingContext2D | OffscreenCanvasRenderingContext2D;

/** An offscreen canvas and its 2D context, used as one compositing layer. */
export interface LayerSurface {
  readonly canvas: HTMLCanvasElement | OffscreenCanvas;
  readonly ctx: Ctx2D;
}

export type SurfaceFactory = (width: number, height: number) => LayerSurface;

export interface Canvas2DBackendOptions {
  /** Creates layer surfaces. Defaults to OffscreenCanvas, then a DOM canvas. */
  createSurface?: SurfaceFactory;
  /**
   * Whether this context anti-aliases clip edges. Off by default: Canvas 2D
   * leaves clip anti-aliasing to the implementation, so corners are erased
   * on a layer instead.
   */
  antialiasedClip?: boolean;
}

// ─── Blend mode mapping ─────────────────────────────────────

const BLEND_MODE_MAP: Record<BlendMode, GlobalCompositeOperation> = {
  "source-over": "source-over",
  "destination-out": "destination-out",
};

// ─── Canvas2DBackend ────────────────────────────────────────

export class Canvas2DBackend implements DrawingBackend {
  readonly supportsAntialiasedClip: boolean;

  private ctx: Ctx2D;
  private layerStack: LayerSurface[] = [];
  private offscreens = new Map<string, LayerSurface>();
  private createSurface: SurfaceFactory;

  constructor(ctx: Ctx2D, options: Canvas2DBackendOptions = {}) {
    this.ctx = ctx;
    this.createSurface = options.createSurface ?? createOffscreen;
    this.supportsAntialiasedClip = options.antialiasedClip ?? false;
  }

  /** The currently active context (main or innermost layer). */
  get context(): Ctx2D {
    const top = this.layerStack[this.layerStack.length - 1];
    return top ? top.ctx : this.ctx;
  }

  get width(): number {
    return this.context.canvas.width;
  }

  get height(): number {
    return this.context.canvas.height;
  }

  /** Number of open layers. */
  get layerDepth(): number {
    return this.layerStack.length;
  }

  // ── State stack ──────────────────────────────────────────

  save(): void {
    this.context.save();
  }

  restore(): void {
    this.context.restore();
  }

  // ── Drawing ──────────────────────────────────────────────

  drawRoundRect(rect: Rect, radius: number, paint: PaintState): void {
    const ctx = this.context;
    ctx.save();
    applyPaint(ctx, paint);
    ctx.beginPath();
    ctx.roundRect(rect.left, rect.top, rectWidth(rect), rectHeight(rect), radius);
    if (paint.style === "stroke") {
      ctx.stroke();
    } else {
      ctx.fill();
    }
    ctx.restore();
  }

  drawPath(path: FramePath, paint: PaintState): void {
    if (path.isEmpty) return;
    const ctx = this.context;
    ctx.save();
    applyPaint(ctx, paint);
    ctx.beginPath();
    for (const sub of path.subPaths) {
      const { rect } = sub;
      if (sub.kind === "rect") {
        ctx.rect(rect.left, rect.top, rectWidth(rect), rectHeight(rect));
      } else {
        ctx.roundRect(rect.left, rect.top, rectWidth(rect), rectHeight(rect), sub.radius);
      }
    }
    ctx.fill(path.fillRule);
    ctx.restore();
  }

  // ── Clipping ─────────────────────────────────────────────

  clipRoundRect(rect: Rect, radius: number): void {
    const ctx = this.context;
    ctx.beginPath();
    ctx.roundRect(rect.left, rect.top, rectWidth(rect), rectHeight(rect), radius);
    ctx.clip();
  }

  // ── Layers ───────────────────────────────────────────────

  beginLayer(): void {
    const parent = this.context;
    const { width, height } = parent.canvas;
    const layer = this.getOffscreen(`layer-${this.layerStack.length}`, width, height);
    const ctx = layer.ctx;

    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.clearRect(0, 0, width, height);
    // Children draw in the parent's coordinate space.
    const m = parent.getTransform();
    ctx.setTransform(m.a, m.b, m.c, m.d, m.e, m.f);

    this.layerStack.push(layer);
  }

  endLayer(): void {
    const layer = this.popLayer();
    const parent = this.context;
    parent.save();
    parent.setTransform(1, 0, 0, 1, 0, 0);
    parent.drawImage(layer.canvas, 0, 0);
    parent.restore();
  }

  // The surface may hold state left by an aborted draw; it is not reused.
  discardLayer(): void {
    this.popLayer();
    this.offscreens.delete(`layer-${this.layerStack.length}`);
  }

  // ── Offscreen surfaces ───────────────────────────────────

  /**
   * Get or create a reusable offscreen surface of the given size.
   */
  private getOffscreen(id: string, width: number, height: number): LayerSurface {
    let target = this.offscreens.get(id);
    if (target) {
      if (target.canvas.width !== width || target.canvas.height !== height) {
        target = this.createSurface(width, height);
        this.offscreens.set(id, target);
      }
      return target;
    }
    target = this.createSurface(width, height);
    this.offscreens.set(id, target);
    return target;
  }

  private popLayer(): LayerSurface {
    const layer = this.layerStack.pop();
    if (!layer) throw new Error("Canvas2DBackend: no open layer to close");
    return layer;
  }
}

// ─── Paint mapping ──────────────────────────────────────────

// Canvas 2D always anti-aliases shape edges, so `antiAlias` needs no mapping.
function applyPaint(ctx: Ctx2D, paint: PaintState): void {
  const color = toCssColor(paint.color);
  if (paint.style === "stroke") {
    ctx.strokeStyle = color;
    ctx.lineWidth = paint.strokeWidth;
  } else {
    ctx.fillStyle = color;
  }

  if (paint.blendMode) {
    ctx.globalCompositeOperation = BLEND_MODE_MAP[paint.blendMode];
  }

  const shadow = paint.shadow;
  if (shadow) {
    ctx.shadowColor = toCssColor(shadow.color);
    ctx.shadowBlur = shadow.radius;
    ctx.shadowOffsetX = shadow.dx;
    ctx.shadowOffsetY = shadow.dy;
  }
}

// ─── Offscreen creation helper ──────────────────────────────

function createOffscreen(width: number, height: number): LayerSurface {
  if (typeof OffscreenCanvas !== "undefined") {
    const canvas = new OffscreenCanvas(width, height);
    const ctx = canvas.getContext("2d");
    if (!ctx) throw new Error("Failed to create offscreen 2D context");
    return { canvas, ctx };
  }
  const canvas = document.createElement("canvas");
  canvas.width = width;
  canvas.height = height;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("Failed to create offscreen 2D context");
  return { canvas, ctx };
}
