/**
 * Drawing surface interface the frame pipeline renders through.
 *
 * This is the minimal primitive set the frame needs: scoped state,
 * off-screen compositing layers, rounded-rectangle fill/stroke, path fill
 * with a fill rule, and a destination-out blend. Canvas2DBackend wraps a
 * CanvasRenderingContext2D; tests use a recording implementation.
 *
 * Corner masking through destination-out is a software-compositing
 * technique: it needs a layer whose pixels the blend can erase, so backends
 * must give `beginLayer` a real isolated surface.
 */

import type { Rect } from "../types";
import type { PaintState } from "./Paint";
import type { FramePath } from "./FramePath";

export interface DrawingBackend {
  /** Target width in physical pixels. */
  readonly width: number;
  /** Target height in physical pixels. */
  readonly height: number;

  /**
   * True when `clipRoundRect` produces anti-aliased edges. The pipeline then
   * clips children directly instead of erasing corners on a layer.
   */
  readonly supportsAntialiasedClip: boolean;

  // ── State stack ──────────────────────────────────────────

  save(): void;
  restore(): void;

  // ── Drawing ──────────────────────────────────────────────

  /** Fill or stroke (per `paint.style`) a rounded rectangle. */
  drawRoundRect(rect: Rect, radius: number, paint: PaintState): void;

  /** Fill a path using the path's own fill rule. */
  drawPath(path: FramePath, paint: PaintState): void;

  // ── Clipping ─────────────────────────────────────────────

  clipRoundRect(rect: Rect, radius: number): void;

  // ── Layers ───────────────────────────────────────────────

  /**
   * Redirect drawing into a new transparent layer covering the full target.
   * Layers nest.
   */
  beginLayer(): void;

  /** Close the innermost layer and composite it onto its parent. */
  endLayer(): void;

  /** Close the innermost layer without compositing it. */
  discardLayer(): void;
}
