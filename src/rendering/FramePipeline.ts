/**
 * Frame Pipeline
 *
 * Renders one frame of a shadow frame in three ordered passes:
 *
 *   1. shadow: shadowed fill of the rounded content rect
 *   2. masked content: children on a layer, corners erased (destination-out)
 *   3. border: stroked rounded border rect, if any
 *
 * The order is load-bearing. Children must sit above the finished shadow,
 * and the border must go on after the corners are erased or the mask would
 * bite into it.
 *
 * Every pass brackets itself in canvas save/restore and borrows the shared
 * paint and path through ScratchResources.use(), which resets them when the
 * pass ends.
 */

import type { ShadowFrameConfig } from "../config/FrameConfig";
import type { FrameGeometry } from "../layout/FrameGeometry";
import type { DrawingBackend } from "./DrawingBackend";
import type { ScratchResources } from "./ScratchResources";

export type DrawChildren<B extends DrawingBackend = DrawingBackend> = (canvas: B) => void;

export function drawShadowPass(
  canvas: DrawingBackend,
  geometry: FrameGeometry,
  config: ShadowFrameConfig,
  resources: ScratchResources,
): void {
  canvas.save();
  try {
    resources.use((paint) => {
      paint.setShadowLayer(config.shadowWidth, config.dx, config.dy, config.shadowColor);
      canvas.drawRoundRect(geometry.contentRect, config.cornerRadius, paint);
    });
  } finally {
    canvas.restore();
  }
}

/**
 * Draw children with rounded corners.
 *
 * With anti-aliased clip support the children are simply clipped. Otherwise
 * they go onto a full-size transparent layer, and the region between the
 * content rect and its rounded counterpart (even-odd) is erased before the
 * layer is composited. If `drawChildren` throws, the layer is discarded.
 */
export function drawMaskedContentPass<B extends DrawingBackend>(
  canvas: B,
  geometry: FrameGeometry,
  config: ShadowFrameConfig,
  resources: ScratchResources,
  drawChildren: DrawChildren<B>,
): void {
  if (canvas.supportsAntialiasedClip) {
    canvas.save();
    try {
      canvas.clipRoundRect(geometry.contentRect, config.cornerRadius);
      drawChildren(canvas);
    } finally {
      canvas.restore();
    }
    return;
  }

  canvas.beginLayer();
  try {
    drawChildren(canvas);

    resources.use((paint, path) => {
      path.addRect(geometry.contentRect);
      path.addRoundRect(geometry.contentRect, config.cornerRadius);
      path.fillRule = "evenodd";

      paint.blendMode = "destination-out";
      canvas.drawPath(path, paint);
    });
  } catch (e) {
    canvas.discardLayer();
    throw e;
  }
  canvas.endLayer();
}

export function drawBorderPass(
  canvas: DrawingBackend,
  geometry: FrameGeometry,
  config: ShadowFrameConfig,
  resources: ScratchResources,
): void {
  const borderRect = geometry.borderRect;
  if (!borderRect) return;

  canvas.save();
  try {
    resources.use((paint) => {
      paint.strokeWidth = config.borderWidth;
      paint.style = "stroke";
      paint.color = config.borderColor;
      canvas.drawRoundRect(borderRect, config.cornerRadius, paint);
    });
  } finally {
    canvas.restore();
  }
}

/** Run all three passes for one frame. */
export function drawFrame<B extends DrawingBackend>(
  canvas: B,
  geometry: FrameGeometry,
  config: ShadowFrameConfig,
  resources: ScratchResources,
  drawChildren: DrawChildren<B>,
): void {
  drawShadowPass(canvas, geometry, config, resources);
  drawMaskedContentPass(canvas, geometry, config, resources, drawChildren);
  drawBorderPass(canvas, geometry, config, resources);
}
