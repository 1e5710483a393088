import type { Insets, Rect } from "../types";

/**
 * The border rectangle is pulled inward by borderWidth / BORDER_INSET_DIVISOR.
 * Empirical: wide borders look centered on the rounded edge at one third.
 */
export const BORDER_INSET_DIVISOR = 3;

export interface FrameGeometry {
  contentRect: Rect;
  /** Null when the frame has no border. */
  borderRect: Rect | null;
}

/**
 * Inset a rectangle on all four edges. Opposite edges never cross; an
 * over-inset collapses to the midline.
 */
export function insetRect(rect: Rect, inset: number): Rect {
  let left = rect.left + inset;
  let right = rect.right - inset;
  let top = rect.top + inset;
  let bottom = rect.bottom - inset;
  if (left > right) left = right = (rect.left + rect.right) / 2;
  if (top > bottom) top = bottom = (rect.top + rect.bottom) / 2;
  return { left, top, right, bottom };
}

/**
 * Recompute the content and border rectangles for a new container size.
 * Called synchronously on every size change.
 */
export function resolveGeometry(
  width: number,
  height: number,
  padding: Insets,
  borderWidth: number,
): FrameGeometry {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid frame size: ${width}x${height}`);
  }

  const left = padding.left;
  const top = padding.top;
  // An undersized container collapses to zero area instead of inverting.
  const contentRect: Rect = {
    left,
    top,
    right: Math.max(left, width - padding.right),
    bottom: Math.max(top, height - padding.bottom),
  };

  const bw = borderWidth / BORDER_INSET_DIVISOR;
  const borderRect = bw > 0 ? insetRect(contentRect, bw) : null;

  return { contentRect, borderRect };
}
