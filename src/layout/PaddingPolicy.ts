import type { Insets } from "../types";
import type { ShadowFrameConfig } from "../config/FrameConfig";

/**
 * Edge insets that reserve room for the shadow so the container's own
 * bounds never clip it. Reserves are truncated to whole pixels.
 */
export function computeInsets(
  config: Pick<ShadowFrameConfig, "shadowWidth" | "dx" | "dy" | "shadowSides">,
): Insets {
  const xPadding = Math.trunc(config.shadowWidth + Math.abs(config.dx));
  const yPadding = Math.trunc(config.shadowWidth + Math.abs(config.dy));
  const sides = config.shadowSides;

  return {
    left: sides.has("left") ? xPadding : 0,
    top: sides.has("top") ? yPadding : 0,
    right: sides.has("right") ? xPadding : 0,
    bottom: sides.has("bottom") ? yPadding : 0,
  };
}
