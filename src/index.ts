export { ShadowFrame } from "./frame/ShadowFrame";
export type { ShadowFrameOptions, FrameSize } from "./frame/ShadowFrame";

export {
  DEFAULT_ATTRIBUTES,
  mergeAttributes,
  resolveConfig,
} from "./config/FrameConfig";
export type { ShadowFrameAttributes, ShadowFrameConfig } from "./config/FrameConfig";

export { computeInsets } from "./layout/PaddingPolicy";
export { resolveGeometry, insetRect, BORDER_INSET_DIVISOR } from "./layout/FrameGeometry";
export type { FrameGeometry } from "./layout/FrameGeometry";
export { dpToPx } from "./layout/Density";
export {
  ALL_SIDES,
  ALL_SIDES_MASK,
  SIDE_FLAGS,
  containsFlag,
  normalizeSides,
  sidesFromMask,
  sidesToMask,
} from "./layout/ShadowSides";
export type { ShadowSidesInput } from "./layout/ShadowSides";

export { parseColor, toCssColor } from "./color/ColorUtils";
export type { ColorInput } from "./color/ColorUtils";

export { Paint } from "./rendering/Paint";
export type { PaintState, ShadowLayer } from "./rendering/Paint";
export { FramePath } from "./rendering/FramePath";
export type { SubPath } from "./rendering/FramePath";
export { ScratchResources } from "./rendering/ScratchResources";
export {
  drawFrame,
  drawShadowPass,
  drawMaskedContentPass,
  drawBorderPass,
} from "./rendering/FramePipeline";
export type { DrawChildren } from "./rendering/FramePipeline";
export type { DrawingBackend } from "./rendering/DrawingBackend";
export { Canvas2DBackend } from "./rendering/Canvas2DBackend";
export type {
  Canvas2DBackendOptions,
  LayerSurface,
  SurfaceFactory,
} from "./rendering/Canvas2DBackend";

export * from "./types";
