import type { Rgba, ShadowSide } from "../types";
import { BLACK, WHITE } from "../types";
import type { ColorInput } from "../color/ColorUtils";
import { parseColor } from "../color/ColorUtils";
import { dpToPx } from "../layout/Density";
import type { ShadowSidesInput } from "../layout/ShadowSides";
import { ALL_SIDES_MASK, normalizeSides } from "../layout/ShadowSides";

/**
 * Named style properties as supplied by the host, lengths in
 * density-independent units.
 */
export interface ShadowFrameAttributes {
  shadowColor: ColorInput;
  shadowWidth: number;
  dx: number;
  dy: number;
  cornerRadius: number;
  borderColor: ColorInput;
  borderWidth: number;
  shadowSides: ShadowSidesInput;
}

/**
 * Resolved configuration consumed by the render pipeline.
 * All lengths are physical pixels. Frozen once built.
 */
export interface ShadowFrameConfig {
  readonly shadowColor: Readonly<Rgba>;
  readonly shadowWidth: number;
  readonly dx: number;
  readonly dy: number;
  readonly cornerRadius: number;
  readonly borderColor: Readonly<Rgba>;
  readonly borderWidth: number;
  readonly shadowSides: ReadonlySet<ShadowSide>;
}

export const DEFAULT_ATTRIBUTES: ShadowFrameAttributes = {
  shadowColor: "#000000",
  shadowWidth: 0,
  dx: 0,
  dy: 0,
  cornerRadius: 0,
  borderColor: "#ffffff",
  borderWidth: 0,
  shadowSides: ALL_SIDES_MASK,
};

/**
 * Merge loaded attributes with defaults, ensuring all fields exist.
 * Explicit `undefined` values fall back to the default as well.
 */
export function mergeAttributes(
  loaded: Partial<ShadowFrameAttributes> | null | undefined,
): ShadowFrameAttributes {
  if (!loaded) return { ...DEFAULT_ATTRIBUTES };
  return {
    shadowColor: loaded.shadowColor ?? DEFAULT_ATTRIBUTES.shadowColor,
    shadowWidth: loaded.shadowWidth ?? DEFAULT_ATTRIBUTES.shadowWidth,
    dx: loaded.dx ?? DEFAULT_ATTRIBUTES.dx,
    dy: loaded.dy ?? DEFAULT_ATTRIBUTES.dy,
    cornerRadius: loaded.cornerRadius ?? DEFAULT_ATTRIBUTES.cornerRadius,
    borderColor: loaded.borderColor ?? DEFAULT_ATTRIBUTES.borderColor,
    borderWidth: loaded.borderWidth ?? DEFAULT_ATTRIBUTES.borderWidth,
    shadowSides: loaded.shadowSides ?? DEFAULT_ATTRIBUTES.shadowSides,
  };
}

function resolveColor(name: string, input: ColorInput, fallback: Readonly<Rgba>): Readonly<Rgba> {
  const color = parseColor(input);
  if (color) return Object.freeze(color);
  console.warn(`[ShadowFrame] ${name}: unrecognized color ${JSON.stringify(input)}, using default`);
  return fallback;
}

function resolveLength(name: string, value: number, density: number): number {
  if (!Number.isFinite(value)) {
    console.warn(`[ShadowFrame] ${name}: non-finite length ${value}, using 0`);
    return 0;
  }
  if (value < 0) {
    console.warn(`[ShadowFrame] ${name}: negative length ${value}, clamped to 0`);
    return 0;
  }
  return dpToPx(value, density);
}

function resolveOffset(name: string, value: number, density: number): number {
  if (!Number.isFinite(value)) {
    console.warn(`[ShadowFrame] ${name}: non-finite offset ${value}, using 0`);
    return 0;
  }
  return dpToPx(value, density);
}

/**
 * Build the pipeline configuration from host attributes.
 *
 * @param density - Device density scale (physical pixels per dp).
 */
export function resolveConfig(
  attributes: Partial<ShadowFrameAttributes> | null | undefined,
  density: number,
): ShadowFrameConfig {
  const attrs = mergeAttributes(attributes);
  return Object.freeze({
    shadowColor: resolveColor("shadowColor", attrs.shadowColor, BLACK),
    shadowWidth: resolveLength("shadowWidth", attrs.shadowWidth, density),
    dx: resolveOffset("dx", attrs.dx, density),
    dy: resolveOffset("dy", attrs.dy, density),
    cornerRadius: resolveLength("cornerRadius", attrs.cornerRadius, density),
    borderColor: resolveColor("borderColor", attrs.borderColor, WHITE),
    borderWidth: resolveLength("borderWidth", attrs.borderWidth, density),
    shadowSides: normalizeSides(attrs.shadowSides),
  });
}
