/**
 * Mutable paint record shared by the passes of one frame pipeline.
 *
 * Every pass configures it, draws, then resets it to the neutral baseline
 * so the next pass starts from known state. Backends read it, never write it.
 */

import type { BlendMode, PaintStyle, Rgba } from "../types";
import { WHITE } from "../types";
import { colorsEqual } from "../color/ColorUtils";

export interface ShadowLayer {
  readonly radius: number;
  readonly dx: number;
  readonly dy: number;
  readonly color: Readonly<Rgba>;
}

/** Read-only view handed to backends. */
export interface PaintState {
  readonly color: Readonly<Rgba>;
  readonly style: PaintStyle;
  readonly strokeWidth: number;
  readonly antiAlias: boolean;
  readonly blendMode: BlendMode | null;
  readonly shadow: ShadowLayer | null;
}

export class Paint implements PaintState {
  color: Readonly<Rgba> = WHITE;
  style: PaintStyle = "fill";
  strokeWidth = 0;
  antiAlias = true;
  blendMode: BlendMode | null = null;
  shadow: ShadowLayer | null = null;

  constructor(baseColor: Readonly<Rgba> = WHITE) {
    this.reset(baseColor);
  }

  reset(baseColor: Readonly<Rgba> = WHITE): void {
    this.color = baseColor;
    this.style = "fill";
    this.strokeWidth = 0;
    this.antiAlias = true;
    this.blendMode = null;
    this.shadow = null;
  }

  isNeutral(baseColor: Readonly<Rgba> = WHITE): boolean {
    return (
      colorsEqual(this.color, baseColor) &&
      this.style === "fill" &&
      this.strokeWidth === 0 &&
      this.antiAlias &&
      this.blendMode === null &&
      this.shadow === null
    );
  }

  /** A radius of 0 or less removes the shadow layer, offsets included. */
  setShadowLayer(radius: number, dx: number, dy: number, color: Readonly<Rgba>): void {
    if (radius <= 0) {
      this.clearShadowLayer();
      return;
    }
    this.shadow = { radius, dx, dy, color };
  }

  clearShadowLayer(): void {
    this.shadow = null;
  }
}
