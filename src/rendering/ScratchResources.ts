/**
 * Scratch Resources
 *
 * The paint and mask path one pipeline reuses across its passes. Each
 * ShadowFrame owns exactly one instance; instances are never shared, since
 * both objects are mutated in place mid-frame.
 *
 * `use()` is the only sanctioned way to touch them: the pass runs with the
 * resources and both are reset afterwards, whether the pass returns or throws.
 */

import type { Rgba } from "../types";
import { WHITE } from "../types";
import { Paint } from "./Paint";
import { FramePath } from "./FramePath";

export class ScratchResources {
  readonly paint: Paint;
  readonly path = new FramePath();
  private readonly baseColor: Readonly<Rgba>;
  private inUse = false;

  constructor(baseColor: Readonly<Rgba> = WHITE) {
    this.baseColor = baseColor;
    this.paint = new Paint(baseColor);
  }

  use<T>(pass: (paint: Paint, path: FramePath) => T): T {
    if (this.inUse) {
      throw new Error("ScratchResources: passes must not be nested");
    }
    this.inUse = true;
    try {
      return pass(this.paint, this.path);
    } finally {
      this.paint.reset(this.baseColor);
      this.path.reset();
      this.inUse = false;
    }
  }

  /** True when both resources are at their baseline. */
  isNeutral(): boolean {
    return this.paint.isNeutral(this.baseColor) && this.path.isEmpty;
  }
}
