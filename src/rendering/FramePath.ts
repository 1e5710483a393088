import type { FillRule, Rect } from "../types";

export type SubPath =
  | { readonly kind: "rect"; readonly rect: Readonly<Rect> }
  | { readonly kind: "roundRect"; readonly rect: Readonly<Rect>; readonly radius: number };

/**
 * Reusable path built from rectangle and rounded-rectangle sub-paths.
 * Rebuilt and emptied every frame.
 */
export class FramePath {
  private _subPaths: SubPath[] = [];
  fillRule: FillRule = "nonzero";

  get subPaths(): readonly SubPath[] {
    return this._subPaths;
  }

  get isEmpty(): boolean {
    return this._subPaths.length === 0;
  }

  addRect(rect: Rect): this {
    this._subPaths.push({ kind: "rect", rect: { ...rect } });
    return this;
  }

  addRoundRect(rect: Rect, radius: number): this {
    this._subPaths.push({ kind: "roundRect", rect: { ...rect }, radius });
    return this;
  }

  reset(): void {
    this._subPaths = [];
    this.fillRule = "nonzero";
  }
}
