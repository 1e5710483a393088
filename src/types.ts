/**
 * Core type definitions for shadow-frame
 */

// --- Geometry ---

/** Axis-aligned rectangle in physical pixels, edge form (not x/y/w/h). */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Insets {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export function rectWidth(rect: Rect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
  return rect.bottom - rect.top;
}

// --- Color ---

/** Color channels: r/g/b 0-255, a 0-1. */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export const BLACK: Readonly<Rgba> = Object.freeze({ r: 0, g: 0, b: 0, a: 1 });
export const WHITE: Readonly<Rgba> = Object.freeze({ r: 255, g: 255, b: 255, a: 1 });

// --- Shadow sides ---

export type ShadowSide = "top" | "right" | "bottom" | "left";

// --- Painting ---

export type PaintStyle = "fill" | "stroke";

export type FillRule = "nonzero" | "evenodd";

/** Blend modes the frame needs. `null` on a paint means plain source-over. */
export type BlendMode = "source-over" | "destination-out";
