/**
 * Color utility functions for parsing and encoding frame colors.
 *
 * Accepted inputs:
 *   - Hex string:   "#RGB", "#RGBA", "#RRGGBB", "#RRGGBBAA"
 *   - ARGB integer: 0xAARRGGBB (the packed form most UI toolkits store)
 *   - Rgba object:  { r, g, b, a } with a in 0-1
 */

import type { Rgba } from "../types";

export type ColorInput = string | number | Rgba;

// ─── Hex ↔ RGBA ──────────────────────────────────────────────

/**
 * Parse a hex color string. Returns null for anything that is not
 * 3, 4, 6 or 8 hex digits after an optional `#`.
 */
export function hexToRgba(hex: string): Rgba | null {
  let h = hex.trim().replace(/^#/, "");
  if (!/^[0-9a-fA-F]+$/.test(h)) return null;

  // Expand shorthand (#ABC → #AABBCC, #ABCD → #AABBCCDD)
  if (h.length === 3 || h.length === 4) {
    h = h.split("").map((c) => c + c).join("");
  }
  if (h.length !== 6 && h.length !== 8) return null;

  const n = parseInt(h.slice(0, 6), 16);
  const alpha = h.length === 8 ? parseInt(h.slice(6, 8), 16) / 255 : 1;
  return {
    r: (n >> 16) & 0xff,
    g: (n >> 8) & 0xff,
    b: n & 0xff,
    a: alpha,
  };
}

// ─── Packed ARGB ─────────────────────────────────────────────

/** Unpack a 32-bit 0xAARRGGBB integer. */
export function argbToRgba(argb: number): Rgba {
  const v = argb >>> 0;
  return {
    r: (v >>> 16) & 0xff,
    g: (v >>> 8) & 0xff,
    b: v & 0xff,
    a: ((v >>> 24) & 0xff) / 255,
  };
}

// ─── Generic parsing ─────────────────────────────────────────

/**
 * Resolve any accepted color input to RGBA.
 * Unparseable input returns null so callers can fall back to a default.
 */
export function parseColor(input: ColorInput): Rgba | null {
  if (typeof input === "string") return hexToRgba(input);
  if (typeof input === "number") {
    return Number.isInteger(input) ? argbToRgba(input) : null;
  }
  const { r, g, b, a } = input;
  if (![r, g, b, a].every(Number.isFinite)) return null;
  return {
    r: Math.max(0, Math.min(255, r)),
    g: Math.max(0, Math.min(255, g)),
    b: Math.max(0, Math.min(255, b)),
    a: Math.max(0, Math.min(1, a)),
  };
}

/** CSS color string for a Canvas 2D fillStyle / strokeStyle / shadowColor. */
export function toCssColor(color: Rgba): string {
  const alpha = parseFloat(color.a.toFixed(3));
  return `rgba(${Math.round(color.r)}, ${Math.round(color.g)}, ${Math.round(color.b)}, ${alpha})`;
}

export function colorsEqual(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}
