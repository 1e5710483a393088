import type { ShadowSide } from "../types";

// Bit values of the packed sides mask, as stored in attribute sources.
export const SIDE_FLAGS: Readonly<Record<ShadowSide, number>> = {
  top: 1,
  right: 2,
  bottom: 4,
  left: 8,
};

export const ALL_SIDES_MASK = 15;

export const ALL_SIDES: readonly ShadowSide[] = ["top", "right", "bottom", "left"];

export type ShadowSidesInput = number | Iterable<ShadowSide>;

/** A flag is present iff OR-ing it into the mask leaves the mask unchanged. */
export function containsFlag(mask: number, flag: number): boolean {
  return (mask | flag) === mask;
}

export function sidesFromMask(mask: number): ReadonlySet<ShadowSide> {
  return new Set(ALL_SIDES.filter((side) => containsFlag(mask, SIDE_FLAGS[side])));
}

export function sidesToMask(sides: Iterable<ShadowSide>): number {
  let mask = 0;
  for (const side of sides) {
    mask |= SIDE_FLAGS[side];
  }
  return mask;
}

/**
 * Normalize either representation into a set. Unknown bits above the four
 * side flags are ignored.
 */
export function normalizeSides(input: ShadowSidesInput): ReadonlySet<ShadowSide> {
  if (typeof input === "number") return sidesFromMask(input & ALL_SIDES_MASK);
  const wanted = new Set(input);
  return new Set(ALL_SIDES.filter((side) => wanted.has(side)));
}

