/**
 * Convert a density-independent length to physical pixels.
 * Zero stays exactly zero so "no shadow" / "no border" survive conversion.
 */
export function dpToPx(dp: number, density: number): number {
  if (!Number.isFinite(density) || density <= 0) {
    throw new RangeError(`Invalid display density: ${density}`);
  }
  return dp === 0 ? 0 : dp * density + 0.5;
}
