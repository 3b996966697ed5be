/**
 * Rounds `ticks` to the nearest multiple of `multiplier`, ties away from zero.
 * A zero multiplier leaves the value unchanged.
 */
export function roundTicks(ticks: bigint, multiplier: bigint): bigint {
  if (multiplier === 0n) return ticks;
  const clip = ticks % multiplier;
  if (clip === 0n) return ticks;
  const twice = clip < 0n ? -2n * clip : 2n * clip;
  if (twice < multiplier) return ticks - clip;
  return clip < 0n ? ticks - clip - multiplier : ticks - clip + multiplier;
}

/**
 * Largest multiple of `multiplier` that is less than or equal to `ticks`.
 * A zero multiplier leaves the value unchanged.
 */
export function floorTicks(ticks: bigint, multiplier: bigint): bigint {
  if (multiplier === 0n) return ticks;
  const clip = ticks % multiplier;
  // bigint remainder keeps the dividend's sign
  return clip < 0n ? ticks - clip - multiplier : ticks - clip;
}
