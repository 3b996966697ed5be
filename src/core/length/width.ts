/**
 * Backing integer of a length type.
 */
export interface Width {
  readonly name: string;
  readonly bits: 16 | 32 | 64;
  readonly bytes: number;
  readonly min: bigint;
  readonly max: bigint;
}

function defineWidth(name: string, bits: Width["bits"]): Width {
  const max = (1n << BigInt(bits - 1)) - 1n;
  return { name, bits, bytes: bits / 8, min: -max - 1n, max };
}

export const WIDTH_16 = defineWidth("Length16", 16);
export const WIDTH_32 = defineWidth("Length32", 32);
export const WIDTH_64 = defineWidth("Length64", 64);

export function fits(width: Width, ticks: bigint): boolean {
  return ticks >= width.min && ticks <= width.max;
}
