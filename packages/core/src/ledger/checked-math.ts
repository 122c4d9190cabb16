/**
 * Overflow-checked unsigned arithmetic on bigint
 *
 * bigint never wraps, so the width is modelled by an explicit maximum.
 * Both helpers return null instead of an out-of-range value.
 */

export function maxValueForBits(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

export function checkedAdd(a: bigint, b: bigint, max: bigint): bigint | null {
  const sum = a + b;
  return sum > max ? null : sum;
}

export function checkedSub(a: bigint, b: bigint): bigint | null {
  return b > a ? null : a - b;
}
