import { fail, ok, type Result } from "./errors.js";

export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;
export const I128_MAX = (1n << 127n) - 1n;
export const I128_MIN = -(1n << 127n);

/** Integer widths the on-chain layout works in. bigint has none, so every result is range-checked. */
export type IntWidth = "u64" | "u128" | "i128";

const BOUNDS: Record<IntWidth, { min: bigint; max: bigint }> = {
  u64: { min: 0n, max: U64_MAX },
  u128: { min: 0n, max: U128_MAX },
  i128: { min: I128_MIN, max: I128_MAX },
};

export function fitsWidth(value: bigint, width: IntWidth): boolean {
  const { min, max } = BOUNDS[width];
  return value >= min && value <= max;
}

function within(value: bigint, width: IntWidth): Result<bigint> {
  return fitsWidth(value, width) ? ok(value) : fail("MathOverflow");
}

export function checkedAdd(a: bigint, b: bigint, width: IntWidth): Result<bigint> {
  return within(a + b, width);
}

export function checkedSub(a: bigint, b: bigint, width: IntWidth): Result<bigint> {
  return within(a - b, width);
}

export function checkedMul(a: bigint, b: bigint, width: IntWidth): Result<bigint> {
  return within(a * b, width);
}

/** Truncating division (rounds toward zero). A zero divisor is reported as overflow. */
export function checkedDiv(a: bigint, b: bigint, width: IntWidth): Result<bigint> {
  if (b === 0n) return fail("MathOverflow");
  return within(a / b, width);
}

export function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/** Floor square root by Newton iteration. */
export function isqrt(value: bigint): bigint {
  if (value < 2n) return value;
  let x = value;
  let y = (x + 1n) >> 1n;
  while (y < x) {
    x = y;
    y = (x + value / x) >> 1n;
  }
  return x;
}
