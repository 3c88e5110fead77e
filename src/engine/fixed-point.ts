/**
 * D9 fixed-point transcendentals used by the LMSR cost and price functions.
 * Values are bigint scaled by 1e9 at the boundary; the series run at 1e18 so the
 * D9 result is exact to the last unit for the inputs the market produces.
 */

import { abs, checkedAdd, checkedDiv, isqrt, U128_MAX } from "../lib/checked-math.js";
import { fail, ok, type Result } from "../lib/errors.js";

export const D9 = 1_000_000_000n;
export const D18 = D9 * D9;
const D36 = D18 * D18;

/** Euler's number in D9. */
export const E_D9 = 2_718_281_828n;
const E_D18 = 2_718_281_828_459_045_235n;

/** fpExp saturates above +20 and flushes to zero below -20. */
export const EXP_ARG_LIMIT = 20n * D9;

export const MAX_SERIES_TERMS = 20n;

/** Cap on ln range-reduction steps (inversions plus divisions by e). ln(U128_MAX) needs about 70. */
export const MAX_LN_REDUCTIONS = 256;

const HALF_D9 = D9 / 2n;
const TWO_D18 = 2n * D18;
/** ln(1+y) runs once the reduced value is at most 1.0625. */
const LN_SERIES_CEILING = 1_062_500_000_000_000_000n;

/**
 * e^(x / 1e9), scaled by 1e9.
 *
 * Taylor series e^x = sum x^n / n!, built term by term and stopped once a term drops
 * below one unit. The argument is halved until |x| <= 0.5 and the sum squared back,
 * so the 20-term cap holds across the whole [-20, 20] domain.
 */
export function fpExp(x: bigint): Result<bigint> {
  if (x > EXP_ARG_LIMIT) return ok(U128_MAX);
  if (x < -EXP_ARG_LIMIT) return ok(0n);

  const magnitude = abs(x);
  let halvings = 0n;
  while (magnitude > HALF_D9 << halvings) halvings += 1n;
  const reduced = (x * D9) / (1n << halvings);

  let sum = D18;
  let term = D18;
  for (let n = 1n; n <= MAX_SERIES_TERMS; n++) {
    term = (term * reduced) / D18 / n;
    if (abs(term) < 1n) break;
    const next = checkedAdd(sum, term, "i128");
    if (!next.ok) return next;
    sum = next.value;
  }

  for (let i = 0n; i < halvings; i++) {
    const squared = checkedDiv(sum * sum, D18, "i128");
    if (!squared.ok) return squared;
    sum = squared.value;
  }

  const result = sum / D9;
  return ok(result < 0n ? 0n : result);
}

/**
 * ln(x / 1e9), scaled by 1e9. Fails with MathDomain for x <= 0.
 *
 * Reduction keeps ln(x) = sign * ln(v) + offset:
 *   v < 1  -> ln(v) = -ln(1 / v)
 *   v > 2  -> ln(v) = ln(v / e) + 1
 * then square roots bring v under 1.0625 before ln(1+y) = y - y^2/2 + y^3/3 - ...
 */
export function fpLn(x: bigint): Result<bigint> {
  if (x <= 0n) return fail("MathDomain");
  if (x === D9) return ok(0n);

  let value = x * D9;
  let sign = 1n;
  let offset = 0n;
  let reductions = 0;
  while (value < D18 || value > TWO_D18) {
    if (reductions === MAX_LN_REDUCTIONS) return fail("MathOverflow");
    if (value < D18) {
      value = D36 / value;
      sign = -sign;
    } else {
      value = (value * D18) / E_D18;
      offset += sign * D18;
    }
    reductions += 1;
  }

  let roots = 0n;
  while (value > LN_SERIES_CEILING) {
    value = isqrt(value * D18);
    roots += 1n;
  }

  const y = value - D18;
  let series = 0n;
  let power = y;
  for (let n = 1n; n <= MAX_SERIES_TERMS; n++) {
    const magnitude = power / n;
    const term = n % 2n === 1n ? magnitude : -magnitude;
    if (abs(term) < 1n) break;
    const next = checkedAdd(series, term, "i128");
    if (!next.ok) return next;
    series = next.value;
    power = (power * y) / D18;
  }

  return ok((offset + sign * (series << roots)) / D9);
}
