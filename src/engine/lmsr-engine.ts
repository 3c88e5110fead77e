/**
 * LMSR (Logarithmic Market Scoring Rule) pricing engine over D9 fixed-point bigints.
 * Formulas:
 *   Cost:    C(q) = b * ln( sum_i exp(q_i / b) )
 *   Price:   p_i(q) = exp(q_i / b) / sum_j exp(q_j / b)
 *   Buy:     dq = b * ln( S * (exp(amount / b) - 1) / exp(q_i / b) + 1 ),  S = sum_j exp(q_j / b)
 * Supplies are D9 shares and scale is in the settlement unit, so q_i / b under integer
 * division is already a D9 ratio. Every operation returns a Result and never throws.
 */

import { MAX_OUTCOMES, MIN_OUTCOMES } from "../config/index.js";
import { checkedAdd, checkedDiv, checkedMul, checkedSub, U64_MAX } from "../lib/checked-math.js";
import { fail, ok, type Result } from "../lib/errors.js";
import type { BuyQuote, Market } from "../types/lmsr.js";
import { D9, fpExp, fpLn } from "./fixed-point.js";
import { cloneMarket } from "./market-state.js";

function isActiveOutcome(market: Market, outcomeIndex: number): boolean {
  return Number.isInteger(outcomeIndex) && outcomeIndex >= 0 && outcomeIndex < market.numOutcomes;
}

function expOfRatio(market: Market, outcomeIndex: number): Result<bigint> {
  return fpExp(market.supplies[outcomeIndex] / market.scale);
}

/** S = sum_j exp(q_j / b) over the active outcomes. */
function sumExponentials(market: Market): Result<bigint> {
  let sum = 0n;
  for (let i = 0; i < market.numOutcomes; i++) {
    const e = expOfRatio(market, i);
    if (!e.ok) return e;
    const next = checkedAdd(sum, e.value, "u128");
    if (!next.ok) return next;
    sum = next.value;
  }
  return ok(sum);
}

/**
 * Cost function C(q) in the settlement unit: how much must back the current supplies.
 */
export function calculateCost(market: Market): Result<bigint> {
  if (market.numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");
  if (market.scale <= 0n) return fail("LiquidityParameterIsZero");

  const sum = sumExponentials(market);
  if (!sum.ok) return sum;
  const lnSum = fpLn(sum.value);
  if (!lnSum.ok) return lnSum;
  const scaled = checkedMul(market.scale, lnSum.value, "i128");
  if (!scaled.ok) return scaled;

  const cost = scaled.value / D9;
  // a negative cost means the supplies were corrupted upstream
  if (cost < 0n || cost > U64_MAX) return fail("MathOverflow");
  return ok(cost);
}

/**
 * D9 prices for every active outcome. Each exp(q_i / b) * 1e9 / S is floored and the units
 * lost to flooring go to the largest remainders (lowest index on ties), so the prices always
 * sum to exactly 1e9.
 */
function apportionPrices(market: Market): Result<bigint[]> {
  const exps: bigint[] = [];
  let sum = 0n;
  for (let i = 0; i < market.numOutcomes; i++) {
    const e = expOfRatio(market, i);
    if (!e.ok) return e;
    const next = checkedAdd(sum, e.value, "u128");
    if (!next.ok) return next;
    exps.push(e.value);
    sum = next.value;
  }
  // unreachable while fpExp stays positive on [-20, 20]
  if (sum === 0n) return ok(exps.map(() => 0n));

  const floors: bigint[] = [];
  const remainders: bigint[] = [];
  for (const e of exps) {
    const scaled = checkedMul(e, D9, "u128");
    if (!scaled.ok) return scaled;
    floors.push(scaled.value / sum);
    remainders.push(scaled.value % sum);
  }
  let leftover = D9 - floors.reduce((a, b) => a + b, 0n);
  const order = floors
    .map((_, i) => i)
    .sort((a, b) => (remainders[a] === remainders[b] ? a - b : remainders[a] > remainders[b] ? -1 : 1));
  for (const i of order) {
    if (leftover <= 0n) break;
    floors[i] += 1n;
    leftover -= 1n;
  }
  return ok(floors);
}

/**
 * Marginal price (probability) of outcome i in D9, so 1.0 = 1_000_000_000.
 */
export function getInstantPrice(market: Market, outcomeIndex: number): Result<bigint> {
  if (market.numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");
  if (!isActiveOutcome(market, outcomeIndex)) return fail("InvalidOutcomeIndex");
  if (market.scale <= 0n) return fail("LiquidityParameterIsZero");

  const prices = apportionPrices(market);
  if (!prices.ok) return prices;
  return ok(prices.value[outcomeIndex]);
}

/** Prices over all active outcomes; they sum to exactly 1e9. */
export function getAllPrices(market: Market): Result<bigint[]> {
  if (market.numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");
  if (market.scale <= 0n) return fail("LiquidityParameterIsZero");
  return apportionPrices(market);
}

/** Shares a payment of amountIn mints for outcome i, without touching the market. */
export function calculateSharesOut(market: Market, outcomeIndex: number, amountIn: bigint): Result<bigint> {
  if (market.numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");
  if (!isActiveOutcome(market, outcomeIndex)) return fail("InvalidOutcomeIndex");
  if (amountIn <= 0n) return fail("DepositIsZero");
  if (amountIn > U64_MAX) return fail("MathOverflow");
  const b = market.scale;
  if (b <= 0n) return fail("LiquidityParameterIsZero");

  const sum = sumExponentials(market);
  if (!sum.ok) return sum;
  const expI = expOfRatio(market, outcomeIndex);
  if (!expI.ok) return expI;
  const expAmount = fpExp((amountIn * D9) / b);
  if (!expAmount.ok) return expAmount;

  // S * (exp(amount / b) - 1) is D18; dividing by the D9 exp(q_i / b) leaves D9
  const growth = checkedSub(expAmount.value, D9, "u128");
  if (!growth.ok) return growth;
  const numerator = checkedMul(sum.value, growth.value, "u128");
  if (!numerator.ok) return numerator;
  // below one whole unit of S * (exp(amount / b) - 1) / exp(q_i / b) the trade is a no-op
  const whole = checkedDiv(numerator.value / D9, expI.value, "u128");
  if (!whole.ok) return whole;
  if (whole.value === 0n) return fail("DepositIsZero");
  const fraction = checkedDiv(numerator.value, expI.value, "u128");
  if (!fraction.ok) return fraction;
  const lnArg = checkedAdd(fraction.value, D9, "u128");
  if (!lnArg.ok) return lnArg;
  const lnResult = fpLn(lnArg.value);
  if (!lnResult.ok) return lnResult;

  // b * ln(...) with ln in D9 is already D9 shares
  const shares = checkedMul(b, lnResult.value, "i128");
  if (!shares.ok) return shares;
  if (shares.value <= 0n) return fail("DepositIsZero");
  if (shares.value > U64_MAX) return fail("MathOverflow");
  return ok(shares.value);
}

/**
 * Execute a purchase: mint shares of outcome i for amountIn and record the payment.
 * Supply and reserve are both checked before either is written.
 */
export function buyShares(market: Market, outcomeIndex: number, amountIn: bigint): Result<bigint> {
  const shares = calculateSharesOut(market, outcomeIndex, amountIn);
  if (!shares.ok) return shares;

  const supply = checkedAdd(market.supplies[outcomeIndex], shares.value, "u64");
  if (!supply.ok) return supply;
  const reserve = checkedAdd(market.reserves[outcomeIndex], amountIn, "u64");
  if (!reserve.ok) return reserve;

  market.supplies[outcomeIndex] = supply.value;
  market.reserves[outcomeIndex] = reserve.value;
  return shares;
}

/**
 * Preview of a purchase: shares out plus price and cost on both sides of the trade.
 */
export function getQuoteForBuy(market: Market, outcomeIndex: number, amountIn: bigint): Result<BuyQuote> {
  const priceBefore = getInstantPrice(market, outcomeIndex);
  if (!priceBefore.ok) return priceBefore;
  const costBefore = calculateCost(market);
  if (!costBefore.ok) return costBefore;

  const after = cloneMarket(market);
  const sharesOut = buyShares(after, outcomeIndex, amountIn);
  if (!sharesOut.ok) return sharesOut;
  const priceAfter = getInstantPrice(after, outcomeIndex);
  if (!priceAfter.ok) return priceAfter;
  const costAfter = calculateCost(after);
  if (!costAfter.ok) return costAfter;

  return ok({
    outcomeIndex,
    amountIn,
    sharesOut: sharesOut.value,
    priceBefore: priceBefore.value,
    priceAfter: priceAfter.value,
    costBefore: costBefore.value,
    costAfter: costAfter.value,
  });
}

/**
 * Worst-case market maker loss (bounded): b * ln(n). Equals the cost of a fresh market.
 */
export function worstCaseLoss(scale: bigint, numOutcomes: number): Result<bigint> {
  if (scale <= 0n) return fail("LiquidityParameterIsZero");
  if (!Number.isInteger(numOutcomes) || numOutcomes < MIN_OUTCOMES) return fail("NotEnoughOutcomes");
  if (numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");

  const lnN = fpLn(BigInt(numOutcomes) * D9);
  if (!lnN.ok) return lnN;
  const loss = checkedMul(scale, lnN.value, "i128");
  if (!loss.ok) return loss;
  return ok(loss.value / D9);
}
