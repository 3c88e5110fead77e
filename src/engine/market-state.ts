import { MAX_LABEL_LENGTH, MAX_OUTCOMES, MIN_OUTCOMES } from "../config/index.js";
import { fail, ok, type Result } from "../lib/errors.js";
import type { Market, MarketInitParams } from "../types/lmsr.js";

function labelByteLength(label: string): number {
  return new TextEncoder().encode(label).length;
}

/**
 * Validate creation parameters and return a fresh market with zero reserves and supplies.
 * `now` and `minDurationSeconds` are unix seconds; resolveAt must fall strictly after now + minDurationSeconds.
 */
export function initMarket(params: MarketInitParams, now: number, minDurationSeconds: number): Result<Market> {
  if (!Number.isInteger(params.numOutcomes) || params.numOutcomes < MIN_OUTCOMES) {
    return fail("NotEnoughOutcomes");
  }
  if (params.numOutcomes > MAX_OUTCOMES) return fail("TooManyOutcomes");
  if (params.scale <= 0n) return fail("LiquidityParameterIsZero");
  if (labelByteLength(params.label) > MAX_LABEL_LENGTH) return fail("InvalidLabelLength");
  if (now + minDurationSeconds >= params.resolveAt) return fail("MarketTooQuick");

  return ok({
    label: params.label,
    admin: params.admin,
    reserves: new Array<bigint>(MAX_OUTCOMES).fill(0n),
    supplies: new Array<bigint>(MAX_OUTCOMES).fill(0n),
    scale: params.scale,
    numOutcomes: params.numOutcomes,
    initializedAt: now,
    resolveAt: params.resolveAt,
  });
}

export function cloneMarket(market: Market): Market {
  return { ...market, reserves: [...market.reserves], supplies: [...market.supplies] };
}
