/**
 * LMSR market types.
 * supplies[i] = D9 shares minted for outcome i, reserves[i] = amount paid into outcome i,
 * scale = liquidity parameter b. Both arrays are MAX_OUTCOMES long; only the first
 * numOutcomes entries are live.
 */

export interface Market {
  label: string;
  /** Identity allowed to administer the market. Carried, not checked here. */
  admin: string;
  reserves: bigint[];
  supplies: bigint[];
  /** Liquidity parameter b, in the settlement asset's smallest unit. Worst-case loss is b * ln(n). */
  scale: bigint;
  numOutcomes: number;
  /** Unix seconds. */
  initializedAt: number;
  /** Unix seconds; trading halts at this instant. */
  resolveAt: number;
}

export interface MarketInitParams {
  label: string;
  admin: string;
  numOutcomes: number;
  scale: bigint;
  resolveAt: number;
}

export interface BuyQuote {
  outcomeIndex: number;
  amountIn: bigint;
  sharesOut: bigint;
  priceBefore: bigint;
  priceAfter: bigint;
  costBefore: bigint;
  costAfter: bigint;
}
