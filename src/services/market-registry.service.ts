/**
 * In-memory market registry keyed by label. Persistence and custody live outside this
 * process; the registry holds the numeric state the LMSR engine mutates and renders it
 * for the HTTP layer (bigints as strings, probabilities as decimals).
 */

import Decimal from "decimal.js";
import { config } from "../config/index.js";
import {
  D9,
  buyShares,
  calculateCost,
  getAllPrices,
  getQuoteForBuy,
  initMarket,
  worstCaseLoss,
  type Market,
  type Result,
} from "../engine/index.js";
import { fail, ok } from "../lib/errors.js";

const markets = new Map<string, Market>();

export interface CreateMarketInput {
  label: string;
  admin: string;
  numOutcomes: number;
  scale: bigint;
  resolveAt: number;
}

export interface MarketSnapshot {
  label: string;
  admin: string;
  numOutcomes: number;
  scale: string;
  initializedAt: number;
  resolveAt: number;
  reserves: string[];
  supplies: string[];
  /** C(q) in the settlement unit. */
  cost: string;
  /** D9 prices per outcome. */
  prices: string[];
  /** Same prices as decimals in [0, 1]. */
  probabilities: string[];
  worstCaseLoss: string;
}

export interface PurchaseReceipt {
  label: string;
  outcomeIndex: number;
  amountIn: string;
  sharesMinted: string;
  prices: string[];
  cost: string;
}

export interface QuoteResponse {
  label: string;
  outcomeIndex: number;
  amountIn: string;
  sharesOut: string;
  priceBefore: string;
  priceAfter: string;
  costBefore: string;
  costAfter: string;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Render a D9 integer as a decimal string with nine places ("0.731058578"). */
export function formatD9(value: bigint): string {
  return new Decimal(value.toString()).div(D9.toString()).toFixed(9);
}

export function createMarket(input: CreateMarketInput, now: number = nowSeconds()): Result<Market> {
  if (markets.has(input.label)) return fail("MarketAlreadyExists");
  const created = initMarket(input, now, config.minMarketDurationSeconds);
  if (!created.ok) return created;
  markets.set(input.label, created.value);
  return created;
}

export function getMarket(label: string): Result<Market> {
  const market = markets.get(label);
  return market === undefined ? fail("MarketNotFound") : ok(market);
}

export function listMarkets(): Market[] {
  return [...markets.values()];
}

export function snapshotMarket(market: Market): Result<MarketSnapshot> {
  const cost = calculateCost(market);
  if (!cost.ok) return cost;
  const prices = getAllPrices(market);
  if (!prices.ok) return prices;
  const loss = worstCaseLoss(market.scale, market.numOutcomes);
  if (!loss.ok) return loss;

  const n = market.numOutcomes;
  return ok({
    label: market.label,
    admin: market.admin,
    numOutcomes: n,
    scale: market.scale.toString(),
    initializedAt: market.initializedAt,
    resolveAt: market.resolveAt,
    reserves: market.reserves.slice(0, n).map(String),
    supplies: market.supplies.slice(0, n).map(String),
    cost: cost.value.toString(),
    prices: prices.value.map(String),
    probabilities: prices.value.map(formatD9),
    worstCaseLoss: loss.value.toString(),
  });
}

export function getMarketSnapshot(label: string): Result<MarketSnapshot> {
  const market = getMarket(label);
  if (!market.ok) return market;
  return snapshotMarket(market.value);
}

function openMarket(label: string, now: number): Result<Market> {
  const market = getMarket(label);
  if (!market.ok) return market;
  if (now >= market.value.resolveAt) return fail("MarketExpired");
  return market;
}

export function quotePurchase(
  label: string,
  outcomeIndex: number,
  amountIn: bigint,
  now: number = nowSeconds()
): Result<QuoteResponse> {
  const market = openMarket(label, now);
  if (!market.ok) return market;
  const quote = getQuoteForBuy(market.value, outcomeIndex, amountIn);
  if (!quote.ok) return quote;
  const q = quote.value;
  return ok({
    label,
    outcomeIndex,
    amountIn: q.amountIn.toString(),
    sharesOut: q.sharesOut.toString(),
    priceBefore: q.priceBefore.toString(),
    priceAfter: q.priceAfter.toString(),
    costBefore: q.costBefore.toString(),
    costAfter: q.costAfter.toString(),
  });
}

/**
 * Execute a buy against a registered market. Node runs this to completion before the
 * next request touches the same entry, so the market sees one trade at a time.
 */
export function purchaseShares(
  label: string,
  outcomeIndex: number,
  amountIn: bigint,
  now: number = nowSeconds()
): Result<PurchaseReceipt> {
  const market = openMarket(label, now);
  if (!market.ok) return market;
  const minted = buyShares(market.value, outcomeIndex, amountIn);
  if (!minted.ok) return minted;

  const cost = calculateCost(market.value);
  if (!cost.ok) return cost;
  const prices = getAllPrices(market.value);
  if (!prices.ok) return prices;
  return ok({
    label,
    outcomeIndex,
    amountIn: amountIn.toString(),
    sharesMinted: minted.value.toString(),
    prices: prices.value.map(String),
    cost: cost.value.toString(),
  });
}

export function resetMarketRegistry(): void {
  markets.clear();
}
