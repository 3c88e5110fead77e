export { D9, E_D9, EXP_ARG_LIMIT, MAX_LN_REDUCTIONS, fpExp, fpLn } from "./fixed-point.js";
export { initMarket, cloneMarket } from "./market-state.js";
export {
  calculateCost,
  getInstantPrice,
  getAllPrices,
  calculateSharesOut,
  buyShares,
  getQuoteForBuy,
  worstCaseLoss,
} from "./lmsr-engine.js";
export type { Market, MarketInitParams, BuyQuote } from "../types/lmsr.js";
export type { ErrorCode, LmsrError, Result } from "../lib/errors.js";
