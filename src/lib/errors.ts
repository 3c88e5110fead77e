/**
 * Closed set of failure kinds shared by the pricing core and the market registry.
 * Every fallible operation returns a Result; nothing here is thrown.
 */

export const ERROR_MESSAGES = {
  MathOverflow: "Math overflow",
  MathDomain: "Argument outside the function domain",
  InvalidOutcomeIndex: "Invalid outcome index",
  LiquidityParameterIsZero: "Liquidity parameter is zero",
  TooManyOutcomes: "Too many outcomes",
  NotEnoughOutcomes: "Outcome count is below two",
  DepositIsZero: "Deposit is zero",
  InvalidLabelLength: "Invalid label length",
  MarketTooQuick: "Market must last at least the minimum duration",
  MarketExpired: "Market expired",
  MarketNotFound: "Market not found",
  MarketAlreadyExists: "Market already exists",
} as const;

export type ErrorCode = keyof typeof ERROR_MESSAGES;

export interface LmsrError {
  code: ErrorCode;
  message: string;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: LmsrError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(code: ErrorCode): { ok: false; error: LmsrError } {
  return { ok: false, error: { code, message: ERROR_MESSAGES[code] } };
}
