const optionalEnv = (key: string, fallback: string): string => {
  return process.env[key] ?? fallback;
};

function makeConfig() {
  return {
    get port(): number {
      return Number(optionalEnv("PORT", "3000"));
    },
    get host(): string {
      return optionalEnv("HOST", "0.0.0.0");
    },
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    /** pino level for the Fastify logger (fatal, error, warn, info, debug, trace, silent). */
    get logLevel(): string {
      return optionalEnv("LOG_LEVEL", "info");
    },
    /** Comma-separated origins (e.g. "http://localhost:3000,http://localhost:3001"). "*" or "true" = allow all. */
    get corsOrigin(): string | string[] | true {
      const o = process.env.CORS_ORIGIN?.trim();
      if (o === "true" || o === "*") return true;
      const raw = o ?? "http://localhost:3000";
      const list = raw.split(",").map((s) => s.trim()).filter(Boolean);
      return list.length > 1 ? list : list[0] ?? raw;
    },
    /** Shortest allowed gap between market creation and resolveAt, in seconds. */
    get minMarketDurationSeconds(): number {
      const n = Number(optionalEnv("MIN_MARKET_DURATION_SECONDS", "1"));
      return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 1;
    },
    /** Liquidity parameter b used when a create request omits scale (1e9 = one whole unit at 9 decimals). */
    get defaultScale(): bigint {
      const raw = process.env.DEFAULT_LIQUIDITY_SCALE?.trim();
      if (raw && /^\d+$/.test(raw) && BigInt(raw) > 0n) return BigInt(raw);
      return 1_000_000_000n;
    },
  };
}

export const config = makeConfig();

/** Upper bound on outcomes per market; reserves and supplies are sized to it. */
export const MAX_OUTCOMES = 16;
export const MIN_OUTCOMES = 2;
/** Labels double as 32-byte address seeds in the storage layer. */
export const MAX_LABEL_LENGTH = 32;
