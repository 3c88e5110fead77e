import { z } from "zod";
import { U64_MAX } from "../lib/checked-math.js";

/** Unsigned 64-bit integer sent as a decimal string (JSON numbers lose precision past 2^53). */
const u64String = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string")
  .transform((s) => BigInt(s))
  .refine((v) => v <= U64_MAX, "exceeds u64 range");

export const marketLabelParamsSchema = z.object({
  label: z.string().min(1),
});

export const marketCreateSchema = z.object({
  label: z.string().min(1),
  admin: z.string().min(1),
  /** Range is enforced by initMarket so the rejection carries its error code. */
  numOutcomes: z.number().int(),
  /** Liquidity parameter b; config.defaultScale when omitted. */
  scale: u64String.optional(),
  /** Unix seconds. */
  resolveAt: z.number().int().positive(),
});

export const buySharesSchema = z.object({
  outcomeIndex: z.number().int().min(0),
  amount: u64String,
});

export const buyQuoteQuerySchema = z.object({
  outcomeIndex: z.string().regex(/^\d+$/, "must be a non-negative integer").pipe(z.coerce.number().int()),
  amount: u64String,
});

export type MarketLabelParams = z.infer<typeof marketLabelParamsSchema>;
export type MarketCreateInput = z.infer<typeof marketCreateSchema>;
export type BuySharesInput = z.infer<typeof buySharesSchema>;
export type BuyQuoteQueryInput = z.infer<typeof buyQuoteQuerySchema>;
