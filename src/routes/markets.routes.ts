import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "../config/index.js";
import type { ErrorCode, LmsrError } from "../lib/errors.js";
import {
  buyQuoteQuerySchema,
  buySharesSchema,
  marketCreateSchema,
  marketLabelParamsSchema,
} from "../schemas/market.schema.js";
import {
  createMarket,
  getMarketSnapshot,
  listMarkets,
  purchaseShares,
  quotePurchase,
  snapshotMarket,
  type MarketSnapshot,
} from "../services/market-registry.service.js";

const ERROR_STATUS: Partial<Record<ErrorCode, number>> = {
  MarketNotFound: 404,
  MarketAlreadyExists: 409,
  MarketExpired: 409,
};

function sendError(reply: FastifyReply, error: LmsrError) {
  return reply.code(ERROR_STATUS[error.code] ?? 422).send({ error: error.code, message: error.message });
}

export async function registerMarketRoutes(app: FastifyInstance): Promise<void> {
  app.post("/api/markets", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = marketCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { label, admin, numOutcomes, scale, resolveAt } = parsed.data;
    const created = createMarket({ label, admin, numOutcomes, resolveAt, scale: scale ?? config.defaultScale });
    if (!created.ok) return sendError(reply, created.error);
    const snapshot = snapshotMarket(created.value);
    if (!snapshot.ok) return sendError(reply, snapshot.error);
    req.log.info({ label, numOutcomes, scale: snapshot.value.scale }, "market created");
    return reply.code(201).send(snapshot.value);
  });

  app.get("/api/markets", async (req: FastifyRequest, reply: FastifyReply) => {
    const data: MarketSnapshot[] = [];
    for (const market of listMarkets()) {
      const snapshot = snapshotMarket(market);
      if (snapshot.ok) {
        data.push(snapshot.value);
      } else {
        req.log.warn({ label: market.label, code: snapshot.error.code }, "market snapshot failed");
      }
    }
    return reply.send({ data, total: data.length });
  });

  app.get("/api/markets/:label", async (req: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
    const params = marketLabelParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "Invalid params", details: params.error.flatten() });
    }
    const snapshot = getMarketSnapshot(params.data.label);
    if (!snapshot.ok) return sendError(reply, snapshot.error);
    return reply.send(snapshot.value);
  });

  app.get(
    "/api/markets/:label/quote",
    async (req: FastifyRequest<{ Params: unknown; Querystring: unknown }>, reply: FastifyReply) => {
      const params = marketLabelParamsSchema.safeParse(req.params);
      if (!params.success) {
        return reply.code(400).send({ error: "Invalid params", details: params.error.flatten() });
      }
      const query = buyQuoteQuerySchema.safeParse(req.query);
      if (!query.success) {
        return reply.code(400).send({ error: "Invalid query", details: query.error.flatten() });
      }
      const quote = quotePurchase(params.data.label, query.data.outcomeIndex, query.data.amount);
      if (!quote.ok) return sendError(reply, quote.error);
      return reply.send(quote.value);
    }
  );

  app.post(
    "/api/markets/:label/buy",
    async (req: FastifyRequest<{ Params: unknown; Body: unknown }>, reply: FastifyReply) => {
      const params = marketLabelParamsSchema.safeParse(req.params);
      if (!params.success) {
        return reply.code(400).send({ error: "Invalid params", details: params.error.flatten() });
      }
      const body = buySharesSchema.safeParse(req.body);
      if (!body.success) {
        return reply.code(400).send({ error: "Invalid body", details: body.error.flatten() });
      }
      const { label } = params.data;
      const { outcomeIndex, amount } = body.data;
      const receipt = purchaseShares(label, outcomeIndex, amount);
      if (!receipt.ok) {
        req.log.info({ label, outcomeIndex, amount: amount.toString(), code: receipt.error.code }, "buy rejected");
        return sendError(reply, receipt.error);
      }
      req.log.info(
        { label, outcomeIndex, amount: receipt.value.amountIn, sharesMinted: receipt.value.sharesMinted },
        "shares purchased"
      );
      return reply.send(receipt.value);
    }
  );
}
