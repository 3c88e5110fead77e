import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import { config } from "./config/index.js";
import { registerMarketRoutes } from "./routes/markets.routes.js";

export interface BuildAppOptions {
  /** false silences request logging (tests); defaults to config.logLevel. */
  logger?: boolean | { level: string };
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  app.register(fastifyCors, {
    origin: config.corsOrigin,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  });

  app.get("/health", async () => ({ status: "ok" }));
  app.register(registerMarketRoutes);

  return app;
}
