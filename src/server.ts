import dotenv from "dotenv";
dotenv.config();

import { buildApp } from "./app.js";
import { config } from "./config/index.js";

const app = buildApp();

const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info({ nodeEnv: config.nodeEnv }, "LMSR market server started");
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = async (signal: NodeJS.Signals) => {
  app.log.info({ signal }, "shutting down");
  try {
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

await start();
