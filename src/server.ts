import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { createLogger, loadConfig } from "./lib/index.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });
const app = createApp({ logger });

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info({ address: info.address, port: info.port }, "Hawk header guard listening");
});
