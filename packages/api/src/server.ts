import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { createContext } from "./context.js";
import { createApiHandler } from "./handler.js";

const config = loadConfig();
const context = createContext(config);
const handler = createApiHandler(context);

const server = serve({ fetch: handler, port: config.port, hostname: config.host }, (info) => {
  console.info(`[server] listening on http://${info.address}:${info.port}`);
  console.info(`[server] accepting ${context.registry.supportedExtensions().join(", ")}`);
});

function shutdown(signal: NodeJS.Signals) {
  console.info(`[server] ${signal} received, closing`);
  server.close((err) => {
    if (err) {
      console.error("[server] close failed:", err);
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
