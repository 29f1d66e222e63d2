import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { MemoryUrlStore } from "./storage_memory.js";

const config = loadConfig();

const store = new MemoryUrlStore();
await store.init();

const app = await buildApp({ deps: { config, store } });

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  app.log.info({ signal }, "shutting down");
  try {
    // stops accepting requests, then drains access increments and closes the store
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error({ err }, "shutdown failed");
    process.exit(1);
  }
}

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));

await app.listen({ port: config.port, host: config.host });
app.log.info(
  {
    port: config.port,
    baseUrl: config.baseUrl,
    rateLimitEnabled: config.rateLimitEnabled,
    version: config.appVersion,
    commit: config.gitSha,
    env: config.appEnv
  },
  "url-service started"
);
