import "dotenv/config";
import { OpenAICompatibleClient, SqliteCacheBackend, openCacheDatabase } from "@tetraglot/translator";
import { ConfigError, initConfig, type Config } from "./config/index.js";
import { buildApp } from "./app.js";

function loadConfigOrExit(): Config {
  try {
    return initConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function start() {
  // 1. Load config (exits on invalid values)
  const config = loadConfigOrExit();

  // 2. Open the durable translation cache
  const cacheDb = await openCacheDatabase(config.cacheDbPath);

  // 3. Provider client (one attempt per call; retries are layered on in the app)
  const gateway = new OpenAICompatibleClient({
    apiKey: config.llmApiKey,
    model: config.llmModel,
    baseUrl: config.llmBaseUrl,
    timeoutMs: config.providerTimeoutMs,
  });

  // 4. Start server
  const app = await buildApp({ config, gateway, cacheBackend: new SqliteCacheBackend(cacheDb.db) });

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Tetraglot API running on ${config.host}:${config.port} [${config.env}]`);
  } catch (err) {
    app.log.error(err, "Failed to start server");
    cacheDb.close();
    process.exit(1);
  }

  // 5. Graceful shutdown
  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    cacheDb.close();
    app.log.info("Shutdown complete.");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "Unhandled promise rejection");
    void shutdown("unhandledRejection");
  });
}

void start();
