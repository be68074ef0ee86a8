import { readFile } from "fs/promises";
import { createServer as createHttpServer } from "http";
import { fileURLToPath } from "url";
import { Server as SocketIOServer } from "socket.io";
import { DEFAULT_CORS_ORIGINS, createServer } from "./server.js";
import { loadConfig, type ApiConfig } from "./config/env.js";
import { InMemoryItemCatalog, parseItemPools, type ItemCatalog } from "./data/catalog.js";
import { createPool } from "./data/db.js";
import type { DraftStore } from "./data/draftStore.js";
import { InMemoryDraftStore } from "./data/memoryDraftStore.js";
import { PgDraftStore } from "./data/pgDraftStore.js";
import { PgItemCatalog } from "./data/repositories/catalogRepository.js";
import { errorFields, log } from "./logger.js";
import { registerDraftNamespace } from "./realtime/draftNamespace.js";
import { DraftEventHub, registerDraftEventEmitter } from "./realtime/draftEvents.js";
import { DraftEngine } from "./services/drafting/draftEngine.js";
import { startDraftSweeper } from "./services/draftSweeper.js";

const SAMPLE_CATALOG = fileURLToPath(new URL("../data/sample-catalog.json", import.meta.url));

async function buildStorage(
  config: ApiConfig
): Promise<{ store: DraftStore; catalog: ItemCatalog }> {
  if (config.draftStore === "postgres" && config.databaseUrl) {
    const pool = createPool(config.databaseUrl);
    return { store: new PgDraftStore(pool), catalog: new PgItemCatalog(pool) };
  }
  const catalogFile = config.catalogFile ?? SAMPLE_CATALOG;
  const raw: unknown = JSON.parse(await readFile(catalogFile, "utf8"));
  return {
    store: new InMemoryDraftStore(),
    catalog: new InMemoryItemCatalog(parseItemPools(raw))
  };
}

async function main() {
  const config = loadConfig();
  const { store, catalog } = await buildStorage(config);
  const events = new DraftEventHub();
  const engine = new DraftEngine({ store, catalog, events });

  const app = createServer({
    engine,
    authSecret: config.authSecret,
    corsAllowedOrigins: config.corsAllowedOrigins
  });
  const httpServer = createHttpServer(app);

  if (config.realtimeEnabled) {
    const io = new SocketIOServer(httpServer, {
      cors: {
        origin:
          config.corsAllowedOrigins.length > 0
            ? config.corsAllowedOrigins
            : DEFAULT_CORS_ORIGINS,
        credentials: true
      },
      serveClient: false
    });
    const draftNamespace = registerDraftNamespace(io, {
      engine,
      authSecret: config.authSecret
    });
    registerDraftEventEmitter(events, draftNamespace);
  }

  if (config.sweeper.enabled) {
    const sweeper = startDraftSweeper({
      engine,
      store,
      intervalMs: config.sweeper.intervalMs,
      batchSize: config.sweeper.batchSize
    });
    httpServer.on("close", () => sweeper.stop());
  }

  httpServer.listen(config.port, () => {
    log({
      level: "info",
      msg: "api_listening",
      port: config.port,
      store: config.draftStore
    });
  });
}

main().catch((err: unknown) => {
  log({
    level: "error",
    msg: "api_start_failed",
    ...errorFields(err)
  });
  process.exitCode = 1;
});
