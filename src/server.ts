import "dotenv/config";
import type { Server } from "http";
import { AuthService } from "./auth";
import { connectMongoStore, MemoryAccountStore } from "./adapters";
import { loadConfig } from "./config";
import { createNotifier } from "./email";
import { createApp } from "./frameworks/express";
import type { ServiceConfig } from "./types/config";
import type { AccountStore } from "./types/db";
import { createLogger, describeError, reconfigureLogger } from "./utils/logger";

const log = createLogger("server");

interface StoreHandle {
  store: AccountStore;
  close(): Promise<void>;
}

async function openStore(config: ServiceConfig): Promise<StoreHandle> {
  if (config.store.mongoUri) {
    return connectMongoStore(config.store);
  }
  if (config.env === "production") {
    throw new Error("MONGO_URI must be configured in production");
  }
  log.warn("MONGO_URI is not set; accounts are kept in memory and lost on restart.");
  return { store: new MemoryAccountStore(), close: async () => undefined };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  reconfigureLogger(config.logLevel);

  const { store, close } = await openStore(config);
  const auth = AuthService.create(config, { store, notifier: createNotifier(config) });
  const app = createApp(auth);

  const server = app.listen(config.port, () => {
    log.info(`Authentication service listening on port ${config.port} (${config.env})`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    closeServer(server)
      .then(close)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Shutdown failed:", describeError(err));
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  log.error("Failed to start:", describeError(err));
  process.exit(1);
});
