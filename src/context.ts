import type { AppConfig } from "./config/env";
import { checkDbConnection, createDatabase } from "./config/databaseConnection";
import { createDrizzleStore, createMemoryStore, type Store } from "./models";
import { createSessionService, type SessionService } from "./services/session.service";
import { logger } from "./utils/logger";
import { RequestCounter } from "./utils/metrics";

export interface AppContext {
  config: AppConfig;
  store: Store;
  sessions: SessionService;
  counter: RequestCounter;
}

/** Wires the session service and counter around an already-built store. */
export const createContext = (
  config: AppConfig,
  store: Store,
  { now }: { now?: () => Date } = {}
): AppContext => ({
  config,
  store,
  sessions: createSessionService({
    users: store.users,
    refreshTokens: store.refreshTokens,
    jwtSecret: config.jwtSecret,
    now,
  }),
  counter: new RequestCounter(),
});

/**
 * Opens the configured storage and builds the context. `close` releases the
 * database pool, if there is one.
 */
export const bootstrapContext = async (
  config: AppConfig
): Promise<{ context: AppContext; close: () => Promise<void> }> => {
  if (config.storage.driver === "memory") {
    logger.warn("Using in-memory storage; data is lost on restart");
    return { context: createContext(config, createMemoryStore()), close: async () => {} };
  }

  const { db, pool } = createDatabase(config.storage.databaseUrl);
  await checkDbConnection(pool);

  return {
    context: createContext(config, createDrizzleStore(db)),
    close: () => pool.end(),
  };
};
