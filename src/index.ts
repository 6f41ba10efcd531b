import path from "path";
import express, { type Application } from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import type { AppContext } from "./context";
import { healthController } from "./controllers/health.controller";
import { createRequireAuth } from "./middlewares/auth.middleware";
import { errorHandler, notFoundHandler } from "./middlewares/error.middleware";
import { countRequests } from "./middlewares/request.middleware";
import { createAdminRoutes } from "./routes/admin.routes";
import { createAuthRoutes } from "./routes/auth.routes";
import { createChirpRoutes } from "./routes/chirp.routes";
import { createUserRoutes } from "./routes/user.routes";
import { createWebhookRoutes } from "./routes/webhook.routes";

export const PUBLIC_DIR = path.join(process.cwd(), "public");

export const createApp = ({ config, store, sessions, counter }: AppContext): Application => {
  const app = express();

  // Behind a proxy in production; needed for req.ip and rate limiting
  if (config.isProduction) {
    app.set("trust proxy", 1);
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        // non-browser clients send no Origin
        if (!origin || !config.isProduction) {
          return callback(null, true);
        }
        if (config.corsOrigins.includes(origin)) {
          return callback(null, true);
        }
        callback(new Error("CORS policy: origin not allowed"));
      },
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      optionsSuccessStatus: 200,
    })
  );

  // Baseline hardening
  app.disable("x-powered-by");
  app.use(helmet());
  app.use(compression());

  app.use(express.json({ limit: "1mb" }));

  const requireAuth = createRequireAuth(sessions);

  // static site; every hit counts towards /admin/metrics
  app.use("/app", countRequests(counter), express.static(PUBLIC_DIR));

  app.get("/api/healthz", healthController);

  app.use("/api", createAuthRoutes({ users: store.users, sessions, rateLimit: config.rateLimit }));
  app.use("/api/users", createUserRoutes({ users: store.users, sessions, requireAuth }));
  app.use("/api/chirps", createChirpRoutes({ chirps: store.chirps, requireAuth }));
  app.use("/api/polka", createWebhookRoutes({ users: store.users, polkaKey: config.polkaKey }));
  app.use(
    "/admin",
    createAdminRoutes({ users: store.users, counter, platform: config.platform })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
