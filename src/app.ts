import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { AppConfig } from "./config";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { logSlowRequests } from "./middleware/security";
import { createBannerRouter } from "./routes/banners";
import { BannerSelector } from "./services/bannerSelector";
import { BannerStore } from "./services/bannerStore";
import { componentLogger } from "./utils/logger";

export type AppDependencies = {
  config: AppConfig;
  store: BannerStore;
  selector?: BannerSelector;
};

const accessLog = componentLogger("access");

export function createApp({ config, store, selector = new BannerSelector() }: AppDependencies): Express {
  const app = express();
  // Respect X-Forwarded-* from a single reverse proxy
  app.set("trust proxy", 1);

  if (config.corsEnabled) {
    app.use(cors());
    app.options(/.*/, cors());
  }
  app.use(helmet());
  app.use(logSlowRequests(config.slowRequestMs));
  app.use(express.json({ limit: "100kb" }));
  if (config.env !== "test") {
    app.use(morgan(config.env === "production" ? "combined" : "dev", {
      stream: { write: (line: string) => accessLog.http(line.trim()) },
    }));
  }
  if (config.rateLimit.max > 0) {
    app.use(rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests" },
    }));
  }

  const prefix = config.apiPrefix;
  app.get(`${prefix}/health`, (_req, res) => res.json({ ok: true }));
  app.use(`${prefix}/banners`, createBannerRouter({ store, selector, adminJwtSecret: config.adminJwtSecret }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
