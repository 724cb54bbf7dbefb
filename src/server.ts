import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { loadBannerSeed } from "./services/bannerSeed";
import { BannerSelector } from "./services/bannerSelector";
import { BannerStore } from "./services/bannerStore";
import { configureLogger, logger } from "./utils/logger";

async function start() {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, silent: config.env === "test", production: config.env === "production" });

  const seed = loadBannerSeed(config.bannerSeedFile);
  const store = new BannerStore({ seed });
  const app = createApp({ config, store, selector: new BannerSelector() });

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve());
    server.on("error", reject);
  });
  logger.info(`API listening on http://localhost:${config.port}${config.apiPrefix}`, {
    activeBanners: store.listActive().length,
    adminAuth: Boolean(config.adminJwtSecret),
  });
}

start().catch((err) => {
  logger.error("Fatal startup error", { error: err instanceof Error ? err.stack ?? err.message : String(err) });
  process.exit(1);
});
