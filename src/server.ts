import dotenv from "dotenv";
import { resolveAppConfig } from "./config/appConfig.js";
import { createApp } from "./app.js";
import { createEngine } from "./workflow/createEngine.js";
import { createLogger } from "./workflow/logger.js";

dotenv.config();

const logger = createLogger("server");
const appConfig = resolveAppConfig();
const engine = createEngine(appConfig, { logger: createLogger("workflow") });
const app = createApp(engine, logger);

app.listen(appConfig.port, () => {
  logger.info("server_started", {
    url: `http://localhost:${appConfig.port}`,
    flow: appConfig.flowPath,
    store: appConfig.sessionStore,
  });
});
