import { createApp } from "./app";
import { config } from "./config";
import { logger } from "./logger";

const app = createApp();

app.listen(config.port, () => {
  logger.info({ port: config.port, env: config.nodeEnv }, `schedule API listening on port ${config.port}`);
});
