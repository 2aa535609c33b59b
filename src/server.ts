// src/server.ts
import "dotenv/config";

import { loadConfig } from "./config";
import { buildServices } from "./services";
import { createApp } from "./app";
import { createLogger } from "./log";

const log = createLogger("server");

const config = loadConfig();
const app = createApp(buildServices(config));

app.listen(config.port, () => {
  log.info(`listening on :${config.port}`);
});
