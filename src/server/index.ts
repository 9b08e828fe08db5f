import { config } from "../config.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { buildApp } from "./app.js";

const app = await buildApp({
  dataDir: config.dataDir,
  logger: fastifyLoggerConfig,
});

try {
  await app.listen({ port: config.port, host: config.host });
  serverLogger.info(
    { host: config.host, port: config.port, dataDir: config.dataDir },
    "Server started"
  );
} catch (err) {
  serverLogger.error({ err }, "Failed to start server");
  process.exit(1);
}
