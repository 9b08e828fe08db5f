import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes, type RouteOptions } from "./routes/index.js";

export interface BuildAppOptions extends RouteOptions {
  logger?: FastifyServerOptions["logger"];
}

/**
 * Assemble the Fastify instance without listening
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  await app.register(errorHandler);

  await registerApiRoutes(app, {
    dataDir: options.dataDir,
    fetchImpl: options.fetchImpl,
  });

  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
