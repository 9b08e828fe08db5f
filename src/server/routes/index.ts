/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerDownloadRoutes } from "./downloads.js";
import { registerFileRoutes } from "./files.js";
import { registerRecordRoutes } from "./records.js";
import { registerRegionRoutes } from "./regions.js";

import type { FastifyInstance } from "fastify";

export interface RouteOptions {
  /** Directory the raw per-region files are read from and saved to */
  dataDir: string;
  fetchImpl?: typeof fetch;
}

const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  options: RouteOptions
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  await app.register(
    (api) => {
      registerRegionRoutes(api);
      registerRecordRoutes(api, options);
      registerFileRoutes(api, options);
      registerDownloadRoutes(api, options);
    },
    { prefix: "/api/v1" }
  );
}
