/**
 * Raw File Routes - /api/v1/files
 */

import { listRawFileInfo } from "../../services/catalog.js";
import { RawFileListResponseSchema } from "../schemas/responses.js";

import type { RouteOptions } from "./index.js";
import type { FastifyInstance } from "fastify";

export function registerFileRoutes(
  app: FastifyInstance,
  options: RouteOptions
): void {
  /**
   * GET /api/v1/files
   * Raw files currently in the data directory
   */
  app.get(
    "/files",
    {
      schema: {
        summary: "List raw files",
        description:
          "Downloaded per-region files with the canonical region each one reconciles to.",
        tags: ["Sources"],
        response: {
          200: RawFileListResponseSchema,
        },
      },
    },
    () => ({ data: listRawFileInfo(options.dataDir) })
  );
}
