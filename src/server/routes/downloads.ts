/**
 * Download Routes - /api/v1/downloads
 */

import { Type, type Static } from "@sinclair/typebox";

import { SOURCE_REGION_CODES } from "../../data/regions.js";
import { fetchRegions } from "../../scraper/client.js";
import { DownloadResponseSchema } from "../schemas/responses.js";

import type { RouteOptions } from "./index.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const DownloadBodySchema = Type.Object({
  regionCodes: Type.Optional(
    Type.Array(Type.Integer({ minimum: 1, maximum: 99 }), {
      minItems: 1,
      description: "File-local region codes to download (default: 1-27)",
    })
  ),
});

type DownloadBody = Static<typeof DownloadBodySchema>;

// ============================================================================
// Routes
// ============================================================================

export function registerDownloadRoutes(
  app: FastifyInstance,
  options: RouteOptions
): void {
  /**
   * POST /api/v1/downloads
   * Download missing region files, one region at a time
   */
  app.post<{ Body: DownloadBody }>(
    "/downloads",
    {
      schema: {
        summary: "Download region files",
        description:
          "Fetches each requested region from the VHI source unless a file for it is already present. " +
          "A failed region is reported and does not stop the others.",
        tags: ["Sources"],
        body: DownloadBodySchema,
        response: {
          200: DownloadResponseSchema,
        },
      },
    },
    async (request) => {
      const regionCodes = request.body.regionCodes ?? SOURCE_REGION_CODES;

      const outcomes = await fetchRegions(regionCodes, {
        dataDir: options.dataDir,
        fetchImpl: options.fetchImpl,
      });

      return {
        data: outcomes,
        meta: {
          downloaded: outcomes.filter((o) => o.status === "downloaded").length,
          skipped: outcomes.filter((o) => o.status === "skipped").length,
          failed: outcomes.filter((o) => o.status === "failed").length,
        },
      };
    }
  );
}
