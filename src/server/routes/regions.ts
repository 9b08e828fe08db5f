/**
 * Region Routes - /api/v1/regions
 */

import { listRegions } from "../../services/catalog.js";
import { RegionListResponseSchema } from "../schemas/responses.js";

import type { FastifyInstance } from "fastify";

export function registerRegionRoutes(app: FastifyInstance): void {
  /**
   * GET /api/v1/regions
   * Region table in canonical id order
   */
  app.get(
    "/regions",
    {
      schema: {
        summary: "List regions",
        description:
          "All 25 canonical regions in id order. Excluded regions are listed but never have records.",
        tags: ["Regions"],
        response: {
          200: RegionListResponseSchema,
        },
      },
    },
    () => ({ data: listRegions() })
  );
}
