/**
 * OpenAPI Plugin - Generates the OpenAPI 3.0 document
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "VHI Dashboard API",
        description:
          "Weekly vegetation health indices (VCI, TCI, VHI) for the regions of Ukraine, " +
          "downloaded from the NOAA STAR province time series and merged into one dataset. " +
          "The dataset is rebuilt from the raw files on every request.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Health",
          description: "Service status",
        },
        {
          name: "Regions",
          description: "Canonical region table",
        },
        {
          name: "Records",
          description:
            "Filter and sort weekly records, and per-year averages of an index",
        },
        {
          name: "Sources",
          description: "Raw per-region files and their download",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
