import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { resolveRange } from "../../../../src/server/routes/records.js";
import {
  errorHandler,
  ValidationError,
} from "../../../../src/server/plugins/error-handler.js";

describe("server/plugins/error-handler", () => {
  describe("ValidationError", () => {
    it("should carry code, status and details", () => {
      const error = new ValidationError("Invalid year range", {
        yearFrom: 2010,
        yearTo: 2000,
      });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("ValidationError");
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.statusCode).toBe(400);
      expect(error.details).toEqual({ yearFrom: 2010, yearTo: 2000 });
    });

    it("should leave details unset when none are given", () => {
      expect(new ValidationError("Invalid week range").details).toBeUndefined();
    });
  });

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      app.get<{ Querystring: { from: number; to: number } }>(
        "/weeks",
        {
          schema: {
            querystring: {
              type: "object",
              required: ["from", "to"],
              properties: {
                from: { type: "integer", minimum: 1 },
                to: { type: "integer", minimum: 1 },
              },
            },
          },
        },
        async (request) => ({
          weeks: resolveRange("week", request.query.from, request.query.to, [1, 52]),
        })
      );

      app.get("/broken", async () => {
        throw new Error("dataset exploded");
      });

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("should pass a valid range through", async () => {
      const response = await app.inject({ method: "GET", url: "/weeks?from=3&to=9" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ weeks: [3, 9] });
    });

    it("should answer 400 with details for a reversed range", async () => {
      const response = await app.inject({ method: "GET", url: "/weeks?from=9&to=3" });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.message).toBe("Invalid week range");
      expect(body.details).toEqual({ weekFrom: 9, weekTo: 3 });
      expect(body.requestId).toBeDefined();
    });

    it("should answer 400 for a schema violation", async () => {
      const response = await app.inject({ method: "GET", url: "/weeks?from=0&to=3" });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.error).toBe("VALIDATION_ERROR");
      expect(body.message).toBe("Invalid request parameters");
      expect(body.details.validation).toBeDefined();
    });

    it("should hide unexpected errors behind a 500", async () => {
      const response = await app.inject({ method: "GET", url: "/broken" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId: expect.any(String),
      });
    });

    it("should answer 404 for an unknown route", async () => {
      const response = await app.inject({ method: "GET", url: "/regions/99" });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toBe("NOT_FOUND");
      expect(body.message).toBe("Route GET /regions/99 not found");
    });
  });
});
