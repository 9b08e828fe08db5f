import { readdirSync } from "node:fs";

import { type FastifyInstance } from "fastify";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { buildApp } from "../../../../src/server/app.js";
import {
  buildRawContent,
  createTempDir,
  removeTempDir,
  sampleRows,
} from "../../../fixtures/raw-files.js";

vi.mock("../../../../src/logger.js", () => ({
  datasetLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  fetchLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe("server/routes/downloads", () => {
  let app: FastifyInstance;
  let dir: string;
  const fetchImpl = vi.fn<typeof fetch>();

  beforeEach(async () => {
    dir = createTempDir();
    fetchImpl.mockReset();
    app = await buildApp({ dataDir: dir, fetchImpl });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    removeTempDir(dir);
  });

  it("should download the requested regions and report each outcome", async () => {
    fetchImpl
      .mockResolvedValueOnce(new Response(buildRawContent(sampleRows)))
      .mockResolvedValueOnce(
        new Response("busy", { status: 503, statusText: "Service Unavailable" })
      );

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      payload: { regionCodes: [5, 6] },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.meta).toEqual({ downloaded: 1, skipped: 0, failed: 1 });
    expect(body.data[0].regionCode).toBe(5);
    expect(body.data[0].status).toBe("downloaded");
    expect(body.data[1]).toEqual({
      regionCode: 6,
      status: "failed",
      error: "Failed to download region 6: 503 Service Unavailable",
    });

    const files = readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^vhi_id__5__\d{4}-\d{2}-\d{2}_\d{2}-\d{2}\.csv$/);
  });

  it("should skip regions that are already downloaded", async () => {
    fetchImpl.mockImplementation(() =>
      Promise.resolve(new Response(buildRawContent(sampleRows)))
    );

    await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      payload: { regionCodes: [5] },
    });
    const response = await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      payload: { regionCodes: [5] },
    });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const body = response.json();
    expect(body.meta).toEqual({ downloaded: 0, skipped: 1, failed: 0 });
    expect(body.data[0].status).toBe("skipped");
  });

  it("should download every source region when no codes are given", async () => {
    fetchImpl.mockImplementation(() =>
      Promise.resolve(new Response(buildRawContent(sampleRows)))
    );

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      payload: {},
    });

    expect(response.statusCode).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(27);
    expect(response.json().meta.downloaded).toBe(27);
  });

  it("should reject an empty region list", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      payload: { regionCodes: [] },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("VALIDATION_ERROR");
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("should answer 400 for a malformed JSON body", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/v1/downloads",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("BAD_REQUEST");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
