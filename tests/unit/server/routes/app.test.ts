import { type FastifyInstance } from "fastify";
import {
  describe,
  it,
  expect,
  vi,
  beforeAll,
  afterAll,
} from "vitest";

import { buildApp } from "../../../../src/server/app.js";
import {
  buildRawContent,
  createTempDir,
  rawFileName,
  removeTempDir,
  sampleRows,
  writeRawFile,
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

describe("server/app", () => {
  let app: FastifyInstance;
  let dir: string;

  beforeAll(async () => {
    dir = createTempDir();
    writeRawFile(dir, rawFileName(5), buildRawContent(sampleRows));
    writeRawFile(dir, rawFileName(9), buildRawContent(sampleRows));
    writeRawFile(dir, "notes.csv", "not a region file\n");

    app = await buildApp({ dataDir: dir });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    removeTempDir(dir);
  });

  describe("GET /health", () => {
    it("should report ok", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    });
  });

  describe("GET /api/v1/regions", () => {
    it("should list the 25 regions in id order with exclusions flagged", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/regions",
      });

      expect(response.statusCode).toBe(200);
      const regions: { id: number; name: string; excluded: boolean }[] =
        response.json().data;

      expect(regions).toHaveLength(25);
      expect(regions.map((r) => r.id)).toEqual(
        Array.from({ length: 25 }, (_, i) => i + 1)
      );
      expect(regions[8]).toEqual({ id: 9, name: "Київська", excluded: false });
      expect(regions.filter((r) => r.excluded).map((r) => r.id)).toEqual([
        12, 20,
      ]);
    });
  });

  describe("GET /api/v1/files", () => {
    it("should describe each raw file by its reconciled region", async () => {
      const response = await app.inject({ method: "GET", url: "/api/v1/files" });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        {
          fileName: "notes.csv",
          localRegionId: null,
          regionId: null,
          regionName: null,
          excluded: false,
        },
        {
          fileName: "vhi_id__5__2025-03-01_09-05.csv",
          localRegionId: 5,
          regionId: 3,
          regionName: "Дніпропетровська",
          excluded: false,
        },
        {
          fileName: "vhi_id__9__2025-03-01_09-05.csv",
          localRegionId: 9,
          regionId: 20,
          regionName: "Херсонська",
          excluded: true,
        },
      ]);
    });
  });

  describe("GET /openapi.json", () => {
    it("should serve the OpenAPI document with the API routes", async () => {
      const response = await app.inject({ method: "GET", url: "/openapi.json" });

      expect(response.statusCode).toBe(200);
      const document = response.json();
      expect(document.info.title).toBe("VHI Dashboard API");
      expect(Object.keys(document.paths)).toEqual(
        expect.arrayContaining([
          "/health",
          "/api/v1/regions",
          "/api/v1/files",
          "/api/v1/records",
          "/api/v1/records/yearly-average",
          "/api/v1/downloads",
        ])
      );
    });
  });
});
