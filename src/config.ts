import "dotenv/config";

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export interface AppConfig {
  /** Directory holding the downloaded raw per-region files */
  dataDir: string;
  sourceUrl: string;
  yearFrom: number;
  yearTo: number;
  port: number;
  host: string;
}

export const config: Readonly<AppConfig> = Object.freeze({
  dataDir: process.env.DATA_DIR ?? "data_csv",
  sourceUrl:
    process.env.VHI_SOURCE_URL ??
    "https://www.star.nesdis.noaa.gov/smcd/emb/vci/VH/get_TS_admin.php",
  yearFrom: readInt("VHI_YEAR_FROM", 1981),
  yearTo: readInt("VHI_YEAR_TO", 2025),
  port: readInt("PORT", 3000),
  host: process.env.HOST ?? "0.0.0.0",
});
