import type { Region } from "../types/index.js";

// ============================================================================
// Region Table
// ============================================================================

/**
 * Canonical regions of Ukraine, ordered by official regional code.
 */
export const REGIONS: readonly Region[] = Object.freeze(
  [
    { id: 1, name: "Вінницька" },
    { id: 2, name: "Волинська" },
    { id: 3, name: "Дніпропетровська" },
    { id: 4, name: "Донецька" },
    { id: 5, name: "Житомирська" },
    { id: 6, name: "Закарпатська" },
    { id: 7, name: "Запорізька" },
    { id: 8, name: "Івано-Франківська" },
    { id: 9, name: "Київська" },
    { id: 10, name: "Кіровоградська" },
    { id: 11, name: "Луганська" },
    { id: 12, name: "Львівська" },
    { id: 13, name: "Миколаївська" },
    { id: 14, name: "Одеська" },
    { id: 15, name: "Полтавська" },
    { id: 16, name: "Рівненська" },
    { id: 17, name: "Сумська" },
    { id: 18, name: "Тернопільська" },
    { id: 19, name: "Харківська" },
    { id: 20, name: "Херсонська" },
    { id: 21, name: "Хмельницька" },
    { id: 22, name: "Черкаська" },
    { id: 23, name: "Чернівецька" },
    { id: 24, name: "Чернігівська" },
    { id: 25, name: "Республіка Крим" },
  ].map((region) => Object.freeze(region))
);

const NAME_BY_ID: ReadonlyMap<number, string> = new Map(
  REGIONS.map((r) => [r.id, r.name])
);

const ID_BY_NAME: ReadonlyMap<string, number> = new Map(
  REGIONS.map((r) => [r.name, r.id])
);

// ============================================================================
// Source Numbering
// ============================================================================

/**
 * File-local (download order) id -> canonical id.
 * Empirical table; ids missing here already match the canonical numbering.
 */
export const REGION_REMAP: ReadonlyMap<number, number> = new Map([
  [1, 22],
  [2, 24],
  [3, 23],
  [4, 25],
  [5, 3],
  [6, 4],
  [7, 8],
  [8, 19],
  [9, 20],
  [10, 21],
  [11, 9],
  [13, 10],
  [14, 11],
  [15, 12],
  [16, 13],
  [17, 14],
  [18, 15],
  [19, 16],
  [21, 17],
  [22, 18],
  [23, 6],
  [24, 1],
  [25, 2],
  [26, 6],
  [27, 5],
]);

/** Canonical ids whose sources are known-bad duplicates */
export const EXCLUDED_REGION_IDS: ReadonlySet<number> = new Set([12, 20]);

/** Every file-local id the source is downloaded for */
export const SOURCE_REGION_CODES: readonly number[] = Object.freeze(
  Array.from({ length: 27 }, (_, i) => i + 1)
);

// ============================================================================
// Lookups
// ============================================================================

export function regionIdByName(name: string): number | null {
  return ID_BY_NAME.get(name.trim()) ?? null;
}

export function regionNameById(id: number): string | null {
  return NAME_BY_ID.get(id) ?? null;
}

/** Display names in canonical id order */
export function regionNames(): string[] {
  return REGIONS.map((r) => r.name);
}
