/**
 * Dataset pipeline: parse raw files, reconcile region ids, merge and query
 */

export {
  RAW_COLUMNS,
  NO_DATA,
  extractLocalRegionId,
  parseRawContent,
  parseRawFile,
  type ParsedFile,
} from "./parser.js";
export {
  toCanonicalRegionId,
  isExcludedRegion,
  reconcileRecords,
} from "./reconcile.js";
export {
  listRawFiles,
  dedupeRecords,
  buildDataset,
  loadDataset,
} from "./builder.js";
export {
  DEFAULT_YEARS,
  DEFAULT_WEEKS,
  defaultFilters,
  parameterValue,
  queryRecords,
  yearlyAverage,
  summarize,
} from "./query.js";
