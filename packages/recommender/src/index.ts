export * from './types.js';
export * from './errors.js';
export * from './tables.js';
export { ServiceCatalog } from './catalog/service-catalog.js';
export {
  BLANK_NAME,
  CitizenDirectory,
  MASKED_NAME,
  normalizePhone,
  type ServiceDelivery
} from './citizens/citizen-directory.js';
export {
  GENERAL_CASTE,
  MINOR_AGE_LIMIT,
  RecommendationPolicy,
  isGeneralCaste,
  isMinor
} from './policy/recommendation-policy.js';
export { DistrictRanker, type DistrictRanking } from './rankers/district-ranker.js';
export { DemographicClusterMap, type ClusterMapDefinition } from './rankers/demographic-cluster-map.js';
export { ContentSimilarityIndex, compareNeighbors } from './rankers/content-similarity-index.js';
export { DEFAULT_AGE_BANDS, bucketAge, groupReligion, signatureKey } from './rankers/signature.js';
export { allocateAnchorBudget, type AnchorBudgetOptions } from './engine/content-budget.js';
export {
  RecommendationEngine,
  type RecommendationEngineOptions
} from './engine/recommendation-engine.js';
export {
  DEFAULT_TOP_K,
  DEFAULT_TOP_N,
  buildReferenceTables,
  type BuildTablesOptions,
  type BuiltReferenceData,
  type LoadReport,
  type RawReferenceData
} from './loader/build-tables.js';
export { REFERENCE_FILES, loadReferenceData } from './loader/load-reference-data.js';
export { parseCsvMatrix, parseCsvRecords, type CsvRecord } from './loader/csv.js';
