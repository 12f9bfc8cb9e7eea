import type { ServiceCatalog } from './catalog/service-catalog.js';
import type { CitizenDirectory } from './citizens/citizen-directory.js';
import type { RecommendationPolicy } from './policy/recommendation-policy.js';
import type { ContentSimilarityIndex } from './rankers/content-similarity-index.js';
import type { DemographicClusterMap } from './rankers/demographic-cluster-map.js';
import type { DistrictRanker } from './rankers/district-ranker.js';

/** The immutable lookup structures, built once at start-up and shared by every request. */
export interface ReferenceTables {
  catalog: ServiceCatalog;
  policy: RecommendationPolicy;
  directory: CitizenDirectory;
  districts: DistrictRanker;
  clusters: DemographicClusterMap;
  similarity: ContentSimilarityIndex;
}
