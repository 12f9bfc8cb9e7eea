import type { RecommendationPolicy } from '../policy/recommendation-policy.js';
import type { Audience, ScoredNeighbor, ServiceId } from '../types.js';

export const compareNeighbors = (a: ScoredNeighbor, b: ScoredNeighbor): number =>
  b.score - a.score || a.serviceId - b.serviceId;

/**
 * Nearest-neighbour lookup over a precomputed service-by-service similarity
 * matrix. Rows hold every usable neighbour so policy filtering can run
 * before the top-K cut.
 */
export class ContentSimilarityIndex {
  private readonly rows = new Map<ServiceId, readonly ScoredNeighbor[]>();

  constructor(
    rows: ReadonlyMap<ServiceId, readonly ScoredNeighbor[]>,
    private readonly policy: RecommendationPolicy,
    private readonly topK: number
  ) {
    for (const [anchor, neighbors] of rows) {
      const sorted = neighbors
        .filter((neighbor) => neighbor.serviceId !== anchor && Number.isFinite(neighbor.score))
        .map((neighbor) => Object.freeze({ ...neighbor }))
        .sort(compareNeighbors);
      this.rows.set(anchor, Object.freeze(sorted));
    }
  }

  get size(): number {
    return this.rows.size;
  }

  has(serviceId: ServiceId): boolean {
    return this.rows.has(serviceId);
  }

  neighbors(serviceId: ServiceId): readonly ScoredNeighbor[] {
    return this.rows.get(serviceId) ?? [];
  }

  recommend(serviceId: ServiceId, audience: Audience = {}, k: number = this.topK): string[] {
    const row = this.rows.get(serviceId);
    if (!row || k <= 0) {
      return [];
    }
    return this.policy.apply(
      row.map((neighbor) => neighbor.serviceId),
      audience,
      k
    );
  }
}
