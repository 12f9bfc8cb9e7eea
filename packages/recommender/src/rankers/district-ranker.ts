import type { RecommendationPolicy } from '../policy/recommendation-policy.js';
import type { Audience, District, DistrictId, ServiceId } from '../types.js';

export interface DistrictRanking {
  district: District;
  serviceIds: readonly ServiceId[];
}

export class DistrictRanker {
  private readonly rankings = new Map<DistrictId, readonly ServiceId[]>();
  private readonly districts: District[];

  constructor(
    rankings: readonly DistrictRanking[],
    private readonly policy: RecommendationPolicy,
    private readonly topN: number
  ) {
    const districts = new Map<DistrictId, District>();
    for (const ranking of rankings) {
      if (this.rankings.has(ranking.district.districtId)) {
        continue;
      }
      this.rankings.set(ranking.district.districtId, Object.freeze([...ranking.serviceIds]));
      districts.set(ranking.district.districtId, { ...ranking.district });
    }
    this.districts = [...districts.values()].sort((a, b) => a.districtId - b.districtId);
  }

  has(districtId: DistrictId): boolean {
    return this.rankings.has(districtId);
  }

  listDistricts(): District[] {
    return this.districts.map((district) => ({ ...district }));
  }

  // Takes the stored top-N first and filters afterwards, so a scrubbed entry is not back-filled.
  recommend(districtId: DistrictId, audience: Audience = {}): string[] {
    const ranking = this.rankings.get(districtId);
    if (!ranking) {
      return [];
    }
    return this.policy.apply(ranking.slice(0, this.topN), audience);
  }
}
