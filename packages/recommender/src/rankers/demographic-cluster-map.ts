import type { AgeBand, ReligionGrouping } from '@seva/contracts';
import type { RecommendationPolicy } from '../policy/recommendation-policy.js';
import type { Audience, ClusterId, DemographicSignature, Demographics, ServiceId } from '../types.js';
import { DEFAULT_AGE_BANDS, bucketAge, groupReligion, signatureKey } from './signature.js';

export interface ClusterMapDefinition {
  version: string;
  ageBands?: readonly AgeBand[];
  /** Band used when a citizen record carries no usable age. */
  defaultAgeBand?: string;
  religionGrouping?: ReligionGrouping;
  assignments: ReadonlyArray<{ signature: DemographicSignature; clusterId: ClusterId }>;
  rankings: ReadonlyMap<ClusterId, readonly ServiceId[]>;
}

export class DemographicClusterMap {
  readonly version: string;
  readonly ageBands: readonly AgeBand[];
  private readonly defaultAgeBand?: string;
  private readonly religionGrouping?: ReligionGrouping;
  private readonly clusters = new Map<string, ClusterId>();
  private readonly rankings = new Map<ClusterId, readonly ServiceId[]>();

  constructor(
    definition: ClusterMapDefinition,
    private readonly policy: RecommendationPolicy,
    private readonly topN: number
  ) {
    this.version = definition.version;
    this.ageBands = Object.freeze([...(definition.ageBands ?? DEFAULT_AGE_BANDS)]);
    this.defaultAgeBand = definition.defaultAgeBand;
    this.religionGrouping = definition.religionGrouping;

    for (const { signature, clusterId } of definition.assignments) {
      const key = signatureKey(signature);
      if (!this.clusters.has(key)) {
        this.clusters.set(key, clusterId);
      }
    }
    for (const [clusterId, serviceIds] of definition.rankings) {
      this.rankings.set(clusterId, Object.freeze([...serviceIds]));
    }
  }

  get size(): number {
    return this.clusters.size;
  }

  bucketAge(age: number | null): string | undefined {
    if (age === null) {
      return this.defaultAgeBand;
    }
    return bucketAge(age, this.ageBands);
  }

  /** Builds the lookup signature; undefined when the age falls outside every band. */
  signatureFor(demographics: Demographics): DemographicSignature | undefined {
    const ageBucket = this.bucketAge(demographics.age);
    if (ageBucket === undefined) {
      return undefined;
    }
    return {
      districtId: demographics.districtId,
      gender: demographics.gender,
      caste: demographics.caste,
      ageBucket,
      religion: groupReligion(demographics.religion, this.religionGrouping)
    };
  }

  clusterFor(signature: DemographicSignature): ClusterId | undefined {
    return this.clusters.get(signatureKey(signature));
  }

  recommend(signature: DemographicSignature, audience: Audience = { caste: signature.caste }): string[] {
    const clusterId = this.clusterFor(signature);
    if (clusterId === undefined) {
      return [];
    }
    const ranking = this.rankings.get(clusterId) ?? [];
    return this.policy.apply(ranking, { caste: signature.caste, ...audience }, this.topN);
  }
}
