import { z } from 'zod';
import type { Logger } from '@seva/common';
import { silentLogger } from '@seva/common';
import { InvalidInputError, NotFoundError } from '../errors.js';
import type { ReferenceTables } from '../tables.js';
import type {
  Audience,
  CitizenProfile,
  Demographics,
  District,
  RecommendationBundle,
  RecommendationQuery,
  ServiceId,
  UsageHistory
} from '../types.js';
import { allocateAnchorBudget } from './content-budget.js';

export interface RecommendationEngineOptions {
  historyAnchors?: {
    enabled: boolean;
    budget: number;
    selectedShare: number;
  };
  logger?: Logger;
}

const SelectedServiceSchema = z.number().int().positive().nullable().optional();

const IdentityQuerySchema = z.object({
  mode: z.literal('identity'),
  citizenId: z.string().trim().min(1),
  selectedServiceId: SelectedServiceSchema
});

const ManualQuerySchema = z.object({
  mode: z.literal('manual'),
  districtId: z.number().int().positive(),
  gender: z.string().trim().min(1),
  caste: z.string().trim().min(1),
  age: z.number().int().nonnegative(),
  religion: z.string().trim().min(1),
  selectedServiceId: SelectedServiceSchema
});

const QuerySchema = z.discriminatedUnion('mode', [IdentityQuerySchema, ManualQuerySchema]);

type ValidQuery = z.infer<typeof QuerySchema>;

export class RecommendationEngine {
  private readonly logger: Logger;

  constructor(
    private readonly tables: ReferenceTables,
    private readonly options: RecommendationEngineOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get citizenDataAvailable(): boolean {
    return this.tables.directory.available;
  }

  lookupCitizenByPhone(phone: string): CitizenProfile[] {
    return this.tables.directory.findByPhone(phone);
  }

  citizenUsageHistory(citizenId: string): UsageHistory {
    return this.tables.directory.summarizeUsage(citizenId);
  }

  listServices(): Array<{ serviceId: ServiceId; serviceName: string }> {
    return this.tables.catalog.listAll().map(({ id, name }) => ({ serviceId: id, serviceName: name }));
  }

  listDistricts(): District[] {
    return this.tables.districts.listDistricts();
  }

  recommend(query: RecommendationQuery): RecommendationBundle {
    const parsed = QuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new InvalidInputError('invalid recommendation query', parsed.error.issues);
    }

    const valid = parsed.data;
    const demographics = this.resolveDemographics(valid);
    const selectedServiceId = valid.selectedServiceId ?? null;
    const audience: Audience = { caste: demographics.caste, age: demographics.age };

    const signature = this.tables.clusters.signatureFor(demographics);

    const bundle: RecommendationBundle = {
      districtRecommendations: this.tables.districts.recommend(demographics.districtId, audience),
      demographicRecommendations: signature ? this.tables.clusters.recommend(signature, audience) : [],
      contentRecommendations: this.contentRecommendations(valid, selectedServiceId, audience)
    };

    this.logger.debug('recommendations_built', {
      mode: valid.mode,
      district_count: bundle.districtRecommendations.length,
      demographic_count: bundle.demographicRecommendations.length,
      content_anchor_count: Object.keys(bundle.contentRecommendations).length
    });

    return bundle;
  }

  private resolveDemographics(query: ValidQuery): Demographics {
    if (query.mode === 'manual') {
      return {
        districtId: query.districtId,
        gender: query.gender,
        caste: query.caste,
        age: query.age,
        religion: query.religion
      };
    }

    const citizen = this.tables.directory.findById(query.citizenId);
    if (!citizen) {
      throw new NotFoundError('citizen', query.citizenId);
    }
    return {
      districtId: citizen.districtId,
      gender: citizen.gender,
      caste: citizen.caste,
      age: citizen.age,
      religion: citizen.religion
    };
  }

  private contentRecommendations(
    query: ValidQuery,
    selectedServiceId: ServiceId | null,
    audience: Audience
  ): Record<string, string[]> {
    const content: Record<string, string[]> = {};
    const historyAnchors = this.options.historyAnchors;
    // Unknown and excluded anchors have no public name, so they never become a key.
    const selected =
      selectedServiceId !== null && this.tables.catalog.resolveName(selectedServiceId) !== undefined
        ? selectedServiceId
        : null;

    if (!historyAnchors?.enabled || query.mode !== 'identity') {
      if (selected !== null) {
        const label = this.tables.catalog.resolveName(selected);
        if (label !== undefined) {
          content[label] = this.tables.similarity.recommend(selected, audience);
        }
      }
      return content;
    }

    const allocation = allocateAnchorBudget(
      this.tables.directory.recentServiceIds(query.citizenId),
      selected,
      historyAnchors
    );

    for (const [anchor, share] of allocation) {
      const label = this.tables.catalog.resolveName(anchor);
      if (label === undefined) {
        continue;
      }
      const neighbors = share > 0 ? this.tables.similarity.recommend(anchor, audience, share) : [];
      if (anchor === selected || neighbors.length > 0) {
        content[label] = neighbors;
      }
    }
    return content;
  }
}
