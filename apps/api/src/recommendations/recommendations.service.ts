import { BadRequestException, Inject, Injectable, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import type {
  CitizenLookupResponse,
  CitizenServicesResponse,
  DistrictListResponse,
  IdentityRecommendationRequest,
  ManualRecommendationRequest,
  RecommendationResponse,
  ServiceListResponse
} from '@seva/contracts';
import {
  InvalidInputError,
  NotFoundError,
  RecommendationEngine,
  type RecommendationBundle,
  type RecommendationQuery
} from '@seva/recommender';
import { RECOMMENDATION_ENGINE } from '../tokens.js';

export const toRecommendationResponse = (bundle: RecommendationBundle): RecommendationResponse => ({
  district_recommendations: bundle.districtRecommendations,
  demographic_recommendations: bundle.demographicRecommendations,
  content_recommendations: bundle.contentRecommendations
});

/**
 * Maps wire payloads onto engine queries and engine failures onto HTTP
 * exceptions. Holds no state of its own.
 */
@Injectable()
export class RecommendationsService {
  constructor(@Inject(RECOMMENDATION_ENGINE) private readonly engine: RecommendationEngine) {}

  recommendForCitizen(input: IdentityRecommendationRequest): RecommendationResponse {
    return this.run({
      mode: 'identity',
      citizenId: input.citizen_id,
      selectedServiceId: input.selected_service_id ?? null
    });
  }

  recommendManual(input: ManualRecommendationRequest): RecommendationResponse {
    return this.run({
      mode: 'manual',
      districtId: input.district_id,
      gender: input.gender,
      caste: input.caste,
      age: input.age,
      religion: input.religion,
      selectedServiceId: input.selected_service_id ?? null
    });
  }

  listServices(): ServiceListResponse {
    return {
      services: this.engine
        .listServices()
        .map((service) => ({ service_id: service.serviceId, service_name: service.serviceName }))
    };
  }

  listDistricts(): DistrictListResponse {
    return {
      districts: this.engine
        .listDistricts()
        .map((district) => ({ district_id: district.districtId, district_name: district.districtName }))
    };
  }

  lookupByPhone(phone: string): CitizenLookupResponse {
    this.assertCitizenData();
    return {
      citizens: this.engine.lookupCitizenByPhone(phone).map((citizen) => ({
        citizen_id: citizen.citizenId,
        name: citizen.name,
        gender: citizen.gender,
        age: citizen.age,
        caste: citizen.caste,
        religion: citizen.religion,
        district_id: citizen.districtId
      }))
    };
  }

  citizenServices(citizenId: string): CitizenServicesResponse {
    this.assertCitizenData();
    const history = this.engine.citizenUsageHistory(citizenId);
    return {
      services: history.services.map((service) => ({
        service_id: service.serviceId,
        service_name: service.serviceName,
        count: service.count
      })),
      total_count: history.totalUniqueServices
    };
  }

  private assertCitizenData(): void {
    if (!this.engine.citizenDataAvailable) {
      throw new ServiceUnavailableException('CITIZEN_DATA_UNAVAILABLE');
    }
  }

  private run(query: RecommendationQuery): RecommendationResponse {
    try {
      return toRecommendationResponse(this.engine.recommend(query));
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundException(error.message);
      }
      if (error instanceof InvalidInputError) {
        throw new BadRequestException({ message: error.message, issues: error.issues });
      }
      throw error;
    }
  }
}
