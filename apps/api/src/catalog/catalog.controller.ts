import { Controller, Get, Inject } from '@nestjs/common';
import type { DistrictListResponse, ServiceListResponse } from '@seva/contracts';
import { RecommendationsService } from '../recommendations/recommendations.service.js';

@Controller()
export class CatalogController {
  constructor(@Inject(RecommendationsService) private readonly recommendations: RecommendationsService) {}

  @Get('services')
  listServices(): ServiceListResponse {
    return this.recommendations.listServices();
  }

  @Get('districts')
  listDistricts(): DistrictListResponse {
    return this.recommendations.listDistricts();
  }
}
