import { Controller, Get, Inject, Param } from '@nestjs/common';
import {
  CitizenIdSchema,
  PhoneSchema,
  type CitizenLookupResponse,
  type CitizenServicesResponse
} from '@seva/contracts';
import { parseOrThrow } from '../common/validation.js';
import { RecommendationsService } from '../recommendations/recommendations.service.js';

@Controller('citizen')
export class CitizensController {
  constructor(@Inject(RecommendationsService) private readonly recommendations: RecommendationsService) {}

  @Get('phone/:phone')
  lookupByPhone(@Param('phone') phone: string): CitizenLookupResponse {
    return this.recommendations.lookupByPhone(parseOrThrow(PhoneSchema, phone));
  }

  @Get(':citizenId/services')
  citizenServices(@Param('citizenId') citizenId: string): CitizenServicesResponse {
    return this.recommendations.citizenServices(parseOrThrow(CitizenIdSchema, citizenId));
  }
}
