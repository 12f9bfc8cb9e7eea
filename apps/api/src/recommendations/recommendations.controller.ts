import { Body, Controller, HttpCode, Inject, Post } from '@nestjs/common';
import {
  IdentityRecommendationRequestSchema,
  ManualRecommendationRequestSchema,
  type RecommendationResponse
} from '@seva/contracts';
import { parseOrThrow } from '../common/validation.js';
import { RecommendationsService } from './recommendations.service.js';

@Controller('recommend')
export class RecommendationsController {
  constructor(@Inject(RecommendationsService) private readonly recommendations: RecommendationsService) {}

  @Post('phone')
  @HttpCode(200)
  recommendForCitizen(@Body() body: unknown): RecommendationResponse {
    const input = parseOrThrow(IdentityRecommendationRequestSchema, body);
    return this.recommendations.recommendForCitizen(input);
  }

  @Post('manual')
  @HttpCode(200)
  recommendManual(@Body() body: unknown): RecommendationResponse {
    const input = parseOrThrow(ManualRecommendationRequestSchema, body);
    return this.recommendations.recommendManual(input);
  }
}
