import { Controller, Get } from '@nestjs/common';
import type { HealthResponse } from '@seva/contracts';

@Controller('health')
export class HealthController {
  @Get()
  getHealth(): HealthResponse {
    return {
      ok: true,
      service: 'seva-recommender-api',
      ts: new Date().toISOString()
    };
  }
}
