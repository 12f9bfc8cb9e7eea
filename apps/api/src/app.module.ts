import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { createJsonLogger } from '@seva/common';
import type { Logger } from '@seva/common';
import { loadEnv, loadRecommenderSettings } from '@seva/config';
import { RecommendationEngine, loadReferenceData } from '@seva/recommender';
import { CatalogController } from './catalog/catalog.controller.js';
import { CitizensController } from './citizens/citizens.controller.js';
import { HealthController } from './common/health.controller.js';
import { RequestIdMiddleware } from './common/request-id.middleware.js';
import { RecommendationsController } from './recommendations/recommendations.controller.js';
import { RecommendationsService } from './recommendations/recommendations.service.js';
import { APP_LOGGER, RECOMMENDATION_ENGINE } from './tokens.js';

@Module({
  controllers: [HealthController, CatalogController, CitizensController, RecommendationsController],
  providers: [
    {
      provide: APP_LOGGER,
      useFactory: () => createJsonLogger({ level: loadEnv(process.env).LOG_LEVEL })
    },
    {
      provide: RECOMMENDATION_ENGINE,
      inject: [APP_LOGGER],
      // Reference tables are loaded once here; Nest awaits this before the server listens.
      useFactory: async (logger: Logger) => {
        const settings = loadRecommenderSettings(loadEnv(process.env));
        const { tables } = await loadReferenceData(settings.dataDir, {
          logger,
          districtTopN: settings.districtTopN,
          demographicTopN: settings.demographicTopN,
          contentTopK: settings.contentTopK
        });
        return new RecommendationEngine(tables, { historyAnchors: settings.historyAnchors, logger });
      }
    },
    RecommendationsService
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
