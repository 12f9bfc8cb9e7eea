import { z } from 'zod';

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  API_PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).default('./data'),
  DISTRICT_TOP_N: z.coerce.number().int().positive().default(5),
  DEMOGRAPHIC_TOP_N: z.coerce.number().int().positive().default(5),
  CONTENT_TOP_K: z.coerce.number().int().positive().default(5),
  CONTENT_HISTORY_ANCHORS: z.string().default('false'),
  CONTENT_HISTORY_BUDGET: z.coerce.number().int().nonnegative().default(5),
  CONTENT_SELECTED_SHARE: z.coerce.number().int().nonnegative().default(3)
});

export type AppEnv = z.infer<typeof EnvSchema>;

export const loadEnv = (input: Record<string, string | undefined> = process.env): AppEnv => {
  return EnvSchema.parse(input);
};

export const parseBoolean = (value: string | undefined, fallback = false): boolean => {
  if (value === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export interface RecommenderSettings {
  dataDir: string;
  districtTopN: number;
  demographicTopN: number;
  contentTopK: number;
  historyAnchors: {
    enabled: boolean;
    budget: number;
    selectedShare: number;
  };
}

export const loadRecommenderSettings = (env: AppEnv = loadEnv()): RecommenderSettings => ({
  dataDir: env.DATA_DIR,
  districtTopN: env.DISTRICT_TOP_N,
  demographicTopN: env.DEMOGRAPHIC_TOP_N,
  contentTopK: env.CONTENT_TOP_K,
  historyAnchors: {
    enabled: parseBoolean(env.CONTENT_HISTORY_ANCHORS),
    budget: env.CONTENT_HISTORY_BUDGET,
    selectedShare: env.CONTENT_SELECTED_SHARE
  }
});
