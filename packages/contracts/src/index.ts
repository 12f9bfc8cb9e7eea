import { z } from 'zod';

export const ServiceIdSchema = z.coerce.number().int().positive();
export const DistrictIdSchema = z.coerce.number().int().positive();
export const CitizenIdSchema = z.string().trim().min(1);
export const PhoneSchema = z.string().trim().min(1).max(20);

const CategoricalSchema = z.string().trim().min(1);

export const GenderSchema = CategoricalSchema;
export const CasteSchema = CategoricalSchema;
export const ReligionSchema = CategoricalSchema;
export const AgeSchema = z.number().int().nonnegative();

export const IdentityRecommendationRequestSchema = z.object({
  citizen_id: CitizenIdSchema,
  selected_service_id: ServiceIdSchema.nullable().optional()
});

export const ManualRecommendationRequestSchema = z.object({
  district_id: DistrictIdSchema,
  gender: GenderSchema,
  caste: CasteSchema,
  age: AgeSchema,
  religion: ReligionSchema,
  selected_service_id: ServiceIdSchema.nullable().optional()
});

export const RecommendationResponseSchema = z.object({
  district_recommendations: z.array(z.string()),
  demographic_recommendations: z.array(z.string()),
  content_recommendations: z.record(z.string(), z.array(z.string()))
});

export const ServiceSummarySchema = z.object({
  service_id: z.number().int(),
  service_name: z.string()
});

export const ServiceListResponseSchema = z.object({
  services: z.array(ServiceSummarySchema)
});

export const DistrictSummarySchema = z.object({
  district_id: z.number().int(),
  district_name: z.string()
});

export const DistrictListResponseSchema = z.object({
  districts: z.array(DistrictSummarySchema)
});

export const CitizenSummarySchema = z.object({
  citizen_id: z.string(),
  name: z.string(),
  gender: z.string(),
  age: z.number().int().nullable(),
  caste: z.string(),
  religion: z.string(),
  district_id: z.number().int()
});

export const CitizenLookupResponseSchema = z.object({
  citizens: z.array(CitizenSummarySchema)
});

export const ServiceUsageSchema = z.object({
  service_id: z.number().int(),
  service_name: z.string(),
  count: z.number().int().nonnegative()
});

export const CitizenServicesResponseSchema = z.object({
  services: z.array(ServiceUsageSchema),
  total_count: z.number().int().nonnegative()
});

export const HealthResponseSchema = z.object({
  ok: z.boolean(),
  service: z.string(),
  ts: z.string().datetime()
});

export type IdentityRecommendationRequest = z.infer<typeof IdentityRecommendationRequestSchema>;
export type ManualRecommendationRequest = z.infer<typeof ManualRecommendationRequestSchema>;
export type RecommendationResponse = z.infer<typeof RecommendationResponseSchema>;
export type ServiceSummary = z.infer<typeof ServiceSummarySchema>;
export type ServiceListResponse = z.infer<typeof ServiceListResponseSchema>;
export type DistrictSummary = z.infer<typeof DistrictSummarySchema>;
export type DistrictListResponse = z.infer<typeof DistrictListResponseSchema>;
export type CitizenSummary = z.infer<typeof CitizenSummarySchema>;
export type CitizenLookupResponse = z.infer<typeof CitizenLookupResponseSchema>;
export type ServiceUsage = z.infer<typeof ServiceUsageSchema>;
export type CitizenServicesResponse = z.infer<typeof CitizenServicesResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export * from './reference.js';
