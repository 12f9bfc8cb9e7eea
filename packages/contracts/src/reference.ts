import { z } from 'zod';

// Tabular sources arrive as strings; ids must be plain base-10 integers.
const IntegerCellSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.0+)?$/, 'expected an integer')
  .transform((value) => Number.parseInt(value, 10));

const TextCellSchema = z.string().trim();

const OptionalTextCellSchema = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

export const ServiceRowSchema = z.object({
  service_id: IntegerCellSchema,
  service_name: TextCellSchema.pipe(z.string().min(1)),
  domain: OptionalTextCellSchema
});

export const DistrictRankingRowSchema = z.object({
  district_id: IntegerCellSchema,
  district_name: TextCellSchema,
  rank: IntegerCellSchema,
  service_id: IntegerCellSchema
});

export const CitizenRowSchema = z.object({
  citizen_id: TextCellSchema.pipe(z.string().min(1)),
  citizen_phone: OptionalTextCellSchema,
  citizen_name: OptionalTextCellSchema,
  gender: OptionalTextCellSchema,
  caste: OptionalTextCellSchema,
  religion: OptionalTextCellSchema,
  age: z
    .string()
    .optional()
    .transform((value) => {
      const parsed = Number(value?.trim() || Number.NaN);
      return Number.isFinite(parsed) && parsed > 0 ? Math.trunc(parsed) : null;
    }),
  district_id: IntegerCellSchema
});

export const ProvisionRowSchema = z.object({
  customer_id: TextCellSchema.pipe(z.string().min(1)),
  service_id: IntegerCellSchema,
  prov_date: OptionalTextCellSchema
});

export const MinorEligibilityRowSchema = z.object({
  service_id: IntegerCellSchema
});

export const AgeBandSchema = z.object({
  label: z.string().min(1),
  min: z.number().int().nonnegative(),
  max: z.number().int().positive().nullable()
});

export const ReligionGroupingSchema = z.object({
  default: z.string().min(1),
  groups: z.record(z.string(), z.string().min(1))
});

export const ClusterAssignmentSchema = z.object({
  cluster_id: z.union([z.string().min(1), z.number()]).transform(String),
  district_id: z.number().int(),
  gender: z.string(),
  caste: z.string(),
  age_group: z.string(),
  religion_group: z.string()
});

export const ClusterArtifactSchema = z.object({
  version: z.string().min(1),
  age_bands: z.array(AgeBandSchema).min(1).optional(),
  default_age_band: z.string().min(1).optional(),
  religion_groups: ReligionGroupingSchema.optional(),
  clusters: z.array(ClusterAssignmentSchema),
  rankings: z.record(z.string(), z.array(z.number().int()))
});

export type ServiceRow = z.infer<typeof ServiceRowSchema>;
export type DistrictRankingRow = z.infer<typeof DistrictRankingRowSchema>;
export type CitizenRow = z.infer<typeof CitizenRowSchema>;
export type ProvisionRow = z.infer<typeof ProvisionRowSchema>;
export type MinorEligibilityRow = z.infer<typeof MinorEligibilityRowSchema>;
export type AgeBand = z.infer<typeof AgeBandSchema>;
export type ReligionGrouping = z.infer<typeof ReligionGroupingSchema>;
export type ClusterAssignment = z.infer<typeof ClusterAssignmentSchema>;
export type ClusterArtifact = z.infer<typeof ClusterArtifactSchema>;
