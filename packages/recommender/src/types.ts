export type ServiceId = number;
export type DistrictId = number;
export type CitizenId = string;
export type ClusterId = string;

export interface Service {
  id: ServiceId;
  name: string;
  domain: string;
}

export interface Citizen {
  citizenId: CitizenId;
  phone: string;
  name: string;
  gender: string;
  caste: string;
  religion: string;
  age: number | null;
  districtId: DistrictId;
}

/** `####` for a recorded name, `--` for a blank one. */
export type MaskedName = '####' | '--';

/** Citizen as exposed outside the directory; the real name never leaves it. */
export type CitizenProfile = Omit<Citizen, 'name'> & { name: MaskedName };

export interface ServiceUsageRecord {
  citizenId: CitizenId;
  serviceId: ServiceId;
  serviceName: string;
  count: number;
}

export interface UsageHistory {
  totalUniqueServices: number;
  services: Array<{ serviceId: ServiceId; serviceName: string; count: number }>;
}

export interface District {
  districtId: DistrictId;
  districtName: string;
}

export interface DemographicSignature {
  districtId: DistrictId;
  gender: string;
  caste: string;
  ageBucket: string;
  religion: string;
}

export interface Demographics {
  districtId: DistrictId;
  gender: string;
  caste: string;
  age: number | null;
  religion: string;
}

/** Who a list is being built for; drives caste and minor filtering. */
export interface Audience {
  caste?: string;
  age?: number | null;
}

export interface ScoredNeighbor {
  serviceId: ServiceId;
  score: number;
}

export interface IdentityQuery {
  mode: 'identity';
  citizenId: CitizenId;
  selectedServiceId?: ServiceId | null;
}

export interface ManualQuery {
  mode: 'manual';
  districtId: DistrictId;
  gender: string;
  caste: string;
  age: number;
  religion: string;
  selectedServiceId?: ServiceId | null;
}

export type RecommendationQuery = IdentityQuery | ManualQuery;

export interface RecommendationBundle {
  districtRecommendations: string[];
  demographicRecommendations: string[];
  contentRecommendations: Record<string, string[]>;
}
