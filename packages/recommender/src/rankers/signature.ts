import type { AgeBand, ReligionGrouping } from '@seva/contracts';
import type { DemographicSignature } from '../types.js';

export const DEFAULT_AGE_BANDS: readonly AgeBand[] = Object.freeze([
  { label: 'child', min: 0, max: 17 },
  { label: 'youth', min: 18, max: 59 },
  { label: 'elderly', min: 60, max: null }
]);

export const normalizeCategory = (value: string): string => value.trim().toLowerCase();

export const bucketAge = (age: number, bands: readonly AgeBand[] = DEFAULT_AGE_BANDS): string | undefined => {
  if (!Number.isFinite(age) || age < 0) {
    return undefined;
  }
  const band = bands.find((candidate) => age >= candidate.min && (candidate.max === null || age <= candidate.max));
  return band?.label;
};

export const groupReligion = (religion: string, grouping?: ReligionGrouping): string => {
  if (!grouping) {
    return religion.trim();
  }
  const key = normalizeCategory(religion);
  for (const [name, group] of Object.entries(grouping.groups)) {
    if (normalizeCategory(name) === key) {
      return group;
    }
  }
  return grouping.default;
};

export const signatureKey = (signature: DemographicSignature): string =>
  [
    String(signature.districtId),
    normalizeCategory(signature.gender),
    normalizeCategory(signature.caste),
    normalizeCategory(signature.ageBucket),
    normalizeCategory(signature.religion)
  ].join('|');
