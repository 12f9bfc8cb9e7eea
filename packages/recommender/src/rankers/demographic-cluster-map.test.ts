import { describe, expect, it } from 'vitest';
import { buildFixtureTables } from '../__tests__/fixtures.js';
import type { DemographicSignature } from '../types.js';

const { tables } = buildFixtureTables();
const clusters = tables.clusters;

const signature = (overrides: Partial<DemographicSignature> = {}): DemographicSignature => ({
  districtId: 1,
  gender: 'Male',
  caste: 'General',
  ageBucket: 'youth',
  religion: 'Hindu',
  ...overrides
});

describe('DemographicClusterMap.signatureFor', () => {
  it('buckets age and groups religion', () => {
    expect(
      clusters.signatureFor({ districtId: 1, gender: 'Female', caste: 'General', age: 70, religion: 'Muslim' })
    ).toEqual({ districtId: 1, gender: 'Female', caste: 'General', ageBucket: 'elderly', religion: 'Minority' });
  });

  it('falls back to the artifact default band when age is unknown', () => {
    expect(
      clusters.signatureFor({ districtId: 1, gender: 'Male', caste: 'SC', age: null, religion: 'Hindu' })?.ageBucket
    ).toBe('youth');
  });
});

describe('DemographicClusterMap.clusterFor', () => {
  it('resolves a known signature regardless of case', () => {
    expect(clusters.clusterFor(signature({ gender: 'MALE', caste: 'general' }))).toBe('c1');
    expect(clusters.clusterFor(signature({ districtId: 2, gender: 'Female', caste: 'OBC-A', ageBucket: 'child' }))).toBe(
      '4'
    );
  });

  it('returns undefined outside the known domain', () => {
    expect(clusters.clusterFor(signature({ districtId: 99 }))).toBeUndefined();
  });
});

describe('DemographicClusterMap.recommend', () => {
  it('excludes caste-targeted and birth/death services for General caste', () => {
    expect(clusters.recommend(signature())).toEqual([
      'Lakshmir Bhandar Enrollment',
      'Ration Card Application',
      'Income Certificate',
      'Health Insurance Enrollment',
      'Residential Certificate'
    ]);
  });

  it('keeps caste-targeted services for other castes', () => {
    expect(clusters.recommend(signature({ caste: 'SC' }))).toEqual([
      'Caste Certificate',
      'Lakshmir Bhandar Enrollment',
      'Ration Card Application',
      'SC/ST Hostel Grant',
      'Income Certificate'
    ]);
  });

  it('returns an empty list for an unseen signature', () => {
    expect(clusters.recommend(signature({ gender: 'Other' }))).toEqual([]);
  });

  it('drops ranking entries that did not resolve at load', () => {
    expect(clusters.recommend(signature({ gender: 'Female', ageBucket: 'elderly', religion: 'Minority' }))).toEqual([
      'Old Age Pension',
      'Widow Pension',
      'Health Insurance Enrollment'
    ]);
  });

  it('carries the artifact version and bands', () => {
    expect(clusters.version).toBe('test-v1');
    expect(clusters.ageBands.map((band) => band.label)).toEqual(['child', 'youth', 'elderly']);
    expect(clusters.size).toBe(4);
  });
});
