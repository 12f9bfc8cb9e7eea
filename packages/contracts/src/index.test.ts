import { describe, expect, it } from 'vitest';
import {
  CitizenRowSchema,
  ClusterArtifactSchema,
  IdentityRecommendationRequestSchema,
  ManualRecommendationRequestSchema,
  ServiceRowSchema
} from './index.js';

describe('request schemas', () => {
  it('accepts an identity request with an optional selection', () => {
    expect(IdentityRecommendationRequestSchema.parse({ citizen_id: ' GRPA_1 ' })).toEqual({ citizen_id: 'GRPA_1' });
    expect(
      IdentityRecommendationRequestSchema.parse({ citizen_id: 'GRPA_1', selected_service_id: '124' }).selected_service_id
    ).toBe(124);
  });

  it('rejects a manual request with a negative or fractional age', () => {
    const base = { district_id: 1, gender: 'Male', caste: 'SC', religion: 'Hindu' };

    expect(ManualRecommendationRequestSchema.safeParse({ ...base, age: -1 }).success).toBe(false);
    expect(ManualRecommendationRequestSchema.safeParse({ ...base, age: 30.5 }).success).toBe(false);
    expect(ManualRecommendationRequestSchema.safeParse({ ...base, age: 0 }).success).toBe(true);
  });

  it('rejects blank categorical fields', () => {
    expect(
      ManualRecommendationRequestSchema.safeParse({ district_id: 1, gender: ' ', caste: 'SC', age: 3, religion: 'Hindu' })
        .success
    ).toBe(false);
  });
});

describe('reference row schemas', () => {
  it('parses integer ids written with a float suffix', () => {
    expect(ServiceRowSchema.parse({ service_id: '101.0', service_name: ' Caste Certificate ' })).toEqual({
      service_id: 101,
      service_name: 'Caste Certificate',
      domain: ''
    });
    expect(ServiceRowSchema.safeParse({ service_id: '1e3', service_name: 'x' }).success).toBe(false);
  });

  it('maps blank or non-positive ages to null', () => {
    const row = {
      citizen_id: 'c-1',
      citizen_phone: '1',
      citizen_name: 'Test',
      gender: 'Male',
      caste: 'SC',
      religion: 'Hindu',
      district_id: '1'
    };

    expect(CitizenRowSchema.parse({ ...row, age: '' }).age).toBeNull();
    expect(CitizenRowSchema.parse({ ...row, age: '0' }).age).toBeNull();
    expect(CitizenRowSchema.parse({ ...row, age: '41.0' }).age).toBe(41);
  });

  it('normalizes numeric cluster ids to strings', () => {
    const artifact = ClusterArtifactSchema.parse({
      version: 'v1',
      clusters: [{ cluster_id: 7, district_id: 1, gender: 'Male', caste: 'SC', age_group: 'youth', religion_group: 'Hindu' }],
      rankings: { '7': [1, 2] }
    });

    expect(artifact.clusters[0]?.cluster_id).toBe('7');
  });
});
