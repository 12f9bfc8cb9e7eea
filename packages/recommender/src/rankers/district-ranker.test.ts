import { describe, expect, it } from 'vitest';
import { buildFixtureTables } from '../__tests__/fixtures.js';
import { ServiceCatalog } from '../catalog/service-catalog.js';
import { RecommendationPolicy } from '../policy/recommendation-policy.js';
import { DistrictRanker } from './district-ranker.js';

describe('DistrictRanker', () => {
  const { tables } = buildFixtureTables();

  it('returns the stored top-N with excluded services removed and order kept', () => {
    expect(tables.districts.recommend(1)).toEqual([
      'Ration Card Application',
      'Caste Certificate',
      'Income Certificate',
      'Lakshmir Bhandar Enrollment'
    ]);
  });

  it('drops caste-targeted services for a General audience', () => {
    expect(tables.districts.recommend(1, { caste: 'General' })).toEqual([
      'Ration Card Application',
      'Income Certificate',
      'Lakshmir Bhandar Enrollment'
    ]);
  });

  it('returns an empty list for an unknown district', () => {
    expect(tables.districts.recommend(77)).toEqual([]);
  });

  it('lists districts sorted by id', () => {
    expect(tables.districts.listDistricts()).toEqual([
      { districtId: 1, districtName: 'Kolkata' },
      { districtId: 2, districtName: 'Howrah' }
    ]);
  });

  it('never exceeds N and never back-fills scrubbed slots', () => {
    const catalog = new ServiceCatalog([
      { id: 1, name: 'A', domain: '' },
      { id: 2, name: 'Death Certificate', domain: '' },
      { id: 3, name: 'C', domain: '' },
      { id: 4, name: 'D', domain: '' }
    ]);
    const ranker = new DistrictRanker(
      [{ district: { districtId: 9, districtName: 'Nadia' }, serviceIds: [1, 2, 3, 4] }],
      new RecommendationPolicy(catalog),
      3
    );

    expect(ranker.recommend(9)).toEqual(['A', 'C']);
  });
});
