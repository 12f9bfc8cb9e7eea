import { buildReferenceTables, type BuildTablesOptions, type RawReferenceData } from '../loader/build-tables.js';
import type { CsvRecord } from '../loader/csv.js';

export const SERVICE_ROWS: CsvRecord[] = [
  { service_id: '101', service_name: 'Caste Certificate', domain: 'Certificates' },
  { service_id: '102', service_name: 'Old Age Pension', domain: 'Social Welfare' },
  { service_id: '103', service_name: 'Birth Certificate', domain: 'Civil Registration' },
  { service_id: '104', service_name: 'Death Certificate', domain: 'Civil Registration' },
  { service_id: '105', service_name: 'Kanyashree Scholarship', domain: 'Education' },
  { service_id: '106', service_name: 'Ration Card Application', domain: 'Food' },
  { service_id: '107', service_name: 'Income Certificate', domain: 'Certificates' },
  { service_id: '108', service_name: 'Residential Certificate', domain: 'Certificates' },
  { service_id: '109', service_name: 'Student Credit Card', domain: 'Education' },
  { service_id: '110', service_name: 'Health Insurance Enrollment', domain: 'Health' },
  { service_id: '111', service_name: 'Widow Pension', domain: 'Social Welfare' },
  { service_id: '112', service_name: 'SC/ST Hostel Grant', domain: 'Caste Welfare' },
  { service_id: '113', service_name: 'Land Mutation', domain: 'Land' },
  { service_id: '114', service_name: 'Registration Correction', domain: 'Birth and Death' },
  { service_id: '124', service_name: 'Lakshmir Bhandar Enrollment', domain: 'Social Welfare' }
];

const ranked = (districtId: string, districtName: string, serviceIds: string[]): CsvRecord[] =>
  serviceIds.map((serviceId, index) => ({
    district_id: districtId,
    district_name: districtName,
    rank: String(index + 1),
    service_id: serviceId
  }));

export const DISTRICT_ROWS: CsvRecord[] = [
  ...ranked('1', 'Kolkata', ['106', '103', '101', '107', '124', '105', '999']),
  ...ranked('2', 'Howrah', ['102', '111'])
];

const GENERAL_RANKING = [101, 124, 103, 106, 112, 107, 110, 108, 109];

export const CLUSTER_ARTIFACT = {
  version: 'test-v1',
  default_age_band: 'youth',
  religion_groups: { default: 'Minority', groups: { Hindu: 'Hindu' } },
  clusters: [
    { cluster_id: 'c1', district_id: 1, gender: 'Male', caste: 'General', age_group: 'youth', religion_group: 'Hindu' },
    { cluster_id: 'c2', district_id: 1, gender: 'Male', caste: 'SC', age_group: 'youth', religion_group: 'Hindu' },
    {
      cluster_id: 'c3',
      district_id: 1,
      gender: 'Female',
      caste: 'General',
      age_group: 'elderly',
      religion_group: 'Minority'
    },
    { cluster_id: 4, district_id: 2, gender: 'Female', caste: 'OBC-A', age_group: 'child', religion_group: 'Hindu' }
  ],
  rankings: {
    c1: GENERAL_RANKING,
    c2: GENERAL_RANKING,
    c3: [102, 111, 110, 888],
    '4': [105, 109, 106]
  }
};

export const SIMILARITY_MATRIX: string[][] = [
  ['service_id', '101', '102', '103', '105', '106', '107', '110', '124', '777'],
  ['124', '0.91', '0.40', '0.95', '0.62', '0.62', '0.88', '0.30', '1.0', '0.5'],
  ['106', '0.2', '0.5', '0.9', '0.1', '1.0', '0.7', '', '0.6', '0'],
  ['abc', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1'],
  ['555', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1', '0.1']
];

export const CITIZEN_ROWS: CsvRecord[] = [
  {
    citizen_id: 'GRPA_12369567',
    citizen_phone: '9800361475',
    citizen_name: 'Arun Das',
    gender: 'Male',
    caste: 'General',
    religion: 'Hindu',
    age: '30',
    district_id: '1'
  },
  {
    citizen_id: 'GRPA_20000001',
    citizen_phone: '9800361475',
    citizen_name: '',
    gender: 'Female',
    caste: 'General',
    religion: 'Muslim',
    age: '64',
    district_id: '1'
  },
  {
    citizen_id: 'GRPA_30000002',
    citizen_phone: '8293058992.0',
    citizen_name: 'Mita Roy',
    gender: 'Female',
    caste: 'OBC-A',
    religion: 'Hindu',
    age: '12',
    district_id: '2'
  },
  {
    citizen_id: 'GRPA_40000003',
    citizen_phone: '9845120211',
    citizen_name: 'Zed',
    gender: 'Male',
    caste: 'SC',
    religion: 'Hindu',
    age: '',
    district_id: '1'
  }
];

export const PROVISION_ROWS: CsvRecord[] = [
  { customer_id: 'GRPA_12369567', service_id: '106', prov_date: '2024-01-05' },
  { customer_id: 'GRPA_12369567', service_id: '106', prov_date: '2024-03-01' },
  { customer_id: 'GRPA_12369567', service_id: '107', prov_date: '2024-02-10' },
  { customer_id: 'GRPA_12369567', service_id: '107', prov_date: '2023-12-01' },
  { customer_id: 'GRPA_12369567', service_id: '105', prov_date: '2024-04-02' },
  { customer_id: 'GRPA_12369567', service_id: '103', prov_date: '2024-05-01' },
  { customer_id: 'GRPA_12369567', service_id: '999', prov_date: '2024-05-02' },
  { customer_id: 'GHOST_1', service_id: '106', prov_date: '2024-05-03' },
  { customer_id: 'GRPA_40000003', service_id: '102', prov_date: '2024-02-02' }
];

export const MINOR_ROWS: CsvRecord[] = [{ service_id: '105' }, { service_id: '109' }, { service_id: '106' }];

export const rawReferenceData = (overrides: Partial<RawReferenceData> = {}): RawReferenceData => ({
  services: SERVICE_ROWS,
  districtRankings: DISTRICT_ROWS,
  clusterArtifact: CLUSTER_ARTIFACT,
  similarityMatrix: SIMILARITY_MATRIX,
  citizens: CITIZEN_ROWS,
  provisions: PROVISION_ROWS,
  minorEligibility: null,
  ...overrides
});

export const buildFixtureTables = (overrides: Partial<RawReferenceData> = {}, options: BuildTablesOptions = {}) =>
  buildReferenceTables(rawReferenceData(overrides), options);

export const toCsv = (rows: CsvRecord[]): string => {
  const [first] = rows;
  if (!first) {
    return '';
  }
  const columns = Object.keys(first);
  return [columns.join(','), ...rows.map((row) => columns.map((column) => row[column] ?? '').join(','))].join('\n');
};

export const matrixToCsv = (matrix: string[][]): string => matrix.map((row) => row.join(',')).join('\n');
