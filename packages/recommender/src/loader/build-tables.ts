import {
  CitizenRowSchema,
  ClusterArtifactSchema,
  DistrictRankingRowSchema,
  MinorEligibilityRowSchema,
  ProvisionRowSchema,
  ServiceRowSchema
} from '@seva/contracts';
import type { Logger } from '@seva/common';
import { silentLogger } from '@seva/common';
import { ServiceCatalog } from '../catalog/service-catalog.js';
import { CitizenDirectory, type ServiceDelivery } from '../citizens/citizen-directory.js';
import type { LoadIntegrityWarning } from '../errors.js';
import { RecommendationPolicy } from '../policy/recommendation-policy.js';
import { ContentSimilarityIndex } from '../rankers/content-similarity-index.js';
import { DemographicClusterMap } from '../rankers/demographic-cluster-map.js';
import { DistrictRanker, type DistrictRanking } from '../rankers/district-ranker.js';
import type { ReferenceTables } from '../tables.js';
import type { Citizen, ClusterId, DemographicSignature, ScoredNeighbor, Service, ServiceId } from '../types.js';
import type { CsvRecord } from './csv.js';

export const DEFAULT_TOP_N = 5;
export const DEFAULT_TOP_K = 5;

export interface RawReferenceData {
  services: CsvRecord[];
  districtRankings: CsvRecord[];
  clusterArtifact: unknown;
  similarityMatrix: string[][];
  citizens: CsvRecord[] | null;
  provisions: CsvRecord[] | null;
  minorEligibility: CsvRecord[] | null;
}

export interface BuildTablesOptions {
  logger?: Logger;
  districtTopN?: number;
  demographicTopN?: number;
  contentTopK?: number;
}

export interface LoadReport {
  warnings: LoadIntegrityWarning[];
  counts: {
    services: number;
    districts: number;
    clusters: number;
    similarityRows: number;
    citizens: number;
    provisions: number;
  };
  citizenDataAvailable: boolean;
  minorFilterEnabled: boolean;
}

export interface BuiltReferenceData {
  tables: ReferenceTables;
  report: LoadReport;
}

class IntegrityLog {
  readonly warnings: LoadIntegrityWarning[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly logger: Logger) {}

  warn(table: LoadIntegrityWarning['table'], reference: string, reason: string): void {
    const key = `${table}:${reference}`;
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);
    this.warnings.push({ table, reference, reason });
    this.logger.warn('load_integrity_warning', { table, reference, reason });
  }
}

const INTEGER_CELL = /^-?\d+(\.0+)?$/;

const parseIdCell = (cell: string | undefined): number | null => {
  const value = cell?.trim() ?? '';
  return INTEGER_CELL.test(value) ? Number.parseInt(value, 10) : null;
};

// Phones exported through spreadsheets sometimes pick up a float suffix.
const cleanPhone = (phone: string): string => phone.trim().replace(/\.0+$/, '');

const rowRef = (index: number): string => `row ${index + 2}`;

const buildCatalog = (rows: CsvRecord[], log: IntegrityLog): ServiceCatalog => {
  const services: Service[] = [];
  const seen = new Set<ServiceId>();
  rows.forEach((row, index) => {
    const parsed = ServiceRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('services', rowRef(index), 'invalid service row');
      return;
    }
    if (seen.has(parsed.data.service_id)) {
      log.warn('services', String(parsed.data.service_id), 'duplicate service id');
      return;
    }
    seen.add(parsed.data.service_id);
    services.push({ id: parsed.data.service_id, name: parsed.data.service_name, domain: parsed.data.domain });
  });
  return new ServiceCatalog(services);
};

const buildMinorEligibility = (
  rows: CsvRecord[] | null,
  catalog: ServiceCatalog,
  log: IntegrityLog
): Set<ServiceId> | null => {
  if (rows === null) {
    return null;
  }
  const eligible = new Set<ServiceId>();
  rows.forEach((row, index) => {
    const parsed = MinorEligibilityRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('minor_eligibility', rowRef(index), 'invalid eligibility row');
      return;
    }
    if (!catalog.has(parsed.data.service_id)) {
      log.warn('minor_eligibility', String(parsed.data.service_id), 'unknown service');
      return;
    }
    eligible.add(parsed.data.service_id);
  });
  return eligible;
};

const buildDistrictRankings = (rows: CsvRecord[], catalog: ServiceCatalog, log: IntegrityLog): DistrictRanking[] => {
  const grouped = new Map<number, { name: string; entries: Array<{ rank: number; serviceId: ServiceId }> }>();

  rows.forEach((row, index) => {
    const parsed = DistrictRankingRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('districts', rowRef(index), 'invalid district ranking row');
      return;
    }
    const { district_id: districtId, district_name: districtName, rank, service_id: serviceId } = parsed.data;
    let group = grouped.get(districtId);
    if (!group) {
      group = { name: districtName, entries: [] };
      grouped.set(districtId, group);
    }
    if (!catalog.has(serviceId)) {
      log.warn('districts', String(serviceId), 'unknown service');
      return;
    }
    group.entries.push({ rank, serviceId });
  });

  return [...grouped.entries()].map(([districtId, group]) => {
    const ordered = group.entries.sort((a, b) => a.rank - b.rank || a.serviceId - b.serviceId);
    return {
      district: { districtId, districtName: group.name },
      serviceIds: [...new Set(ordered.map((entry) => entry.serviceId))]
    };
  });
};

const buildClusterMap = (
  artifact: unknown,
  catalog: ServiceCatalog,
  policy: RecommendationPolicy,
  topN: number,
  log: IntegrityLog
): DemographicClusterMap => {
  const parsed = ClusterArtifactSchema.safeParse(artifact);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`cluster artifact failed validation: ${detail}`);
  }

  const definition = parsed.data;
  const assignments: Array<{ signature: DemographicSignature; clusterId: ClusterId }> = definition.clusters.map(
    (cluster) => ({
      clusterId: cluster.cluster_id,
      signature: {
        districtId: cluster.district_id,
        gender: cluster.gender,
        caste: cluster.caste,
        ageBucket: cluster.age_group,
        religion: cluster.religion_group
      }
    })
  );

  const rankings = new Map<ClusterId, ServiceId[]>();
  for (const [clusterId, serviceIds] of Object.entries(definition.rankings)) {
    rankings.set(
      clusterId,
      serviceIds.filter((serviceId) => {
        if (catalog.has(serviceId)) {
          return true;
        }
        log.warn('clusters', String(serviceId), 'unknown service');
        return false;
      })
    );
  }

  return new DemographicClusterMap(
    {
      version: definition.version,
      ageBands: definition.age_bands,
      defaultAgeBand: definition.default_age_band,
      religionGrouping: definition.religion_groups,
      assignments,
      rankings
    },
    policy,
    topN
  );
};

const buildSimilarityRows = (
  matrix: string[][],
  catalog: ServiceCatalog,
  log: IntegrityLog
): Map<ServiceId, ScoredNeighbor[]> => {
  const rows = new Map<ServiceId, ScoredNeighbor[]>();
  const [header, ...body] = matrix;
  if (!header) {
    return rows;
  }

  const columns = header.slice(1).map((cell): ServiceId | null => {
    const serviceId = parseIdCell(cell);
    if (serviceId === null) {
      log.warn('similarity', `column ${cell}`, 'unparseable service id');
      return null;
    }
    if (!catalog.has(serviceId)) {
      log.warn('similarity', String(serviceId), 'unknown service');
      return null;
    }
    return catalog.isExcludedCategory(serviceId) ? null : serviceId;
  });

  body.forEach((cells, index) => {
    const anchor = parseIdCell(cells[0]);
    if (anchor === null) {
      log.warn('similarity', rowRef(index), 'unparseable anchor id');
      return;
    }
    if (!catalog.has(anchor)) {
      log.warn('similarity', String(anchor), 'unknown service');
      return;
    }
    if (rows.has(anchor)) {
      log.warn('similarity', String(anchor), 'duplicate anchor row');
      return;
    }

    const neighbors: ScoredNeighbor[] = [];
    let skipped = 0;
    columns.forEach((serviceId, column) => {
      if (serviceId === null || serviceId === anchor) {
        return;
      }
      const cell = cells[column + 1]?.trim() ?? '';
      const score = cell.length > 0 ? Number(cell) : Number.NaN;
      if (!Number.isFinite(score)) {
        skipped += 1;
        return;
      }
      neighbors.push({ serviceId, score });
    });
    if (skipped > 0) {
      log.warn('similarity', `anchor ${anchor}`, `${skipped} non-numeric score(s) skipped`);
    }
    rows.set(anchor, neighbors);
  });

  return rows;
};

const buildDirectory = (
  citizenRows: CsvRecord[] | null,
  provisionRows: CsvRecord[] | null,
  catalog: ServiceCatalog,
  log: IntegrityLog
): { directory: CitizenDirectory; deliveries: number } => {
  const citizens: Citizen[] = [];
  const known = new Set<string>();

  (citizenRows ?? []).forEach((row, index) => {
    const parsed = CitizenRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('citizens', rowRef(index), 'invalid citizen row');
      return;
    }
    const data = parsed.data;
    if (known.has(data.citizen_id)) {
      log.warn('citizens', data.citizen_id, 'duplicate citizen id');
      return;
    }
    known.add(data.citizen_id);
    citizens.push({
      citizenId: data.citizen_id,
      phone: cleanPhone(data.citizen_phone),
      name: data.citizen_name,
      gender: data.gender,
      caste: data.caste,
      religion: data.religion,
      age: data.age,
      districtId: data.district_id
    });
  });

  const deliveries: ServiceDelivery[] = [];
  (provisionRows ?? []).forEach((row, index) => {
    const parsed = ProvisionRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn('provisions', rowRef(index), 'invalid provision row');
      return;
    }
    const { customer_id: citizenId, service_id: serviceId, prov_date: deliveredOn } = parsed.data;
    if (!known.has(citizenId)) {
      log.warn('provisions', citizenId, 'unknown citizen');
      return;
    }
    if (!catalog.has(serviceId)) {
      log.warn('provisions', String(serviceId), 'unknown service');
      return;
    }
    deliveries.push({ citizenId, serviceId, deliveredOn });
  });

  return {
    directory: new CitizenDirectory(catalog, citizens, deliveries, citizenRows !== null),
    deliveries: deliveries.length
  };
};

/**
 * Builds every lookup structure leaf-first from already-parsed sources.
 * Unresolvable references are dropped here and reported once each.
 */
export const buildReferenceTables = (raw: RawReferenceData, options: BuildTablesOptions = {}): BuiltReferenceData => {
  const log = new IntegrityLog(options.logger ?? silentLogger);

  const catalog = buildCatalog(raw.services, log);
  const minorEligible = buildMinorEligibility(raw.minorEligibility, catalog, log);
  const policy = new RecommendationPolicy(catalog, minorEligible);

  const districts = new DistrictRanker(
    buildDistrictRankings(raw.districtRankings, catalog, log),
    policy,
    options.districtTopN ?? DEFAULT_TOP_N
  );
  const clusters = buildClusterMap(raw.clusterArtifact, catalog, policy, options.demographicTopN ?? DEFAULT_TOP_N, log);
  const similarity = new ContentSimilarityIndex(
    buildSimilarityRows(raw.similarityMatrix, catalog, log),
    policy,
    options.contentTopK ?? DEFAULT_TOP_K
  );
  const { directory, deliveries } = buildDirectory(raw.citizens, raw.provisions, catalog, log);

  return {
    tables: { catalog, policy, directory, districts, clusters, similarity },
    report: {
      warnings: log.warnings,
      counts: {
        services: catalog.size,
        districts: districts.listDistricts().length,
        clusters: clusters.size,
        similarityRows: similarity.size,
        citizens: directory.size,
        provisions: deliveries
      },
      citizenDataAvailable: directory.available,
      minorFilterEnabled: policy.restrictsMinors
    }
  };
};
