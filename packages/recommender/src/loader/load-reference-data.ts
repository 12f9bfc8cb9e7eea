import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '@seva/common';
import { silentLogger } from '@seva/common';
import { buildReferenceTables, type BuildTablesOptions, type BuiltReferenceData } from './build-tables.js';
import { parseCsvMatrix, parseCsvRecords, type CsvRecord } from './csv.js';

export const REFERENCE_FILES = {
  services: 'services.csv',
  districtRankings: 'district_top_services.csv',
  clusterArtifact: 'cluster_service_map.json',
  similarityMatrix: 'service_similarity.csv',
  citizens: 'citizens.csv',
  provisions: 'provisions.csv',
  minorEligibility: 'under18_services.csv'
} as const;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const readOptional = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
};

const readRequired = async (path: string): Promise<string> => {
  const text = await readOptional(path);
  if (text === null) {
    throw new Error(`required reference file missing: ${path}`);
  }
  return text;
};

export const loadReferenceData = async (
  dataDir: string,
  options: BuildTablesOptions = {}
): Promise<BuiltReferenceData> => {
  const logger: Logger = options.logger ?? silentLogger;
  const path = (name: string) => join(dataDir, name);

  const records = (file: string, text: string): CsvRecord[] => {
    const parsed = parseCsvRecords(text);
    if (parsed.errors.length > 0) {
      logger.warn('csv_parse_errors', { file, errors: parsed.errors.slice(0, 5), total: parsed.errors.length });
    }
    return parsed.rows;
  };

  const optionalRecords = async (file: string): Promise<CsvRecord[] | null> => {
    const text = await readOptional(path(file));
    if (text === null) {
      logger.warn('reference_file_absent', { file });
      return null;
    }
    return records(file, text);
  };

  const [servicesText, districtsText, clusterText, similarityText] = await Promise.all([
    readRequired(path(REFERENCE_FILES.services)),
    readRequired(path(REFERENCE_FILES.districtRankings)),
    readRequired(path(REFERENCE_FILES.clusterArtifact)),
    readRequired(path(REFERENCE_FILES.similarityMatrix))
  ]);

  let clusterArtifact: unknown;
  try {
    clusterArtifact = JSON.parse(clusterText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${REFERENCE_FILES.clusterArtifact} is not valid JSON: ${reason}`);
  }

  const matrix = parseCsvMatrix(similarityText);
  if (matrix.errors.length > 0) {
    logger.warn('csv_parse_errors', {
      file: REFERENCE_FILES.similarityMatrix,
      errors: matrix.errors.slice(0, 5),
      total: matrix.errors.length
    });
  }

  const [citizens, provisions, minorEligibility] = await Promise.all([
    optionalRecords(REFERENCE_FILES.citizens),
    optionalRecords(REFERENCE_FILES.provisions),
    optionalRecords(REFERENCE_FILES.minorEligibility)
  ]);

  const built = buildReferenceTables(
    {
      services: records(REFERENCE_FILES.services, servicesText),
      districtRankings: records(REFERENCE_FILES.districtRankings, districtsText),
      clusterArtifact,
      similarityMatrix: matrix.rows,
      citizens,
      provisions,
      minorEligibility
    },
    { ...options, logger }
  );

  logger.info('reference_data_loaded', {
    data_dir: dataDir,
    ...built.report.counts,
    warnings: built.report.warnings.length,
    citizen_data_available: built.report.citizenDataAvailable,
    minor_filter_enabled: built.report.minorFilterEnabled
  });

  return built;
};
