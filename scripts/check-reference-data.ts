import { resolve } from 'node:path';
import { createJsonLogger } from '@seva/common';
import { loadEnv, loadRecommenderSettings } from '@seva/config';
import { loadReferenceData } from '@seva/recommender';

/**
 * Loads a reference data directory the way the API does and prints the
 * integrity report. Exits non-zero when a required file is missing or the
 * cluster artifact does not validate.
 *
 * Usage: tsx scripts/check-reference-data.ts [dataDir]
 */

const run = async () => {
  const env = loadEnv(process.env);
  const settings = loadRecommenderSettings(env);
  const dataDir = resolve(process.argv[2] ?? settings.dataDir);

  const { report } = await loadReferenceData(dataDir, {
    logger: createJsonLogger({ level: 'error' }),
    districtTopN: settings.districtTopN,
    demographicTopN: settings.demographicTopN,
    contentTopK: settings.contentTopK
  });

  console.log(`Reference data: ${dataDir}`);
  for (const [table, count] of Object.entries(report.counts)) {
    console.log(`  ${table.padEnd(16)} ${count}`);
  }
  console.log(`  citizen data     ${report.citizenDataAvailable ? 'loaded' : 'absent'}`);
  console.log(`  minor filter     ${report.minorFilterEnabled ? 'on' : 'off'}`);

  if (report.warnings.length === 0) {
    console.log('✅ No integrity warnings.');
    return;
  }

  console.log(`⚠️ ${report.warnings.length} integrity warning(s):`);
  for (const warning of report.warnings) {
    console.log(`  [${warning.table}] ${warning.reference}: ${warning.reason}`);
  }
};

run().catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
