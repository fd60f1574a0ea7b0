/**
 * Import a fuel transaction CSV into the configured database
 * Usage: npx tsx scripts/import-fuel-csv.ts <file.csv>
 *
 * Honors FLEET_FUEL_DB_PATH, FLEET_FUEL_TIMEZONE, FLEET_FUEL_MAX_IMPORT_BYTES.
 * Exits with code 1 when any row fails validation or the commit fails.
 */

import { startFleetFuel } from '../src/main';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx scripts/import-fuel-csv.ts <file.csv>');
  process.exit(2);
}

const runtime = startFleetFuel();
console.log('Database:', runtime.config.dbPath);
console.log('Timezone:', runtime.config.timezone);
console.log('File:', filePath);
console.log('');

try {
  const result = await runtime.importFile(filePath);
  console.log(JSON.stringify(result, null, 2));
  console.log('');
  console.log(
    `Rows: ${result.total_rows} | Imported: ${result.imported_count} | ` +
      `Skipped: ${result.skipped_count} | Errors: ${result.error_count}`
  );
  process.exitCode = result.success ? 0 : 1;
} catch (error) {
  console.error('Import failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
} finally {
  runtime.close();
}
