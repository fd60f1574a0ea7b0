/**
 * Print the accepted CSV layout as JSON
 * Usage: npx tsx scripts/print-import-format.ts
 */

import { getCsvFormatSpecification } from '../src/shared/fuel-import/template';

console.log(JSON.stringify(getCsvFormatSpecification(), null, 2));
