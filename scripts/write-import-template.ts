/**
 * Write the fuel import CSV template
 * Usage: npx tsx scripts/write-import-template.ts [output.csv]
 *
 * Without an output path the template is printed to stdout.
 */

import fs from 'fs';
import path from 'path';
import { generateCsvTemplate } from '../src/shared/fuel-import/template';

const outputPath = process.argv[2];
const template = generateCsvTemplate();

if (!outputPath) {
  process.stdout.write(template);
} else {
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, template, 'utf-8');
  console.log('Template written to', resolved);
}
