/*
  Remove feature properties that the layer schema no longer declares, and/or null values,
  from a data snapshot (the JSON file the server loads at startup)

  Usage:
    npm run sanitize --workspace @geocrud/server -- \
      --input data/demo.json \
      --layer trees \
      [--output data/demo.clean.json] [--keep-null] [--keep-stale] [--dry-run]
*/

import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { sanitizeFeatures } from '../src/services/sanitizer';
import { MemoryStore } from '../src/stores/memory';

const argv = yargs(hideBin(process.argv))
  .option('input', { type: 'string', demandOption: true, desc: 'Snapshot file to read' })
  .option('layer', { type: 'string', demandOption: true, desc: 'Layer whose features are sanitized' })
  .option('output', { type: 'string', desc: 'Snapshot file to write (defaults to --input)' })
  .option('keep-null', { type: 'boolean', default: false, desc: 'Keep properties holding null' })
  .option('keep-stale', { type: 'boolean', default: false, desc: 'Keep properties missing from the schema' })
  .option('dry-run', { type: 'boolean', default: false, desc: 'Report without writing' })
  .parseSync();

const INPUT = path.resolve(argv.input);
const OUTPUT = path.resolve(argv.output ?? argv.input);

// -------- Main --------
const store = MemoryStore.fromFile(INPUT);
const layer = await store.layers.get(argv.layer);

if (!layer) {
  console.error(`Layer not found: ${argv.layer}`);
  process.exit(1);
}
if (!layer.schema?.properties) {
  console.warn(`Layer ${layer.id} has no schema, nothing to strip`);
}

const sanitized = await sanitizeFeatures(
  store.features.iterate(layer.id),
  layer.schema,
  feature => store.features.save(feature),
  { pruneNull: !argv['keep-null'], pruneStale: !argv['keep-stale'] },
);

console.log(`\n${sanitized} features changed on layer ${layer.id}`);

if (argv['dry-run']) {
  console.log('Dry run, nothing written');
} else {
  fs.writeFileSync(OUTPUT, JSON.stringify(store.toSnapshot(), null, 2));
  console.log(`Output file: ${OUTPUT}`);
}
