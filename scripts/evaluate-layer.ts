/**
 * Headless convection runner
 *
 * Usage: npx tsx scripts/evaluate-layer.ts <layer-file.json> [--cache] [--debug]
 *
 * Loads one layer (or an array of layers) from JSON, evaluates the heat
 * transport regime of each, and prints a summary line per layer. Failed layers
 * are reported and skipped; the exit code is 1 if any layer failed.
 */

import * as fs from 'fs';

import {
  CachingPropertyProvider,
  defaultPropertyProvider,
  evaluateConvection,
  formatRegimeResult,
  getConvectionDebugLog,
  parseLayerFile,
  setConvectionDebug,
  type MaterialPropertyProvider,
} from '../src/convection';

// Parse command line args
const args = process.argv.slice(2);
const flags = new Set(args.filter((arg) => arg.startsWith('--')));
const positional = args.filter((arg) => !arg.startsWith('--'));

if (positional.length < 1) {
  console.log('Usage: npx tsx scripts/evaluate-layer.ts <layer-file.json> [--cache] [--debug]');
  console.log('  layer-file.json: One layer object or an array of layers');
  console.log('  --cache: Memoise material property lookups across layers');
  console.log('  --debug: Print the convection debug log after the run');
  process.exit(1);
}

const layerFile = positional[0];
const debug = flags.has('--debug');
setConvectionDebug(debug);

console.log(`Loading layers from: ${layerFile}`);
const layers = parseLayerFile(fs.readFileSync(layerFile, 'utf-8'));
console.log(`Loaded ${layers.length} layer(s)\n`);

const cache = flags.has('--cache') ? new CachingPropertyProvider(defaultPropertyProvider) : null;
const provider: MaterialPropertyProvider = cache ?? defaultPropertyProvider;

let failures = 0;
for (const { label, phase, layer } of layers) {
  try {
    console.log(formatRegimeResult(label, evaluateConvection(layer, phase, provider)));
  } catch (error) {
    failures++;
    console.error(`${label}: [ERROR] ${error instanceof Error ? error.message : String(error)}`);
  }
}

if (cache) {
  const stats = cache.getStats();
  console.log(`\nProperty cache: ${stats.hits} hits, ${stats.misses} misses, ${stats.size} entries`);
}

if (debug) {
  console.log('\n=== Debug Log ===');
  for (const line of getConvectionDebugLog()) {
    console.log(line);
  }
}

if (failures > 0) {
  console.error(`\n${failures} of ${layers.length} layer(s) failed`);
  process.exit(1);
}
