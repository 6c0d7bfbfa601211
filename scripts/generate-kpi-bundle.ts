/**
 * Runs the monthly KPI pipeline and writes one JSON bundle for the renderer. Usage:
 *   npx ts-node -r tsconfig-paths/register scripts/generate-kpi-bundle.ts <YYYY-MM> [sourceDir] [outFile]
 * sourceDir defaults to HR_SOURCE_DIR, outFile to HR_OUTPUT_DIR/kpi-bundle-<YYYY-MM>.json,
 * the window start to HR_WINDOW_START.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { getOutputDir, getSourceDir, getWindowStart } from '../lib/config/env';
import { serializeBundle } from '../lib/pipeline/bundle';
import { runPipeline } from '../lib/pipeline/runPipeline';
import { parseMonthKeyOrThrow } from '../lib/time/parse';

async function main() {
  const monthArg = process.argv[2];
  if (!monthArg) {
    console.error('Usage: generate-kpi-bundle.ts <YYYY-MM> [sourceDir] [outFile]');
    process.exit(2);
  }
  const targetMonth = parseMonthKeyOrThrow(monthArg);
  const sourceDirectory = process.argv[3] || getSourceDir();
  const outFile = process.argv[4] || path.join(getOutputDir(), `kpi-bundle-${targetMonth}.json`);

  const result = await runPipeline({ sourceDirectory, windowStart: getWindowStart(), targetMonth });
  const bundle = serializeBundle(result);

  await mkdir(path.dirname(outFile), { recursive: true });
  await writeFile(outFile, JSON.stringify(bundle, null, 2), 'utf8');

  const critical = bundle.findings.filter((f) => f.severity === 'critical').length;
  console.log(`Months: ${bundle.months.join(', ')}`);
  console.log(`KPIs: ${bundle.kpis.length}, findings: ${bundle.findings.length} (${critical} critical)`);
  if (bundle.unrecognizedFiles.length > 0) {
    console.log(`Skipped files: ${bundle.unrecognizedFiles.map((f) => f.fileName).join(', ')}`);
  }
  console.log(`Wrote ${outFile}`);
}

main().catch((e) => {
  console.error(e instanceof Error ? `${e.name}: ${e.message}` : e);
  process.exit(1);
});
