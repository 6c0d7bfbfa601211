/** The built-in KPI table from config/kpi-sections.json, validated on first use. */

import kpiSections from '@/config/kpi-sections.json';
import type { KpiDefinition } from './types';
import { parseKpiTable } from './parseKpiTable';

let cached: KpiDefinition[] | null = null;

export function getDefaultKpiTable(): KpiDefinition[] {
  if (!cached) cached = parseKpiTable(kpiSections);
  return cached;
}
