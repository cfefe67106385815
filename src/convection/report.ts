/**
 * One-line text summaries of regime results, used by the headless runner.
 */

import type { RegimeResult } from './types';

export function formatRegimeResult(label: string, result: RegimeResult): string {
  const head = `${label}: ${result.phase} ${result.regime} ` +
    `Q=${(result.heatFlux * 1e3).toFixed(2)}mW/m2 ` +
    `Ra=${result.rayleighNumber.toExponential(2)}/${result.criticalRayleighNumber.toExponential(0)}`;

  if (!result.convecting) {
    return head;
  }
  return head +
    ` Tc=${result.coreTemperature.toFixed(1)}K` +
    ` lid=${(result.upperBoundaryLayerThickness / 1e3).toFixed(2)}km` +
    ` tbl=${(result.lowerBoundaryLayerThickness / 1e3).toFixed(2)}km`;
}
