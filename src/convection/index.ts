/**
 * Ice-Shell Convection Module Index
 *
 * This is the main entry point for the convection model.
 */

// Core types
export * from './types';
export * from './errors';

// Regime decision
export {
  evaluateConvection,
  validateLayer,
  isSupercritical,
  rayleighNumber,
  thermalDiffusivity,
  conductiveResult,
  convectiveResult,
} from './rayleigh-regime';
export type { RegimeInputs } from './rayleigh-regime';

// Building blocks
export { solveCriticalTemperature, R_GAS, CORE_TEMPERATURE_C1, CORE_TEMPERATURE_C2 } from './critical-temperature';
export { computeViscosity } from './viscosity';
export { OrdinaryIceModel, ClathrateModel, getPhaseModel } from './phase-models';
export type { PhaseModel } from './phase-models';
export {
  ICE_PARAMETERS,
  CLATHRATE_PARAMETERS,
  ICE_CRITICAL_RAYLEIGH,
  CLATHRATE_CRITICAL_RAYLEIGH,
  getPhaseParameters,
} from './phase-parameters';
export type { PhaseParameters, OrdinaryIceParameters, ClathrateParameters } from './phase-parameters';

// Material properties
export * from './properties';

// Debug logging
export { setConvectionDebug, getConvectionDebugLog } from './debug';

// Runner input and output
export { formatRegimeResult } from './report';
export { parseLayerFile, LayerInputSchema, LayerListSchema } from './layer-input';
export type { LayerInput, ParsedLayer } from './layer-input';
