/**
 * Convection Regime of an Ice Layer
 *
 * Decides whether an ice or clathrate layer conducts or convects following
 * Deschamps & Sotin (2001), "Thermal convection in icy satellites" (DS2001):
 *
 * 1. Core temperature Tc from the explicit quadratic root (Eq. 18)
 * 2. Properties and Arrhenius viscosity at Tc (Eq. 11)
 * 3. Rayleigh number Ra = α·ρ·g·ΔT·h³ / (κ·ν) (Eq. 4), compared to a
 *    phase-dependent critical value
 * 4. Supercritical: basal boundary layer (Eqs. 8, 19), heat flux (Eq. 20)
 *    and conductive lid thickness (Eq. 21)
 * 5. If the lid comes out thicker than the layer, the convective solution is
 *    inconsistent and the conductive one is reported instead
 *
 * Conduction uses the integrated k = D/T law for ordinary ices (Ojakangas &
 * Stevenson 1989) and Fourier's law for clathrate.
 *
 * The evaluation is pure: every call depends only on its arguments and the
 * fixed phase tables.
 */

import { logDebug } from './debug';
import { DomainError, UnsupportedPhaseError } from './errors';
import { getPhaseModel, type PhaseModel } from './phase-models';
import { defaultPropertyProvider, type MaterialPropertyProvider } from './properties/provider';
import {
  isSolidPhase,
  type LayerThermalState,
  type MaterialProperties,
  type PhaseTag,
  type RegimeResult,
} from './types';

// DS2001 Eq. 8: Ra_δ = RA_DELTA_PREFACTOR · Ra^RA_DELTA_EXPONENT
const RA_DELTA_PREFACTOR = 0.28;
const RA_DELTA_EXPONENT = 0.21;

// ============================================================================
// Input Validation
// ============================================================================

function assertFinitePositive(quantity: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new DomainError(quantity, value, 'must be finite and positive');
  }
}

export function validateLayer(layer: LayerThermalState): void {
  assertFinitePositive('top temperature', layer.topTemperature);
  assertFinitePositive('bottom temperature', layer.bottomTemperature);
  assertFinitePositive('thickness', layer.thickness);
  assertFinitePositive('gravity', layer.gravity);
  if (!Number.isFinite(layer.midpointPressure) || layer.midpointPressure < 0) {
    throw new DomainError('midpoint pressure', layer.midpointPressure, 'must be finite and non-negative');
  }

  const deltaT = layer.bottomTemperature - layer.topTemperature;
  if (!(deltaT > 0)) {
    throw new DomainError('temperature difference', deltaT, 'bottom temperature must exceed top temperature');
  }
}

function assertFinite(quantity: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new DomainError(quantity, value, 'must be finite');
  }
}

// ============================================================================
// Regime Decision
// ============================================================================

/**
 * The boundary is closed on the conducting side: Ra equal to the critical
 * value does not convect.
 */
export function isSupercritical(rayleighNumber: number, criticalRayleighNumber: number): boolean {
  return rayleighNumber > criticalRayleighNumber;
}

export function rayleighNumber(
  layer: LayerThermalState,
  props: MaterialProperties,
  viscosity: number
): number {
  const kappa = thermalDiffusivity(props);
  const deltaT = layer.bottomTemperature - layer.topTemperature;
  return props.thermalExpansion * props.density * layer.gravity * deltaT *
    Math.pow(layer.thickness, 3) / kappa / viscosity;
}

export function thermalDiffusivity(props: MaterialProperties): number {
  return props.thermalConductivity / props.density / props.specificHeat;
}

export interface RegimeInputs {
  layer: LayerThermalState;
  model: PhaseModel;
  coreTemperature: number;
  props: MaterialProperties;
  viscosity: number;
  rayleighNumber: number;
}

/**
 * Conductive solution. Tc is reported as ΔT and both boundary layers vanish.
 */
export function conductiveResult(
  inputs: RegimeInputs,
  regime: 'conducting' | 'downgraded' = 'conducting'
): RegimeResult {
  const { layer, model, props } = inputs;
  const heatFlux = model.conductionHeatFlux(layer, props);
  assertFinite('conductive heat flux', heatFlux);

  return {
    phase: model.parameters.phase,
    regime,
    convecting: false,
    heatFlux,
    upperBoundaryLayerThickness: 0,
    lowerBoundaryLayerThickness: 0,
    coreTemperature: layer.bottomTemperature - layer.topTemperature,
    materialProperties: props,
    viscosity: inputs.viscosity,
    rayleighNumber: inputs.rayleighNumber,
    criticalRayleighNumber: model.parameters.criticalRayleigh,
  };
}

/**
 * Convective solution, or the downgraded conductive one when the lid would not
 * fit inside the layer.
 */
export function convectiveResult(inputs: RegimeInputs): RegimeResult {
  const { layer, model, props, viscosity, coreTemperature: Tc } = inputs;
  const Tm = layer.bottomTemperature;
  const kappa = thermalDiffusivity(props);

  if (!(Tm - Tc > 0)) {
    throw new DomainError('core temperature', Tc, `must lie below the bottom temperature ${Tm} K`);
  }

  const raDelta = RA_DELTA_PREFACTOR * Math.pow(inputs.rayleighNumber, RA_DELTA_EXPONENT);
  const lowerBoundaryLayer = Math.cbrt(
    viscosity * kappa / props.thermalExpansion / props.density / layer.gravity / (Tm - Tc) * raDelta
  );
  const heatFlux = props.thermalConductivity * (Tm - Tc) / lowerBoundaryLayer;
  const upperBoundaryLayer = props.thermalConductivity * (Tc - layer.topTemperature) / heatFlux;

  assertFinite('lower boundary layer thickness', lowerBoundaryLayer);
  assertFinite('convective heat flux', heatFlux);
  assertFinite('conductive lid thickness', upperBoundaryLayer);

  if (upperBoundaryLayer > layer.thickness) {
    logDebug(
      `[Convection] ${model.parameters.phase}: lid ${upperBoundaryLayer.toFixed(1)} m exceeds ` +
      `layer ${layer.thickness.toFixed(1)} m, reporting conduction`
    );
    return conductiveResult(inputs, 'downgraded');
  }

  return {
    phase: model.parameters.phase,
    regime: 'convecting',
    convecting: true,
    heatFlux,
    upperBoundaryLayerThickness: upperBoundaryLayer,
    lowerBoundaryLayerThickness: lowerBoundaryLayer,
    coreTemperature: Tc,
    materialProperties: props,
    viscosity,
    rayleighNumber: inputs.rayleighNumber,
    criticalRayleighNumber: model.parameters.criticalRayleigh,
  };
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Heat transport regime of a single ice or clathrate layer.
 *
 * @throws UnsupportedPhaseError for 'water' or an unknown tag, before any property lookup
 * @throws DomainError for invalid layer inputs or non-finite intermediates
 * @throws OutOfRangeError from the provider, unchanged
 */
export function evaluateConvection(
  layer: LayerThermalState,
  phase: PhaseTag,
  provider: MaterialPropertyProvider = defaultPropertyProvider
): RegimeResult {
  if (!isSolidPhase(phase)) {
    throw new UnsupportedPhaseError(phase);
  }
  validateLayer(layer);

  const model = getPhaseModel(phase);

  const coreTemperature = model.solveCriticalTemperature(layer);
  if (!(coreTemperature > 0)) {
    throw new DomainError('core temperature', coreTemperature, 'must be positive');
  }

  const props = model.evaluateProperties(provider, layer.midpointPressure, coreTemperature);
  const viscosity = model.computeViscosity(layer, coreTemperature);
  const kappa = thermalDiffusivity(props);
  assertFinitePositive('thermal diffusivity', kappa);

  const ra = rayleighNumber(layer, props, viscosity);
  assertFinite('Rayleigh number', ra);

  const inputs: RegimeInputs = { layer, model, coreTemperature, props, viscosity, rayleighNumber: ra };
  const critical = model.parameters.criticalRayleigh;
  const result = isSupercritical(ra, critical)
    ? convectiveResult(inputs)
    : conductiveResult(inputs);

  logDebug(
    `[Convection] ${phase}: Tc=${coreTemperature.toFixed(2)} K, nu=${viscosity.toExponential(3)} Pa s, ` +
    `Ra=${ra.toExponential(3)} (crit ${critical.toExponential(1)}), regime=${result.regime}, ` +
    `Q=${result.heatFlux.toExponential(3)} W/m2`
  );

  return result;
}
