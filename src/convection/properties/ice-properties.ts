/**
 * Ordinary Ice Properties (ice I, II, III, V, VI)
 *
 * Density and expansivity come from the specific-volume parameterisation of
 * Choukroun & Grasset (2010):
 *
 *   V(P, T) = V0 · εT(T) · εP(P)
 *   εT = 1 + a0 · tanh(a1 · (T - Tref))
 *   εP = b0 + b1 · (1 - tanh(b2 · P))
 *
 * with V in dm³/kg and P in MPa. Thermal expansion is ∂lnV/∂T, which only
 * involves εT. Conductivity follows k = D/T (Andersson & Inaba 2005), and heat
 * capacity uses a single linear fit in T for every ordinary phase.
 */

import { OutOfRangeError } from '../errors';
import { ICE_PARAMETERS } from '../phase-parameters';
import type { MaterialProperties, OrdinaryIcePhase } from '../types';

// ============================================================================
// Correlation Data
// ============================================================================

interface SpecificVolumeCoefficients {
  Tref: number;  // K
  V0: number;    // dm³/kg
  a0: number;
  a1: number;    // 1/K
  b0: number;
  b1: number;
  b2: number;    // 1/MPa
}

const SPECIFIC_VOLUME: Record<OrdinaryIcePhase, SpecificVolumeCoefficients> = {
  IceI:   { Tref: 273.16, V0: 1.086,  a0: 0.019,  a1: 0.0075, b0: 0.974, b1: 0.0302, b2: 0.00395 },
  IceII:  { Tref: 238.45, V0: 0.8425, a0: 0.060,  a1: 0.0070, b0: 0.976, b1: 0.0425, b2: 0.0022 },
  IceIII: { Tref: 256.43, V0: 0.855,  a0: 0.0375, a1: 0.0203, b0: 0.951, b1: 0.097,  b2: 0.00200 },
  IceV:   { Tref: 273.31, V0: 0.783,  a0: 0.005,  a1: 0.0100, b0: 0.977, b1: 0.1200, b2: 0.0016 },
  IceVI:  { Tref: 356.15, V0: 0.743,  a0: 0.024,  a1: 0.002,  b0: 0.969, b1: 0.05,   b2: 0.00102 },
};

export interface ValidityWindow {
  minPressure: number;     // MPa
  maxPressure: number;     // MPa
  minTemperature: number;  // K
  maxTemperature: number;  // K
}

export const ICE_VALIDITY: Readonly<Record<OrdinaryIcePhase, ValidityWindow>> = {
  IceI:   { minPressure: 0, maxPressure: 300,  minTemperature: 20, maxTemperature: 280 },
  IceII:  { minPressure: 0, maxPressure: 1000, minTemperature: 20, maxTemperature: 300 },
  IceIII: { minPressure: 0, maxPressure: 1000, minTemperature: 20, maxTemperature: 300 },
  IceV:   { minPressure: 0, maxPressure: 1500, minTemperature: 20, maxTemperature: 320 },
  IceVI:  { minPressure: 0, maxPressure: 2500, minTemperature: 20, maxTemperature: 400 },
};

// Cp = ICE_CP_INTERCEPT + ICE_CP_SLOPE * T
const ICE_CP_INTERCEPT = 185;   // J/(kg·K)
const ICE_CP_SLOPE = 7.037;     // J/(kg·K²)

// ============================================================================
// Range Checking
// ============================================================================

/**
 * Throws OutOfRangeError when (P, T) falls outside the window. Shared with the
 * clathrate correlations.
 */
export function assertWithinWindow(
  phase: string,
  window: ValidityWindow,
  pressure: number,
  temperature: number
): void {
  if (!Number.isFinite(pressure) || pressure < window.minPressure || pressure > window.maxPressure) {
    throw new OutOfRangeError(
      phase, pressure, temperature,
      `pressure must lie in [${window.minPressure}, ${window.maxPressure}] MPa`
    );
  }
  if (!Number.isFinite(temperature) || temperature < window.minTemperature || temperature > window.maxTemperature) {
    throw new OutOfRangeError(
      phase, pressure, temperature,
      `temperature must lie in [${window.minTemperature}, ${window.maxTemperature}] K`
    );
  }
}

// ============================================================================
// Equation of State
// ============================================================================

export interface IceVolumeState {
  specificVolume: number;               // dm³/kg
  density: number;                      // kg/m³
  densityPressureDerivative: number;    // kg/m³ per MPa
}

/**
 * Specific volume, density and ∂ρ/∂P at (P, T). No range check; use
 * iceProperties() for checked evaluation.
 */
export function iceVolumeState(pressure: number, temperature: number, phase: OrdinaryIcePhase): IceVolumeState {
  const c = SPECIFIC_VOLUME[phase];

  const epsT = 1 + c.a0 * Math.tanh(c.a1 * (temperature - c.Tref));
  const epsP = c.b0 + c.b1 * (1 - Math.tanh(c.b2 * pressure));
  const sechP = 1 / Math.cosh(c.b2 * pressure);
  const dEpsPdP = -c.b1 * c.b2 * sechP * sechP;

  const specificVolume = c.V0 * epsT * epsP;
  const dVdP = c.V0 * epsT * dEpsPdP;

  return {
    specificVolume,
    density: 1000 / specificVolume,
    densityPressureDerivative: -1000 * dVdP / (specificVolume * specificVolume),
  };
}

/**
 * Volumetric thermal expansion ∂lnV/∂T in 1/K.
 */
export function iceThermalExpansion(temperature: number, phase: OrdinaryIcePhase): number {
  const c = SPECIFIC_VOLUME[phase];
  const x = c.a1 * (temperature - c.Tref);
  const sech = 1 / Math.cosh(x);
  return c.a0 * c.a1 * sech * sech / (1 + c.a0 * Math.tanh(x));
}

export function iceSpecificHeat(temperature: number): number {
  return ICE_CP_INTERCEPT + ICE_CP_SLOPE * temperature;
}

/**
 * k = D/T in W/(m·K). Integrating this law across a layer gives the
 * logarithmic conductive heat flux D·ln(Tm/Ttop)/h.
 */
export function iceThermalConductivity(temperature: number, phase: OrdinaryIcePhase): number {
  return ICE_PARAMETERS[phase].conductionCoefficient / temperature;
}

export function iceProperties(pressure: number, temperature: number, phase: OrdinaryIcePhase): MaterialProperties {
  assertWithinWindow(phase, ICE_VALIDITY[phase], pressure, temperature);

  return {
    density: iceVolumeState(pressure, temperature, phase).density,
    thermalExpansion: iceThermalExpansion(temperature, phase),
    specificHeat: iceSpecificHeat(temperature),
    thermalConductivity: iceThermalConductivity(temperature, phase),
  };
}
