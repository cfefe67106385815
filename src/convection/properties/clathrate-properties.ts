/**
 * Methane Clathrate Properties
 *
 * - Density: Helgerud et al. (2009), linear in T (°C) and P
 * - Heat capacity and thermal expansion: Ning et al. (2015), 0.1 MPa fits
 * - Conductivity: constant 0.5 W/(m·K) over the measured range (Waite et al. 2005)
 *
 * Stability uses the Sloan (1998) dissociation curve as fit by Choukroun et al.
 * (2010): quadratic below 2.567 MPa, logarithmic above.
 */

import { CLATHRATE_PARAMETERS } from '../phase-parameters';
import type { MaterialProperties } from '../types';
import { assertWithinWindow, type ValidityWindow } from './ice-properties';

/** Celsius zero point in K */
export const T0 = 273.15;

export const CLATHRATE_VALIDITY: Readonly<ValidityWindow> = {
  minPressure: 0,
  maxPressure: 200,
  minTemperature: 5,
  maxTemperature: 292,
};

// Below this pressure the quadratic branch of the dissociation curve applies
const DISSOCIATION_BRANCH_PRESSURE = 2.567;  // MPa
// Stand-in for zero pressure so the logarithmic branch never sees log(0)
const MIN_DISSOCIATION_PRESSURE = 1e-12;     // MPa

export function clathrateDensity(pressure: number, temperature: number): number {
  const T_C = temperature - T0;
  return (-2.3815e-4 * T_C + 1.1843e-4 * pressure + 0.92435) * 1e3;
}

export function clathrateSpecificHeat(temperature: number): number {
  return 3.19 * temperature + 2150;
}

export function clathrateThermalExpansion(temperature: number): number {
  return (3.5697e-4 * temperature + 0.2558) /
    (3.5697e-4 * temperature * temperature + 0.2558 * temperature + 1612.8597);
}

export function clathrateProperties(pressure: number, temperature: number): MaterialProperties {
  assertWithinWindow('Clathrate', CLATHRATE_VALIDITY, pressure, temperature);

  return {
    density: clathrateDensity(pressure, temperature),
    thermalExpansion: clathrateThermalExpansion(temperature),
    specificHeat: clathrateSpecificHeat(temperature),
    thermalConductivity: CLATHRATE_PARAMETERS.thermalConductivity,
  };
}

// ============================================================================
// Stability
// ============================================================================

/**
 * Dissociation temperature of fully occupied methane clathrate in K.
 */
export function clathrateDissociationTemperature(pressure: number): number {
  const P = pressure === 0 ? MIN_DISSOCIATION_PRESSURE : pressure;
  if (P < DISSOCIATION_BRANCH_PRESSURE) {
    return 212.33820985 + 43.37319252 * P - 7.83348412 * P * P;
  }
  return -20.3058036 + 8.09637199 * Math.log(P / 4.56717945e-16);
}

export function isClathrateStable(pressure: number, temperature: number): boolean {
  return temperature < clathrateDissociationTemperature(pressure);
}
