/**
 * Rheological Parameters per Phase
 *
 * Activation energies and reference viscosities follow Deschamps & Sotin (2001)
 * for ice I and Durham et al. (1997) along the melting curve for the
 * high-pressure ices; ice II and III use the mean of their two creep regimes and
 * ice VI its high-temperature value. Clathrate values are from Durham et al.
 * (2003): roughly 20x the viscosity of ice I.
 *
 * Dcond is the prefactor of k = Dcond / T (Andersson & Inaba 2005). The ice V
 * value was rescaled from a D·T^-0.612 fit to the D·T^-1 form.
 */

import type { OrdinaryIcePhase, SolidPhase } from './types';

/** Critical Rayleigh number for ordinary ices */
export const ICE_CRITICAL_RAYLEIGH = 1e5;

/**
 * Critical Rayleigh number for clathrate. A boundary-layer derivation exists
 * but the value actually used is this fixed literal.
 */
export const CLATHRATE_CRITICAL_RAYLEIGH = 2e7;

export interface OrdinaryIceParameters {
  kind: 'ordinary';
  phase: OrdinaryIcePhase;
  /** Activation energy in J/mol */
  activationEnergy: number;
  /** Viscosity at the melting point in Pa·s */
  referenceViscosity: number;
  /** Dcond in W/m, conductivity k = Dcond / T */
  conductionCoefficient: number;
  criticalRayleigh: number;
}

export interface ClathrateParameters {
  kind: 'clathrate';
  phase: 'Clathrate';
  activationEnergy: number;
  referenceViscosity: number;
  /** Temperature-independent conductivity in W/(m·K) (Kalousova & Sotin 2020) */
  thermalConductivity: number;
  criticalRayleigh: number;
}

export type PhaseParameters = OrdinaryIceParameters | ClathrateParameters;

export const ICE_PARAMETERS: Readonly<Record<OrdinaryIcePhase, OrdinaryIceParameters>> = {
  IceI: {
    kind: 'ordinary',
    phase: 'IceI',
    activationEnergy: 60e3,
    referenceViscosity: 1e14,
    conductionCoefficient: 632,
    criticalRayleigh: ICE_CRITICAL_RAYLEIGH,
  },
  IceII: {
    kind: 'ordinary',
    phase: 'IceII',
    activationEnergy: ((98 + 55) / 2) * 1e3,
    referenceViscosity: 1e18,
    conductionCoefficient: 418,
    criticalRayleigh: ICE_CRITICAL_RAYLEIGH,
  },
  IceIII: {
    kind: 'ordinary',
    phase: 'IceIII',
    activationEnergy: ((103 + 151) / 2) * 1e3,
    referenceViscosity: 5e12,
    conductionCoefficient: 242,
    criticalRayleigh: ICE_CRITICAL_RAYLEIGH,
  },
  IceV: {
    kind: 'ordinary',
    phase: 'IceV',
    activationEnergy: 136e3,
    referenceViscosity: 5e14,
    conductionCoefficient: 328,
    criticalRayleigh: ICE_CRITICAL_RAYLEIGH,
  },
  IceVI: {
    kind: 'ordinary',
    phase: 'IceVI',
    activationEnergy: 110e3,
    referenceViscosity: 5e14,
    conductionCoefficient: 183,
    criticalRayleigh: ICE_CRITICAL_RAYLEIGH,
  },
};

export const CLATHRATE_PARAMETERS: Readonly<ClathrateParameters> = {
  kind: 'clathrate',
  phase: 'Clathrate',
  activationEnergy: 90e3,
  referenceViscosity: 1e14 * 20,
  thermalConductivity: 0.5,
  criticalRayleigh: CLATHRATE_CRITICAL_RAYLEIGH,
};

export function getPhaseParameters(phase: SolidPhase): PhaseParameters {
  return phase === 'Clathrate' ? CLATHRATE_PARAMETERS : ICE_PARAMETERS[phase];
}
