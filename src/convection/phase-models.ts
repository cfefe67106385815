/**
 * Phase Models
 *
 * Ordinary ices and clathrate share the same convection procedure but differ in
 * how properties and the conductive flux are obtained:
 *
 * - Ordinary ice: conductivity from the provider (temperature-dependent), and a
 *   conductive flux from the integrated k = D/T law, D·ln(Tm/Ttop)/h.
 * - Clathrate: conductivity pinned to a constant regardless of the provider,
 *   and a plain Fourier flux k·ΔT/h.
 */

import { solveCriticalTemperature } from './critical-temperature';
import type { MaterialPropertyProvider } from './properties/provider';
import {
  getPhaseParameters,
  type ClathrateParameters,
  type OrdinaryIceParameters,
  type PhaseParameters,
} from './phase-parameters';
import type { LayerThermalState, MaterialProperties, SolidPhase } from './types';
import { computeViscosity } from './viscosity';

export interface PhaseModel {
  readonly parameters: PhaseParameters;
  solveCriticalTemperature(layer: LayerThermalState): number;
  computeViscosity(layer: LayerThermalState, coreTemperature: number): number;
  evaluateProperties(provider: MaterialPropertyProvider, pressure: number, coreTemperature: number): MaterialProperties;
  conductionHeatFlux(layer: LayerThermalState, props: MaterialProperties): number;
}

abstract class ArrheniusPhaseModel<P extends PhaseParameters> implements PhaseModel {
  constructor(readonly parameters: P) {}

  solveCriticalTemperature(layer: LayerThermalState): number {
    const deltaT = layer.bottomTemperature - layer.topTemperature;
    return solveCriticalTemperature(layer.bottomTemperature, deltaT, this.parameters.activationEnergy);
  }

  computeViscosity(layer: LayerThermalState, coreTemperature: number): number {
    return computeViscosity(
      this.parameters.referenceViscosity,
      this.parameters.activationEnergy,
      layer.bottomTemperature,
      coreTemperature
    );
  }

  abstract evaluateProperties(
    provider: MaterialPropertyProvider,
    pressure: number,
    coreTemperature: number
  ): MaterialProperties;

  abstract conductionHeatFlux(layer: LayerThermalState, props: MaterialProperties): number;
}

export class OrdinaryIceModel extends ArrheniusPhaseModel<OrdinaryIceParameters> {
  evaluateProperties(provider: MaterialPropertyProvider, pressure: number, coreTemperature: number): MaterialProperties {
    return provider.evaluate(pressure, coreTemperature, this.parameters.phase);
  }

  conductionHeatFlux(layer: LayerThermalState): number {
    return this.parameters.conductionCoefficient *
      Math.log(layer.bottomTemperature / layer.topTemperature) / layer.thickness;
  }
}

export class ClathrateModel extends ArrheniusPhaseModel<ClathrateParameters> {
  evaluateProperties(provider: MaterialPropertyProvider, pressure: number, coreTemperature: number): MaterialProperties {
    const props = provider.evaluate(pressure, coreTemperature, 'Clathrate');
    return { ...props, thermalConductivity: this.parameters.thermalConductivity };
  }

  conductionHeatFlux(layer: LayerThermalState, props: MaterialProperties): number {
    const deltaT = layer.bottomTemperature - layer.topTemperature;
    return props.thermalConductivity * deltaT / layer.thickness;
  }
}

export function getPhaseModel(phase: SolidPhase): PhaseModel {
  const parameters = getPhaseParameters(phase);
  return parameters.kind === 'clathrate'
    ? new ClathrateModel(parameters)
    : new OrdinaryIceModel(parameters);
}
