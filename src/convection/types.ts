/**
 * Core types for the ice-shell convection model.
 *
 * All quantities are SI except pressure, which is carried in MPa to match the
 * equation-of-state correlations.
 */

// ============================================================================
// Phases
// ============================================================================

/**
 * Phase tags understood by the model. 'water' exists so that callers can pass
 * their layer phase straight through; it is rejected by the convection routine.
 */
export type PhaseTag = 'water' | 'IceI' | 'IceII' | 'IceIII' | 'IceV' | 'IceVI' | 'Clathrate';

export type SolidPhase = Exclude<PhaseTag, 'water'>;

export type OrdinaryIcePhase = Exclude<SolidPhase, 'Clathrate'>;

export const ORDINARY_ICE_PHASES: readonly OrdinaryIcePhase[] = ['IceI', 'IceII', 'IceIII', 'IceV', 'IceVI'] as const;

export const SOLID_PHASES: readonly SolidPhase[] = [...ORDINARY_ICE_PHASES, 'Clathrate'];

export function isSolidPhase(phase: string): phase is SolidPhase {
  return (SOLID_PHASES as readonly string[]).includes(phase);
}

export function isOrdinaryIcePhase(phase: string): phase is OrdinaryIcePhase {
  return (ORDINARY_ICE_PHASES as readonly string[]).includes(phase);
}

// ============================================================================
// Layer State and Results
// ============================================================================

export interface LayerThermalState {
  topTemperature: number;     // K
  bottomTemperature: number;  // K - melting temperature at the base
  midpointPressure: number;   // MPa
  thickness: number;          // m
  gravity: number;            // m/s²
}

export interface MaterialProperties {
  density: number;              // kg/m³
  thermalExpansion: number;     // 1/K
  specificHeat: number;         // J/(kg·K)
  thermalConductivity: number;  // W/(m·K)
}

/**
 * How the heat-transport regime was reached:
 * - 'convecting': Ra exceeded the critical value and the lid fits in the layer
 * - 'conducting': Ra was at or below the critical value
 * - 'downgraded': Ra was supercritical but the conductive lid came out thicker
 *   than the layer, so the conductive solution is reported instead
 */
export type HeatTransportRegime = 'convecting' | 'conducting' | 'downgraded';

export interface RegimeResult {
  phase: SolidPhase;
  regime: HeatTransportRegime;
  convecting: boolean;
  heatFlux: number;                     // W/m²
  upperBoundaryLayerThickness: number;  // m - conductive lid
  lowerBoundaryLayerThickness: number;  // m - basal thermal boundary layer
  coreTemperature: number;              // K
  materialProperties: MaterialProperties;
  viscosity: number;                    // Pa·s
  rayleighNumber: number;
  criticalRayleighNumber: number;
}

// ============================================================================
// Configuration
// ============================================================================

export interface ConvectionConfig {
  // Maximum number of retained debug log entries
  debugLogLimit: number;
  // Maximum number of (phase, P, T) entries kept by CachingPropertyProvider
  providerCacheLimit: number;
}

// Global configuration (can be modified at runtime)
export const convectionConfig: ConvectionConfig = {
  debugLogLimit: 100,
  providerCacheLimit: 1024,
};
