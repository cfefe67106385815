/**
 * Material Properties Index
 *
 * Re-exports the property correlations and providers.
 */

export {
  EquationOfStateProvider,
  CachingPropertyProvider,
  defaultPropertyProvider,
  type MaterialPropertyProvider,
  type PropertyCacheStats,
} from './provider';

export {
  iceProperties,
  iceVolumeState,
  iceThermalExpansion,
  iceSpecificHeat,
  iceThermalConductivity,
  assertWithinWindow,
  ICE_VALIDITY,
  type IceVolumeState,
  type ValidityWindow,
} from './ice-properties';

export {
  clathrateProperties,
  clathrateDensity,
  clathrateSpecificHeat,
  clathrateThermalExpansion,
  clathrateDissociationTemperature,
  isClathrateStable,
  CLATHRATE_VALIDITY,
} from './clathrate-properties';
