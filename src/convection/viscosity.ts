/**
 * Arrhenius viscosity of the convecting interior (Deschamps & Sotin 2001 Eq. 11,
 * also Durham et al. 1997), referenced to the viscosity at the melting point.
 */

import { DomainError } from './errors';
import { R_GAS } from './critical-temperature';

export function computeViscosity(
  referenceViscosity: number,
  activationEnergy: number,
  bottomTemperature: number,
  coreTemperature: number
): number {
  if (!(coreTemperature > 0)) {
    throw new DomainError('core temperature', coreTemperature, 'must be positive to evaluate viscosity');
  }
  if (!(bottomTemperature > 0)) {
    throw new DomainError('bottom temperature', bottomTemperature, 'must be positive to evaluate viscosity');
  }

  const A = activationEnergy / R_GAS / bottomTemperature;  // dimensionless
  const nu = referenceViscosity * Math.exp(A * (bottomTemperature / coreTemperature - 1));

  if (!Number.isFinite(nu) || nu <= 0) {
    throw new DomainError('viscosity', nu, 'must be finite and positive');
  }
  return nu;
}
