/**
 * Core temperature of a convecting ice layer.
 *
 * Deschamps & Sotin (2001) Eq. 18: the temperature at the top of the well-mixed
 * interior follows from a quadratic in Tc, with c1 and c2 fit to the numerical
 * experiments of Deschamps & Sotin (2000). The root is explicit, no iteration.
 */

import { DomainError } from './errors';

/** Ideal gas constant in J/(mol·K) */
export const R_GAS = 8.314;

export const CORE_TEMPERATURE_C1 = 1.43;
export const CORE_TEMPERATURE_C2 = -0.03;

/**
 * @param bottomTemperature - Tm in K
 * @param temperatureDifference - Tm - Ttop in K
 * @param activationEnergy - E in J/mol
 * @returns Tc in K
 */
export function solveCriticalTemperature(
  bottomTemperature: number,
  temperatureDifference: number,
  activationEnergy: number
): number {
  const B = activationEnergy / 2 / R_GAS / CORE_TEMPERATURE_C1;
  const C = CORE_TEMPERATURE_C2 * temperatureDifference;
  const radicand = 1 + 2 / B * (bottomTemperature - C);

  if (!(radicand >= 0)) {
    throw new DomainError('core temperature radicand', radicand, 'must be non-negative');
  }

  const Tc = B * (Math.sqrt(radicand) - 1);
  if (!Number.isFinite(Tc)) {
    throw new DomainError('core temperature', Tc, 'must be finite');
  }
  return Tc;
}
