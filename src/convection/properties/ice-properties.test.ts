import { describe, expect, it } from 'vitest';
import { OutOfRangeError } from '../errors';
import { ORDINARY_ICE_PHASES } from '../types';
import {
  iceProperties,
  iceSpecificHeat,
  iceThermalConductivity,
  iceThermalExpansion,
  iceVolumeState,
} from './ice-properties';

describe('iceVolumeState', () => {
  it('reduces to V0·(b0 + b1) at zero pressure and the reference temperature', () => {
    const state = iceVolumeState(0, 273.16, 'IceI');
    expect(state.specificVolume).toBeCloseTo(1.0905612, 12);
    expect(state.density).toBeCloseTo(916.95908, 4);
  });

  it('gives a positive density-pressure derivative', () => {
    const state = iceVolumeState(0, 273.16, 'IceI');
    expect(state.densityPressureDerivative).toBeCloseTo(0.1089266, 6);
  });

  it('densifies with pressure for every phase', () => {
    for (const phase of ORDINARY_ICE_PHASES) {
      const low = iceVolumeState(10, 200, phase);
      const high = iceVolumeState(200, 200, phase);
      expect(high.density).toBeGreaterThan(low.density);
      expect(low.densityPressureDerivative).toBeGreaterThan(0);
    }
  });

  it('puts the high-pressure ices above ice I in density', () => {
    const iceI = iceVolumeState(100, 250, 'IceI').density;
    for (const phase of ['IceII', 'IceIII', 'IceV', 'IceVI'] as const) {
      expect(iceVolumeState(100, 250, phase).density).toBeGreaterThan(iceI);
    }
  });
});

describe('iceThermalExpansion', () => {
  it('equals a0·a1 at the reference temperature', () => {
    expect(iceThermalExpansion(273.16, 'IceI')).toBeCloseTo(1.425e-4, 15);
  });

  it('matches ∂lnV/∂T from a central difference', () => {
    const T = 252.2;
    const dT = 1e-3;
    const lnV = (t: number) => Math.log(iceVolumeState(5, t, 'IceI').specificVolume);
    const numeric = (lnV(T + dT) - lnV(T - dT)) / (2 * dT);
    expect(iceThermalExpansion(T, 'IceI') / numeric).toBeCloseTo(1, 6);
  });
});

describe('iceSpecificHeat and iceThermalConductivity', () => {
  it('uses the linear heat capacity fit', () => {
    expect(iceSpecificHeat(200)).toBeCloseTo(1592.4, 10);
  });

  it('uses k = D/T', () => {
    expect(iceThermalConductivity(200, 'IceI')).toBeCloseTo(3.16, 12);
    expect(iceThermalConductivity(250, 'IceVI')).toBeCloseTo(0.732, 12);
  });
});

describe('iceProperties', () => {
  it('bundles the four properties at (P, T)', () => {
    const props = iceProperties(5, 252.1969814460752, 'IceI');
    expect(props.density).toBeCloseTo(920.23048, 4);
    expect(props.thermalExpansion / 1.394479576602248e-4).toBeCloseTo(1, 10);
    expect(props.specificHeat).toBeCloseTo(1959.71016, 4);
    expect(props.thermalConductivity).toBeCloseTo(2.50597765, 7);
  });

  it('throws OutOfRangeError outside the validity window', () => {
    expect(() => iceProperties(500, 250, 'IceI')).toThrow(OutOfRangeError);
    expect(() => iceProperties(5, 300, 'IceI')).toThrow(OutOfRangeError);
    expect(() => iceProperties(-1, 250, 'IceI')).toThrow(OutOfRangeError);
  });

  it('reports the offending phase, pressure and temperature', () => {
    try {
      iceProperties(5, 10, 'IceV');
      expect.unreachable('iceProperties should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(OutOfRangeError);
      if (error instanceof OutOfRangeError) {
        expect(error.phase).toBe('IceV');
        expect(error.pressure).toBe(5);
        expect(error.temperature).toBe(10);
        expect(error.message).toBe(
          '[Properties] IceV correlation out of range at P=5.000 MPa, T=10.00 K: ' +
          'temperature must lie in [20, 320] K'
        );
      }
    }
  });
});
