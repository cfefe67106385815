import { describe, expect, it } from 'vitest';
import { UnsupportedPhaseError } from './errors';
import { parseLayerFile } from './layer-input';
import { evaluateConvection } from './rayleigh-regime';

const THIN_SHELL = {
  phase: 'IceI',
  topTemperature: 100,
  bottomTemperature: 110,
  midpointPressure: 0.5,
  thickness: 500,
  gravity: 1.3,
};

describe('parseLayerFile', () => {
  it('accepts a single layer and labels it by position', () => {
    const [parsed] = parseLayerFile(JSON.stringify(THIN_SHELL));
    expect(parsed).toEqual({
      label: 'layer 1',
      phase: 'IceI',
      layer: {
        topTemperature: 100,
        bottomTemperature: 110,
        midpointPressure: 0.5,
        thickness: 500,
        gravity: 1.3,
      },
    });
  });

  it('accepts an array of layers and keeps explicit labels', () => {
    const parsed = parseLayerFile(JSON.stringify([
      { ...THIN_SHELL, label: 'outer shell' },
      { ...THIN_SHELL, phase: 'Clathrate' },
    ]));
    expect(parsed.map((p) => p.label)).toEqual(['outer shell', 'layer 2']);
    expect(parsed[1]?.phase).toBe('Clathrate');
  });

  it('names the offending field', () => {
    expect(() => parseLayerFile(JSON.stringify({ ...THIN_SHELL, thickness: -500 }))).toThrow(/thickness/);
  });

  it('rejects unknown phase tags', () => {
    expect(() => parseLayerFile(JSON.stringify({ ...THIN_SHELL, phase: 'IceIV' }))).toThrow(/phase/);
  });

  it('rejects an empty array', () => {
    expect(() => parseLayerFile('[]')).toThrow(/Invalid layer file/);
  });

  it('lets water through to be rejected by the convection routine', () => {
    const [parsed] = parseLayerFile(JSON.stringify({ ...THIN_SHELL, phase: 'water' }));
    expect(parsed).toBeDefined();
    if (parsed) {
      expect(() => evaluateConvection(parsed.layer, parsed.phase)).toThrow(UnsupportedPhaseError);
    }
  });
});
