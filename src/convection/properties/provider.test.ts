import { afterEach, describe, expect, it, vi } from 'vitest';
import { OutOfRangeError } from '../errors';
import { convectionConfig, type MaterialProperties, type SolidPhase } from '../types';
import { clathrateProperties } from './clathrate-properties';
import { iceProperties } from './ice-properties';
import { CachingPropertyProvider, EquationOfStateProvider } from './provider';

const FIXED_PROPS: MaterialProperties = {
  density: 930,
  thermalExpansion: 1.5e-4,
  specificHeat: 2000,
  thermalConductivity: 2.5,
};

function countingProvider() {
  const evaluate = vi.fn(
    (_pressure: number, _temperature: number, _phase: SolidPhase): MaterialProperties => ({ ...FIXED_PROPS })
  );
  return { evaluate };
}

describe('EquationOfStateProvider', () => {
  const provider = new EquationOfStateProvider();

  it('routes ordinary ices to the ice correlations', () => {
    expect(provider.evaluate(5, 250, 'IceI')).toEqual(iceProperties(5, 250, 'IceI'));
    expect(provider.evaluate(400, 250, 'IceV')).toEqual(iceProperties(400, 250, 'IceV'));
  });

  it('routes clathrate to the clathrate correlations', () => {
    expect(provider.evaluate(5, 250, 'Clathrate')).toEqual(clathrateProperties(5, 250));
  });
});

describe('CachingPropertyProvider', () => {
  const originalLimit = convectionConfig.providerCacheLimit;

  afterEach(() => {
    convectionConfig.providerCacheLimit = originalLimit;
  });

  it('serves repeated lookups from the cache', () => {
    const inner = countingProvider();
    const cache = new CachingPropertyProvider(inner);

    const first = cache.evaluate(5, 250, 'IceI');
    const second = cache.evaluate(5, 250, 'IceI');

    expect(second).toEqual(first);
    expect(inner.evaluate).toHaveBeenCalledTimes(1);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('hands out copies that callers cannot change through', () => {
    const cache = new CachingPropertyProvider(countingProvider());

    const first = cache.evaluate(5, 250, 'IceI');
    first.thermalConductivity = 100;
    const second = cache.evaluate(5, 250, 'IceI');
    second.density = 1;

    expect(cache.evaluate(5, 250, 'IceI')).toEqual(FIXED_PROPS);
  });

  it('stores a copy of the wrapped provider result', () => {
    const shared: MaterialProperties = { ...FIXED_PROPS };
    const cache = new CachingPropertyProvider({ evaluate: () => shared });

    cache.evaluate(5, 250, 'IceI');
    shared.thermalExpansion = 1;

    expect(cache.evaluate(5, 250, 'IceI')).toEqual(FIXED_PROPS);
  });

  it('keys entries by phase as well as pressure and temperature', () => {
    const inner = countingProvider();
    const cache = new CachingPropertyProvider(inner);

    cache.evaluate(5, 250, 'IceI');
    cache.evaluate(5, 250, 'Clathrate');
    cache.evaluate(6, 250, 'IceI');

    expect(inner.evaluate).toHaveBeenCalledTimes(3);
  });

  it('does not cache failed lookups', () => {
    const cache = new CachingPropertyProvider(new EquationOfStateProvider());

    expect(() => cache.evaluate(500, 250, 'IceI')).toThrow(OutOfRangeError);
    expect(() => cache.evaluate(500, 250, 'IceI')).toThrow(OutOfRangeError);
    expect(cache.getStats()).toEqual({ hits: 0, misses: 2, size: 0 });
  });

  it('evicts the oldest entry at the configured limit', () => {
    convectionConfig.providerCacheLimit = 2;
    const inner = countingProvider();
    const cache = new CachingPropertyProvider(inner);

    cache.evaluate(1, 250, 'IceI');
    cache.evaluate(2, 250, 'IceI');
    cache.evaluate(3, 250, 'IceI');
    expect(cache.getStats().size).toBe(2);

    cache.evaluate(1, 250, 'IceI');
    expect(inner.evaluate).toHaveBeenCalledTimes(4);
    cache.evaluate(3, 250, 'IceI');
    expect(inner.evaluate).toHaveBeenCalledTimes(4);
  });

  it('passes through without storing when the limit is zero', () => {
    convectionConfig.providerCacheLimit = 0;
    const inner = countingProvider();
    const cache = new CachingPropertyProvider(inner);

    cache.evaluate(5, 250, 'IceI');
    cache.evaluate(5, 250, 'IceI');
    expect(inner.evaluate).toHaveBeenCalledTimes(2);
    expect(cache.getStats().size).toBe(0);
  });

  it('resets counters on clear', () => {
    const cache = new CachingPropertyProvider(countingProvider());
    cache.evaluate(5, 250, 'IceI');
    cache.clear();
    expect(cache.getStats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});
