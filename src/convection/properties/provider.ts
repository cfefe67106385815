/**
 * Material Property Providers
 *
 * The convection routine only needs density, expansivity, heat capacity and
 * conductivity at (P, T) for a solid phase. Anything that satisfies
 * MaterialPropertyProvider can stand in for the built-in correlations, e.g. a
 * tabulated equation of state.
 */

import { logDebug } from '../debug';
import { convectionConfig, type MaterialProperties, type SolidPhase } from '../types';
import { clathrateProperties } from './clathrate-properties';
import { iceProperties } from './ice-properties';

export interface MaterialPropertyProvider {
  /**
   * @param pressure - MPa
   * @param temperature - K
   * @throws OutOfRangeError when (P, T) is outside the correlation's validity
   */
  evaluate(pressure: number, temperature: number, phase: SolidPhase): MaterialProperties;
}

// ============================================================================
// Built-in Correlations
// ============================================================================

export class EquationOfStateProvider implements MaterialPropertyProvider {
  evaluate(pressure: number, temperature: number, phase: SolidPhase): MaterialProperties {
    if (phase === 'Clathrate') {
      return clathrateProperties(pressure, temperature);
    }
    return iceProperties(pressure, temperature, phase);
  }
}

export const defaultPropertyProvider: MaterialPropertyProvider = new EquationOfStateProvider();

// ============================================================================
// Caching Wrapper
// ============================================================================

export interface PropertyCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Memoises another provider by (phase, P, T). Worth it when the wrapped
 * provider interpolates large tables. Failed lookups are not cached, and the
 * oldest entry is evicted once convectionConfig.providerCacheLimit is reached.
 * Every hit returns a fresh copy of the stored entry.
 */
export class CachingPropertyProvider implements MaterialPropertyProvider {
  private readonly cache = new Map<string, MaterialProperties>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly inner: MaterialPropertyProvider) {}

  evaluate(pressure: number, temperature: number, phase: SolidPhase): MaterialProperties {
    const key = `${phase}|${pressure}|${temperature}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.hits++;
      return { ...cached };
    }

    this.misses++;
    const props = this.inner.evaluate(pressure, temperature, phase);

    const limit = convectionConfig.providerCacheLimit;
    if (limit > 0) {
      while (this.cache.size >= limit) {
        const oldest = this.cache.keys().next();
        if (oldest.done) break;
        this.cache.delete(oldest.value);
        logDebug(`[PropertyCache] evicted ${oldest.value}`);
      }
      this.cache.set(key, { ...props });
    }
    return props;
  }

  getStats(): PropertyCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
