/**
 * Error types raised by the convection model.
 *
 * Every error aborts the single-layer evaluation that raised it. Callers decide
 * whether a failed layer stops a larger calculation.
 */

export class ConvectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The phase tag is not a solid phase this model can treat (liquid water, or an
 * unknown tag from untyped input).
 */
export class UnsupportedPhaseError extends ConvectionError {
  readonly phase: string;

  constructor(phase: string) {
    super(`[Convection] Solid-state convection is not computed for phase '${phase}'`);
    this.phase = phase;
  }
}

/**
 * A physical precondition failed mid-computation (negative radicand, Tc <= 0,
 * non-finite Rayleigh number, non-positive temperature difference, ...).
 */
export class DomainError extends ConvectionError {
  readonly quantity: string;
  readonly value: number;

  constructor(quantity: string, value: number, detail: string) {
    super(`[Convection] Invalid ${quantity}=${value}: ${detail}`);
    this.quantity = quantity;
    this.value = value;
  }
}

/**
 * Raised by material property providers when (P, T) is outside the validity
 * window of the correlation for the requested phase.
 */
export class OutOfRangeError extends ConvectionError {
  readonly phase: string;
  readonly pressure: number;     // MPa
  readonly temperature: number;  // K

  constructor(phase: string, pressure: number, temperature: number, detail: string) {
    super(
      `[Properties] ${phase} correlation out of range at P=${pressure.toFixed(3)} MPa, ` +
      `T=${temperature.toFixed(2)} K: ${detail}`
    );
    this.phase = phase;
    this.pressure = pressure;
    this.temperature = temperature;
  }
}
