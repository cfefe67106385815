/**
 * Layer input parsing for the headless runner.
 *
 * A layer file holds either one layer object or an array of them. Values are
 * checked for shape and sign here; the physical consistency checks
 * (Tm > Ttop, etc.) stay with evaluateConvection so they apply to every caller.
 */

import { z } from 'zod';
import type { LayerThermalState, PhaseTag } from './types';

const PhaseTagSchema = z.enum(['water', 'IceI', 'IceII', 'IceIII', 'IceV', 'IceVI', 'Clathrate']);

export const LayerInputSchema = z.object({
  label: z.string().optional(),
  phase: PhaseTagSchema,
  topTemperature: z.number().finite().positive(),
  bottomTemperature: z.number().finite().positive(),
  midpointPressure: z.number().finite().nonnegative(),
  thickness: z.number().finite().positive(),
  gravity: z.number().finite().positive(),
});

export const LayerListSchema = z.array(LayerInputSchema).min(1);

export type LayerInput = z.infer<typeof LayerInputSchema>;

export interface ParsedLayer {
  label: string;
  phase: PhaseTag;
  layer: LayerThermalState;
}

/**
 * Parse the JSON text of a layer file.
 *
 * @throws Error naming the offending field when the document does not match
 */
export function parseLayerFile(json: string): ParsedLayer[] {
  const raw: unknown = JSON.parse(json);
  // A lone layer is read as a one-element list
  const parsed = LayerListSchema.safeParse(Array.isArray(raw) ? raw : [raw]);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`[LayerInput] Invalid layer file: ${issues}`);
  }

  return parsed.data.map((input, index) => ({
    label: input.label ?? `layer ${index + 1}`,
    phase: input.phase,
    layer: {
      topTemperature: input.topTemperature,
      bottomTemperature: input.bottomTemperature,
      midpointPressure: input.midpointPressure,
      thickness: input.thickness,
      gravity: input.gravity,
    },
  }));
}
