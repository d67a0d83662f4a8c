/**
 * Normalizer - rescales simulation so that its total matches the data
 */

import { DegenerateNormalizationError } from "../errors.ts";
import type { Histogram } from "../histogram/Histogram.ts";

export interface Normalization {
  factor: number;
  dataIntegral: number;
  mcIntegral: number;
  mc: Histogram[];
}

/**
 * Scale all simulated histograms by a common factor so that their summed
 * integral equals the data integral. Flow bins are included. With
 * `isDensity` every bin is weighted by its width.
 */
export function normalizeMCToData(data: Histogram, mc: readonly Histogram[], isDensity: boolean): Normalization {
  const options = { width: isDensity, includeFlow: true };
  const dataIntegral = data.integral(options);
  const mcIntegral = mc.reduce((total, h) => total + h.integral(options), 0);

  const factor = dataIntegral / mcIntegral;
  if (mcIntegral === 0 || !Number.isFinite(factor)) {
    throw new DegenerateNormalizationError(dataIntegral, mcIntegral);
  }

  return {
    factor,
    dataIntegral,
    mcIntegral,
    mc: mc.map(h => h.scaled(factor))
  };
}
