/**
 * Residuals - total simulation and the relative deviation of data from it
 */

import type { Histogram } from "../histogram/Histogram.ts";

export const TOTAL_MC_NAME = 'mcTotalHist';
export const RESIDUALS_NAME = 'residualsHist';
export const RESIDUALS_Y_TITLE = '(Data−MC)/MC';

/** Bin-wise sum of all simulated histograms, uncertainties added in quadrature */
export function totalMC(mc: readonly Histogram[]): Histogram {
  if (mc.length === 0) {
    throw new RangeError('Cannot sum an empty list of MC histograms');
  }
  const [first, ...rest] = mc;
  return rest.reduce((total, h) => total.plus(h), first).withName(TOTAL_MC_NAME).withTitle('');
}

/**
 * (data - total) / total per bin. Bins where the total is zero hold NaN so
 * the rest of the figure can still be drawn. The title carries only axis
 * titles: the x title of the figure and the fixed residuals label.
 */
export function computeResiduals(data: Histogram, total: Histogram, xTitle: string): Histogram {
  return data
    .minus(total)
    .dividedBy(total)
    .withName(RESIDUALS_NAME)
    .withTitle(`;${xTitle};${RESIDUALS_Y_TITLE}`);
}
