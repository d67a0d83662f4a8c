/**
 * Error types raised while loading, composing and exporting figures.
 * Every error carries a `code` so callers can branch without instanceof chains.
 */

export type HepPlotErrorCode =
  | 'SourceUnavailable'
  | 'GroupNotFound'
  | 'MissingDataHistogram'
  | 'NoSimulationFound'
  | 'DegenerateNormalization'
  | 'FigureNotRendered'
  | 'InconsistentBinning'
  | 'InvalidHistogram'
  | 'InvalidResidualsRange'
  | 'UnsupportedExportFormat';

export class HepPlotError extends Error {
  constructor(readonly code: HepPlotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceUnavailableError extends HepPlotError {
  constructor(readonly path: string, reason: string, cause?: unknown) {
    super('SourceUnavailable', `Source file "${path}" is corrupted or is not a valid histogram store: ${reason}`, { cause });
  }
}

export class GroupNotFoundError extends HepPlotError {
  constructor(readonly path: string, readonly group: string) {
    super('GroupNotFound', `Source file "${path}" does not contain a directory "${group}".`);
  }
}

function location(path?: string, group?: string): string {
  return path === undefined ? 'the figure' : `file "${path}", directory "${group ?? ''}"`;
}

export class MissingDataHistogramError extends HepPlotError {
  constructor(readonly path?: string, readonly group?: string) {
    super('MissingDataHistogram', `Failed to find data histogram in ${location(path, group)}.`);
  }
}

export class NoSimulationFoundError extends HepPlotError {
  constructor(readonly path?: string, readonly group?: string) {
    super('NoSimulationFound', `Failed to find any MC histograms in ${location(path, group)}.`);
  }
}

export class DegenerateNormalizationError extends HepPlotError {
  constructor(readonly dataIntegral: number, readonly mcIntegral: number) {
    super(
      'DegenerateNormalization',
      `Cannot normalize simulation to data: data integral ${dataIntegral}, MC integral ${mcIntegral}.`
    );
  }
}

export class FigureNotRenderedError extends HepPlotError {
  constructor(action: string) {
    super('FigureNotRendered', `Cannot ${action} before the figure is drawn.`);
  }
}

export class InconsistentBinningError extends HepPlotError {
  constructor(readonly left: string, readonly right: string) {
    super('InconsistentBinning', `Histograms "${left}" and "${right}" have different binning.`);
  }
}

export class InvalidHistogramError extends HepPlotError {
  constructor(readonly histogram: string, reason: string) {
    super('InvalidHistogram', `Histogram "${histogram}" is invalid: ${reason}`);
  }
}

export class InvalidResidualsRangeError extends HepPlotError {
  constructor(readonly min: number, readonly max: number) {
    super('InvalidResidualsRange', `Residuals range [${min}, ${max}] must satisfy min < max.`);
  }
}

export class UnsupportedExportFormatError extends HepPlotError {
  constructor(readonly path: string) {
    super('UnsupportedExportFormat', `Cannot export to "${path}": supported extensions are .svg, .png and .json.`);
  }
}
