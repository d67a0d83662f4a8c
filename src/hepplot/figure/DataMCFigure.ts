/**
 * DataMCFigure - stacked simulation compared with data, with an optional
 * residuals panel underneath
 *
 * Typical use:
 *
 *   const figure = DataMCFigure.load('inputs.json', 'muon_pt');
 *   figure.normalizeMCToData(false);
 *   figure.draw();
 *   figure.addCMSLabel('Preliminary');
 *   figure.addEnergyLabel('13 TeV');
 *   figure.print('muon_pt.png');
 *
 * The figure owns its histograms and everything it draws. Every draw builds a
 * fresh DrawTree; dispose() releases it.
 */

import { writeFileSync } from "node:fs";
import { extname } from "node:path";
import { scaleOrdinal } from "d3-scale";
import { CanvasComposer } from "../charts/CanvasComposer.ts";
import { convertSvgToPng } from "../charts/SvgToPng.ts";
import {
  FigureNotRenderedError,
  InconsistentBinningError,
  InvalidHistogramError,
  InvalidResidualsRangeError,
  MissingDataHistogramError,
  NoSimulationFoundError,
  UnsupportedExportFormatError
} from "../errors.ts";
import type { Histogram } from "../histogram/Histogram.ts";
import { RESERVED_NAMES, loadGroup } from "../io/HistogramStore.ts";
import { STORE_EXTENSION } from "../io/StoreSchema.ts";
import { createStore, figureInputsDirectory, writeStore } from "../io/StoreWriter.ts";
import { createLogger } from "../logger.ts";
import {
  type AxisSpec,
  type CanvasObject,
  type LabelObject,
  type LegendEntry,
  type LegendObject,
  type PadObject,
  type PointsObject,
  type StackObject,
  type TextSpan,
  DrawTree
} from "./DrawTree.ts";
import {
  type FigureStyle,
  type FigureStyleOptions,
  getThemeColors,
  resolveColor,
  resolveStyle
} from "./FigureStyle.ts";
import { type FigureTitle, formatFigureTitle, parseFigureTitle } from "./FigureTitle.ts";
import { type FigureLayout, computeLayout, reconcileMaximum } from "./Layout.ts";
import { normalizeMCToData } from "./Normalizer.ts";
import { computeResiduals, totalMC } from "./Residuals.ts";

const log = createLogger('figure');

export const DEFAULT_RESIDUALS_MIN = -0.25;
export const DEFAULT_RESIDUALS_MAX = 0.28;

export interface ResidualsSettings {
  enabled: boolean;
  min: number;
  max: number;
}

export interface DataMCFigureInit {
  /** "title;x title;y title" or an already parsed record */
  title?: string | FigureTitle;
  data?: Histogram;
  /** Declaration order; the last one ends up at the bottom of the stack */
  mc: readonly Histogram[];
  style?: FigureStyleOptions;
}

export interface LoadOptions {
  style?: FigureStyleOptions;
}

export class DataMCFigure {
  private readonly title: FigureTitle;
  private readonly rawTitle: string;
  private readonly data?: Histogram;
  private mc: Histogram[];
  private readonly style: FigureStyle;
  private residuals: ResidualsSettings = {
    enabled: true,
    min: DEFAULT_RESIDUALS_MIN,
    max: DEFAULT_RESIDUALS_MAX
  };
  private tree?: DrawTree;

  constructor(init: DataMCFigureInit) {
    const { data, mc } = init;

    if (mc.length === 0) {
      throw new NoSimulationFoundError();
    }

    const names = new Set<string>();
    for (const h of mc) {
      if (RESERVED_NAMES.includes(h.name)) {
        throw new InvalidHistogramError(h.name, 'name is reserved and cannot be used for simulation');
      }
      if (names.has(h.name)) {
        throw new InvalidHistogramError(h.name, 'MC histogram names must be unique');
      }
      names.add(h.name);
    }

    const reference = mc[0];
    for (const h of [...mc.slice(1), ...(data ? [data] : [])]) {
      if (!reference.hasSameBinning(h)) {
        throw new InconsistentBinningError(reference.name, h.name);
      }
    }

    if (typeof init.title === 'string' || init.title === undefined) {
      this.rawTitle = init.title ?? '';
      this.title = parseFigureTitle(this.rawTitle);
    } else {
      this.title = { ...init.title };
      this.rawTitle = formatFigureTitle(this.title);
    }

    this.data = data;
    this.mc = [...mc];
    this.style = resolveStyle(init.style);
  }

  /**
   * Read the title, the data histogram and the simulated histograms from a
   * directory of a histogram store
   */
  static load(path: string, directory = '', options: LoadOptions = {}): DataMCFigure {
    const group = loadGroup(path, directory);
    return new DataMCFigure({
      title: group.rawTitle,
      data: group.data,
      mc: group.mc,
      style: options.style
    });
  }

  getTitle(): string {
    return this.rawTitle;
  }

  getFigureTitle(): FigureTitle {
    return { ...this.title };
  }

  getStyle(): FigureStyle {
    return this.style;
  }

  /** `"data"` gives the data histogram, any other name a simulated one */
  getHist(name: string): Histogram | undefined {
    if (name === 'data') {
      return this.data;
    }
    return this.mc.find(h => h.name === name);
  }

  getMCHists(): readonly Histogram[] {
    return this.mc;
  }

  getResidualsSettings(): ResidualsSettings {
    return { ...this.residuals };
  }

  /**
   * Scale the simulation so that its total integral equals the data
   * integral. With `isDensity` the integrals are weighted by bin width.
   * Returns the applied factor. A previous drawing is discarded.
   */
  normalizeMCToData(isDensity = false): number {
    if (!this.data) {
      throw new MissingDataHistogramError();
    }
    const normalization = normalizeMCToData(this.data, this.mc, isDensity);
    this.mc = normalization.mc;
    log.debug(`Scaled MC by ${normalization.factor} (data ${normalization.dataIntegral}, MC ${normalization.mcIntegral})`);
    this.invalidate();
    return normalization.factor;
  }

  /** Enable or disable the residuals panel and set its y range */
  requestResiduals(enabled: boolean, min = DEFAULT_RESIDUALS_MIN, max = DEFAULT_RESIDUALS_MAX): void {
    if (!Number.isFinite(min) || !Number.isFinite(max) || !(min < max)) {
      throw new InvalidResidualsRangeError(min, max);
    }
    this.residuals = { enabled, min, max };
    this.invalidate();
  }

  /** Build the draw tree of the figure, replacing any previous one */
  draw(): DrawTree {
    this.invalidate();

    const { style } = this;
    const theme = getThemeColors(style.theme);
    const data = this.data;
    const showResiduals = this.residuals.enabled && data !== undefined;
    if (this.residuals.enabled && !data) {
      log.warn('Residuals requested for a figure without data; drawing the main panel only');
    }

    const colorOf = this.createColorMap();
    const legendEntries = this.buildLegendEntries(colorOf, theme.text);
    const layout = computeLayout({ residuals: showResiduals, legendEntries: legendEntries.length, style });
    log.debug(`Canvas ${layout.canvas.width}x${layout.canvas.height}, residuals text scale ${layout.residualsTextScale}`);

    const tree = new DrawTree(layout.canvas);
    tree.add<PadObject>({
      kind: 'pad',
      id: 'mainPad',
      layout: layout.mainPad,
      primitives: [],
      mirroredTicks: style.tickStyle.mirrored,
      horizontalGrid: false
    });

    // Last declared histogram goes to the bottom of the stack
    const layers = [...this.mc].reverse().map(histogram => ({ histogram, color: colorOf(histogram) }));
    const maximum = reconcileMaximum(totalMC(this.mc).maximum(), data?.maximum());

    tree.add<StackObject>({
      kind: 'stack',
      id: 'mcStack',
      title: this.title,
      layers,
      minimum: 0,
      maximum,
      xAxis: this.axis({
        title: showResiduals ? '' : this.title.xTitle,
        titleOffset: style.titleXOffset,
        showLabels: !showResiduals
      }),
      yAxis: this.axis({
        title: this.title.yTitle,
        titleOffset: style.titleYOffset
      })
    }, 'mainPad');

    if (data) {
      tree.add<PointsObject>({
        kind: 'points',
        id: 'data',
        histogram: data,
        minimum: 0,
        maximum,
        color: theme.text
      }, 'mainPad');
    }

    tree.add<LegendObject>({
      kind: 'legend',
      id: 'legend',
      box: layout.legendBox,
      textSize: style.legendTextSize,
      entries: legendEntries
    });

    if (showResiduals && data) {
      this.drawResiduals(tree, layout, data, theme.text);
    }

    this.tree = tree;
    return tree;
  }

  addCMSLabel(additionalText = ''): void {
    const tree = this.requireTree('add CMS label');
    const spans: TextSpan[] = [{ text: 'CMS', bold: true, scale: 1.2 }];
    if (additionalText) {
      spans.push({ text: additionalText, italic: true });
    }
    tree.add<LabelObject>({
      kind: 'label',
      id: tree.uniqueId('cmsLabel'),
      x: 0.16,
      y: 0.91,
      align: 'left',
      textSize: this.style.annotationTextSize,
      spans
    });
  }

  addEnergyLabel(text: string): void {
    const tree = this.requireTree('add energy label');
    tree.add<LabelObject>({
      kind: 'label',
      id: tree.uniqueId('energyLabel'),
      x: 0.85,
      y: 0.91,
      align: 'right',
      textSize: this.style.annotationTextSize,
      spans: [{ text }]
    });
  }

  getDrawTree(): DrawTree | undefined {
    return this.tree;
  }

  getCanvas(): CanvasObject | undefined {
    return this.tree?.canvas;
  }

  getLegend(): LegendObject | undefined {
    return this.tree?.find('legend', 'legend');
  }

  getMainPad(): PadObject | undefined {
    return this.tree?.find('mainPad', 'pad');
  }

  getResidualsPad(): PadObject | undefined {
    return this.tree?.find('residualsPad', 'pad');
  }

  toSVG(): string {
    return CanvasComposer.compose(this.requireTree('export'), this.style);
  }

  /**
   * Write the figure. `.json` writes a histogram store holding the draw
   * tree, the legend and the figure inputs (directory "histograms"); `.svg`
   * and `.png` write images.
   */
  print(path: string): void {
    const tree = this.requireTree('print');
    const extension = extname(path).toLowerCase();

    if (extension === STORE_EXTENSION) {
      const legend = tree.require('legend', 'legend');
      writeStore(path, createStore([
        { name: 'canvas', kind: 'canvas', ...tree.toJSON() },
        { ...legend, name: 'legend' },
        figureInputsDirectory('histograms', this.rawTitle, this.data, this.mc)
      ]));
    } else if (extension === '.svg') {
      writeFileSync(path, this.toSVG() + '\n', 'utf-8');
    } else if (extension === '.png') {
      const png = convertSvgToPng(this.toSVG(), { scale: this.style.pngScale });
      writeFileSync(path, png.data);
    } else {
      throw new UnsupportedExportFormatError(path);
    }
    log.info(`Figure written to "${path}"`);
  }

  /** Release every visual object of the current drawing */
  dispose(): void {
    this.invalidate();
  }

  private invalidate(): void {
    if (this.tree) {
      this.tree.release();
      this.tree = undefined;
    }
  }

  private requireTree(action: string): DrawTree {
    if (!this.tree) {
      throw new FigureNotRenderedError(action);
    }
    return this.tree;
  }

  private createColorMap(): (histogram: Histogram) => string {
    const palette = scaleOrdinal<string, string>()
      .domain(this.mc.map(h => h.name))
      .range(this.style.colors);
    return histogram => (histogram.color ? resolveColor(histogram.color) : palette(histogram.name));
  }

  // Data first, then simulation in declaration order
  private buildLegendEntries(colorOf: (histogram: Histogram) => string, dataColor: string): LegendEntry[] {
    const entries: LegendEntry[] = [];
    if (this.data) {
      entries.push({ target: 'data', label: this.data.title, style: 'p', color: dataColor });
    }
    this.mc.forEach(h => entries.push({ target: h.name, label: h.title, style: 'f', color: colorOf(h) }));
    return entries;
  }

  private axis(overrides: Partial<AxisSpec> & { title: string; titleOffset: number }, textScale = 1): AxisSpec {
    const { style } = this;
    return {
      titleSize: style.titleFontSize * textScale,
      labelSize: style.baseFontSize * textScale,
      labelOffset: style.axisLabelOffset,
      divisions: style.tickStyle.divisions,
      tickLength: style.tickStyle.length,
      showLabels: true,
      centerTitle: false,
      ...overrides
    };
  }

  private drawResiduals(tree: DrawTree, layout: FigureLayout, data: Histogram, color: string): void {
    const { style } = this;
    if (!layout.residualsPad) return;

    tree.add<PadObject>({
      kind: 'pad',
      id: 'residualsPad',
      layout: layout.residualsPad,
      primitives: [],
      mirroredTicks: style.tickStyle.mirrored,
      horizontalGrid: true
    });

    const residuals = computeResiduals(data, totalMC(this.mc), this.title.xTitle);
    const axisTitles = parseFigureTitle(residuals.title);
    const scale = layout.residualsTextScale;

    tree.add<PointsObject>({
      kind: 'points',
      id: 'residualsHist',
      histogram: residuals,
      minimum: this.residuals.min,
      maximum: this.residuals.max,
      color,
      xAxis: this.axis({
        title: axisTitles.xTitle,
        titleOffset: style.titleXOffset,
        tickLength: style.tickStyle.length * layout.residualsTickScale
      }, scale),
      yAxis: this.axis({
        title: axisTitles.yTitle,
        titleOffset: style.residualsTitleYOffset,
        divisions: style.tickStyle.residualDivisions,
        centerTitle: true
      }, scale)
    }, 'residualsPad');
  }
}
