/**
 * BasePanel - Abstract base class for the pads of a data/MC figure
 * Contains the frame, axis and text handling shared by the main and the
 * residuals panel
 */

import { scaleLinear, type ScaleLinear } from "d3-scale";
import type { AxisSpec, DrawTree, PadObject } from "../figure/DrawTree.ts";
import { type FigureStyle, type ThemeColors, getThemeColors } from "../figure/FigureStyle.ts";
import { type PixelRect, boxToPixels, fontPixels, frameToPixels } from "../figure/Layout.ts";
import type { Histogram } from "../histogram/Histogram.ts";
import { escapeXml, num } from "./svg.ts";

/** Distance of an axis title from its axis, in title heights per unit offset */
const TITLE_OFFSET_UNIT = 2.2;

export interface AxisTicks {
  values: number[];
  labels: string[];
  /** Power of ten the labels are divided by, 0 when unscaled */
  exponent: number;
}

/**
 * Tick positions and labels for a linear axis. Labels that would need more
 * than `maxDigits` integer digits are divided by a power of ten.
 */
export function axisTicks(domain: [number, number], count: number, maxDigits: number): AxisTicks {
  const largest = Math.max(Math.abs(domain[0]), Math.abs(domain[1]));
  const exponent = largest >= 10 ** maxDigits ? Math.floor(Math.log10(largest)) : 0;
  const factor = 10 ** exponent;

  const display = scaleLinear().domain([domain[0] / factor, domain[1] / factor]);
  const format = display.tickFormat(count);
  const ticks = display.ticks(count);

  return {
    values: ticks.map(t => t * factor),
    labels: ticks.map(t => format(t)),
    exponent
  };
}

export abstract class BasePanel {
  protected svgElements: string[] = [];
  protected readonly padRect: PixelRect;
  protected readonly frame: PixelRect;
  protected readonly themeColors: ThemeColors;
  protected xScale: ScaleLinear<number, number>;
  protected yScale: ScaleLinear<number, number>;

  constructor(protected readonly pad: PadObject, protected readonly tree: DrawTree, protected readonly style: FigureStyle) {
    const size = tree.canvas.size;
    this.padRect = boxToPixels(pad.layout.box, size);
    this.frame = frameToPixels(pad.layout, size);
    this.themeColors = getThemeColors(style.theme);

    const [xDomain, yDomain] = this.getDomains();
    this.xScale = scaleLinear().domain(xDomain).range([this.frame.x, this.frame.x + this.frame.width]);
    this.yScale = scaleLinear().domain(yDomain).range([this.frame.y + this.frame.height, this.frame.y]);
  }

  // Abstract methods that must be implemented by subclasses
  protected abstract getDomains(): [[number, number], [number, number]];
  protected abstract getAxes(): { xAxis: AxisSpec; yAxis: AxisSpec };
  protected abstract renderPanelElements(): void;

  // Template method - defines the overall structure
  public render(): string {
    this.svgElements = [];

    this.renderBackground();
    this.openClippedGroup();
    this.renderGrid();
    this.renderPanelElements(); // Implemented by subclasses
    this.svgElements.push('</g>');
    this.renderFrame();
    this.renderAxes();
    this.renderTitle();

    return this.wrapGroup();
  }

  protected get clipId(): string {
    return `${this.pad.id}-frame`;
  }

  protected text(size: number): number {
    return fontPixels(size, this.padRect);
  }

  protected renderBackground(): void {
    const { x, y, width, height } = this.padRect;
    const fill = this.pad.layout.transparent ? 'none' : this.themeColors.background;
    this.svgElements.push(
      `<rect x="${num(x)}" y="${num(y)}" width="${num(width)}" height="${num(height)}" fill="${fill}"/>`
    );
  }

  protected openClippedGroup(): void {
    const { x, y, width, height } = this.frame;
    this.svgElements.push(
      `<clipPath id="${this.clipId}"><rect x="${num(x)}" y="${num(y)}" width="${num(width)}" height="${num(height)}"/></clipPath>`,
      `<g clip-path="url(#${this.clipId})">`
    );
  }

  protected renderGrid(): void {
    if (!this.pad.horizontalGrid) return;

    const { yAxis } = this.getAxes();
    const ticks = axisTicks(this.yDomain(), yAxis.divisions, this.style.maxAxisDigits);
    const { x, width } = this.frame;
    ticks.values.forEach(value => {
      const y = this.yScale(value);
      this.svgElements.push(
        `<line class="grid" x1="${num(x)}" y1="${num(y)}" x2="${num(x + width)}" y2="${num(y)}" stroke="${this.themeColors.grid}" stroke-width="1" stroke-dasharray="4,4"/>`
      );
    });
  }

  protected renderFrame(): void {
    const { x, y, width, height } = this.frame;
    this.svgElements.push(
      `<rect class="frame" x="${num(x)}" y="${num(y)}" width="${num(width)}" height="${num(height)}" fill="none" stroke="${this.themeColors.axis}" stroke-width="1"/>`
    );
  }

  protected renderAxes(): void {
    const { xAxis, yAxis } = this.getAxes();
    this.renderXAxis(xAxis);
    this.renderYAxis(yAxis);
  }

  protected renderXAxis(axis: AxisSpec): void {
    const { x, y, width, height } = this.frame;
    const bottom = y + height;
    const { axis: stroke, text } = this.themeColors;
    const ticks = axisTicks(this.xDomain(), axis.divisions, this.style.maxAxisDigits);
    const tickLength = axis.tickLength * height;
    const labelPx = this.text(axis.labelSize);
    const labelY = bottom + this.text(axis.labelOffset) + labelPx;

    ticks.values.forEach((value, i) => {
      const tx = this.xScale(value);
      this.svgElements.push(
        `<line class="tick" x1="${num(tx)}" y1="${num(bottom)}" x2="${num(tx)}" y2="${num(bottom - tickLength)}" stroke="${stroke}" stroke-width="1"/>`
      );
      if (this.pad.mirroredTicks) {
        this.svgElements.push(
          `<line class="tick" x1="${num(tx)}" y1="${num(y)}" x2="${num(tx)}" y2="${num(y + tickLength)}" stroke="${stroke}" stroke-width="1"/>`
        );
      }
      if (axis.showLabels) {
        this.svgElements.push(
          `<text class="x-label" x="${num(tx)}" y="${num(labelY)}" text-anchor="middle" fill="${text}" font-size="${num(labelPx)}px">${escapeXml(ticks.labels[i])}</text>`
        );
      }
    });

    if (axis.showLabels && ticks.exponent !== 0) {
      this.renderExponent(ticks.exponent, x + width, labelY + labelPx, 'end', labelPx);
    }

    if (axis.title) {
      const titlePx = this.text(axis.titleSize);
      const titleY = bottom + axis.titleOffset * TITLE_OFFSET_UNIT * titlePx;
      const titleX = axis.centerTitle ? x + width / 2 : x + width;
      const anchor = axis.centerTitle ? 'middle' : 'end';
      this.svgElements.push(
        `<text class="x-title" x="${num(titleX)}" y="${num(titleY)}" text-anchor="${anchor}" fill="${text}" font-size="${num(titlePx)}px">${escapeXml(axis.title)}</text>`
      );
    }
  }

  protected renderYAxis(axis: AxisSpec): void {
    const { x, y, width, height } = this.frame;
    const { axis: stroke, text } = this.themeColors;
    const ticks = axisTicks(this.yDomain(), axis.divisions, this.style.maxAxisDigits);
    const tickLength = axis.tickLength * width;
    const labelPx = this.text(axis.labelSize);
    const labelX = x - this.text(axis.labelOffset) - labelPx / 4;

    ticks.values.forEach((value, i) => {
      const ty = this.yScale(value);
      this.svgElements.push(
        `<line class="tick" x1="${num(x)}" y1="${num(ty)}" x2="${num(x + tickLength)}" y2="${num(ty)}" stroke="${stroke}" stroke-width="1"/>`
      );
      if (this.pad.mirroredTicks) {
        this.svgElements.push(
          `<line class="tick" x1="${num(x + width)}" y1="${num(ty)}" x2="${num(x + width - tickLength)}" y2="${num(ty)}" stroke="${stroke}" stroke-width="1"/>`
        );
      }
      if (axis.showLabels) {
        this.svgElements.push(
          `<text class="y-label" x="${num(labelX)}" y="${num(ty + labelPx / 3)}" text-anchor="end" fill="${text}" font-size="${num(labelPx)}px">${escapeXml(ticks.labels[i])}</text>`
        );
      }
    });

    if (axis.showLabels && ticks.exponent !== 0) {
      this.renderExponent(ticks.exponent, x, y - labelPx / 2, 'start', labelPx);
    }

    if (axis.title) {
      const titlePx = this.text(axis.titleSize);
      const titleX = x - axis.titleOffset * TITLE_OFFSET_UNIT * titlePx;
      const titleY = axis.centerTitle ? y + height / 2 : y;
      const anchor = axis.centerTitle ? 'middle' : 'end';
      this.svgElements.push(
        `<text class="y-title" transform="translate(${num(titleX)},${num(titleY)}) rotate(-90)" text-anchor="${anchor}" fill="${text}" font-size="${num(titlePx)}px">${escapeXml(axis.title)}</text>`
      );
    }
  }

  protected renderExponent(exponent: number, x: number, y: number, anchor: 'start' | 'end', sizePx: number): void {
    this.svgElements.push(
      `<text class="axis-exponent" x="${num(x)}" y="${num(y)}" text-anchor="${anchor}" fill="${this.themeColors.text}" font-size="${num(sizePx)}px">×10<tspan baseline-shift="super" font-size="${num(sizePx * 0.7)}px">${exponent}</tspan></text>`
    );
  }

  protected renderTitle(): void {
    // Only panels with a figure title override this
  }

  /** Markers with vertical error bars; NaN bins are left out */
  protected renderPoints(histogram: Histogram, color: string, className: string): void {
    const radius = this.text(this.style.markerRadius);
    const cap = radius;

    histogram.bins().forEach(bin => {
      if (!Number.isFinite(bin.content)) return;

      const cx = this.xScale(bin.center);
      const cy = this.yScale(bin.content);
      const elements: string[] = [];

      if (Number.isFinite(bin.error) && bin.error > 0) {
        const top = this.yScale(bin.content + bin.error);
        const low = this.yScale(bin.content - bin.error);
        elements.push(
          `<line x1="${num(cx)}" y1="${num(low)}" x2="${num(cx)}" y2="${num(top)}" stroke="${color}" stroke-width="1.5"/>`,
          `<line x1="${num(cx - cap)}" y1="${num(top)}" x2="${num(cx + cap)}" y2="${num(top)}" stroke="${color}" stroke-width="1.5"/>`,
          `<line x1="${num(cx - cap)}" y1="${num(low)}" x2="${num(cx + cap)}" y2="${num(low)}" stroke="${color}" stroke-width="1.5"/>`
        );
      }
      elements.push(`<circle cx="${num(cx)}" cy="${num(cy)}" r="${num(radius)}" fill="${color}"/>`);

      this.svgElements.push(
        `<g class="${className}" data-bin="${bin.index}">${elements.join('')}<title>Bin: ${num(bin.lowEdge)} - ${num(bin.lowEdge + bin.width)}, Content: ${num(bin.content)} ± ${num(bin.error)}</title></g>`
      );
    });
  }

  protected xDomain(): [number, number] {
    const [min, max] = this.xScale.domain();
    return [min, max];
  }

  protected yDomain(): [number, number] {
    const [min, max] = this.yScale.domain();
    return [min, max];
  }

  protected wrapGroup(): string {
    return `<g id="${this.pad.id}">
    ${this.svgElements.join('\n    ')}
  </g>`;
  }
}
