/**
 * SvgToPng.ts - SVG to PNG conversion using @resvg/resvg-js
 *
 * resvg renders without a browser or system libraries, so figures can be
 * rasterized from plain Node.
 */

import { Resvg } from "@resvg/resvg-js";
import { createLogger } from "../logger.ts";

const log = createLogger('png');

export interface ConversionOptions {
  scale?: number;
  dpi?: number;
}

export interface ConversionResult {
  data: Uint8Array;
  width: number;
  height: number;
}

// Limit maximum dimensions to prevent oversized buffers
const MAX_DIMENSION = 8192;

/**
 * Extract width and height from SVG string
 */
export function extractSvgDimensions(svgString: string): { width: number; height: number } | null {
  const svgMatch = svgString.match(/<svg[^>]*>/);
  if (!svgMatch) {
    return null;
  }

  const svgTag = svgMatch[0];
  const widthMatch = svgTag.match(/\swidth\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);
  const heightMatch = svgTag.match(/\sheight\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);

  if (widthMatch && heightMatch) {
    return {
      width: parseFloat(widthMatch[1]),
      height: parseFloat(heightMatch[1])
    };
  }

  // Fallback: try to extract from viewBox
  const viewBoxMatch = svgTag.match(/viewBox\s*=\s*["']?[\d.\s]*\s+[\d.\s]*\s+(\d+(?:\.\d+)?)\s+(\d+(?:\.\d+)?)["']?/);
  if (viewBoxMatch) {
    return {
      width: parseFloat(viewBoxMatch[1]),
      height: parseFloat(viewBoxMatch[2])
    };
  }

  return null;
}

/**
 * Effective raster width for the requested scale; DPI takes precedence
 * over scale, 72 DPI being the baseline
 */
export function rasterWidth(svgWidth: number, options: ConversionOptions = {}): number {
  const { scale = 1.0, dpi } = options;
  const effectiveScale = dpi !== undefined ? dpi / 72 : scale;
  return Math.min(Math.round(svgWidth * effectiveScale), MAX_DIMENSION);
}

export function convertSvgToPng(svgString: string, options: ConversionOptions = {}): ConversionResult {
  const dimensions = extractSvgDimensions(svgString);
  if (!dimensions) {
    throw new Error('Could not extract SVG dimensions from SVG string');
  }

  const width = rasterWidth(dimensions.width, options);
  log.debug(`SVG dimensions: ${dimensions.width}x${dimensions.height}, raster width ${width}`);

  const resvg = new Resvg(svgString, {
    fitTo: { mode: 'width', value: width },
    font: { loadSystemFonts: true },
    background: 'white'
  });
  const rendered = resvg.render();

  return {
    data: new Uint8Array(rendered.asPng()),
    width: rendered.width,
    height: rendered.height
  };
}
