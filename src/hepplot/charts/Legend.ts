/**
 * Legend - vertical legend box drawn on the canvas
 * Filled swatches for simulation, marker with error bar for data
 */

import type { LegendEntry, LegendObject } from "../figure/DrawTree.ts";
import type { ThemeColors } from "../figure/FigureStyle.ts";
import { type CanvasSize, boxToPixels, fontPixels } from "../figure/Layout.ts";
import { escapeXml, num } from "./svg.ts";

export function renderLegend(legend: LegendObject, canvas: CanvasSize, theme: ThemeColors): string {
  const rect = boxToPixels(legend.box, canvas);
  const textPx = fontPixels(legend.textSize, { x: 0, y: 0, ...canvas });
  const rowHeight = legend.entries.length > 0 ? rect.height / legend.entries.length : 0;
  const swatchWidth = Math.min(rect.width * 0.25, rowHeight * 1.2);

  const svgElements: string[] = [
    `<rect x="${num(rect.x)}" y="${num(rect.y)}" width="${num(rect.width)}" height="${num(rect.height)}" fill="${theme.background}" stroke="none"/>`
  ];

  // Entries are stacked top-down
  legend.entries.forEach((entry, i) => {
    const rowTop = rect.y + i * rowHeight;
    const centerY = rowTop + rowHeight / 2;
    svgElements.push(
      `<g class="legend-entry" data-target="${escapeXml(entry.target)}" data-style="${entry.style}">` +
      renderSwatch(entry, rect.x + swatchWidth * 0.1, rowTop + rowHeight * 0.15, swatchWidth * 0.8, rowHeight * 0.7, theme) +
      `<text x="${num(rect.x + swatchWidth * 1.1)}" y="${num(centerY + textPx / 3)}" fill="${theme.text}" font-size="${num(textPx)}px">${escapeXml(entry.label)}</text>` +
      '</g>'
    );
  });

  return `<g id="${legend.id}">
    ${svgElements.join('\n    ')}
  </g>`;
}

function renderSwatch(entry: LegendEntry, x: number, y: number, width: number, height: number, theme: ThemeColors): string {
  if (entry.style === 'f') {
    return `<rect x="${num(x)}" y="${num(y)}" width="${num(width)}" height="${num(height)}" fill="${entry.color}" stroke="${theme.axis}" stroke-width="1"/>`;
  }

  const cx = x + width / 2;
  const cy = y + height / 2;
  return (
    `<line x1="${num(cx)}" y1="${num(y)}" x2="${num(cx)}" y2="${num(y + height)}" stroke="${entry.color}" stroke-width="1.5"/>` +
    `<circle cx="${num(cx)}" cy="${num(cy)}" r="${num(height / 5)}" fill="${entry.color}"/>`
  );
}
