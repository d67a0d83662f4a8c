/**
 * CanvasComposer - lays the pads, the legend and the text labels of a
 * draw tree out on one SVG canvas
 */

import type { DrawObject, DrawTree, LabelObject } from "../figure/DrawTree.ts";
import { type FigureStyle, type ThemeColors, getThemeColors } from "../figure/FigureStyle.ts";
import { type CanvasSize, fontPixels } from "../figure/Layout.ts";
import { renderLegend } from "./Legend.ts";
import { ResidualsPanel } from "./ResidualsPanel.ts";
import { StackPanel } from "./StackPanel.ts";
import { escapeXml, num } from "./svg.ts";

export class CanvasComposer {
  /**
   * Render every primitive of the canvas in drawing order and wrap the
   * result in a standalone SVG document
   */
  static compose(tree: DrawTree, style: FigureStyle): string {
    const { size } = tree.canvas;
    const theme = getThemeColors(style.theme);

    const content = tree.children('canvas').map(object => this.renderPrimitive(object, tree, style, theme));

    return `<svg width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}" xmlns="http://www.w3.org/2000/svg" style="font-family: ${escapeXml(style.fontFamily)};">
  <rect width="${size.width}" height="${size.height}" fill="${theme.background}"/>
  ${content.join('\n  ')}
</svg>`;
  }

  private static renderPrimitive(object: DrawObject, tree: DrawTree, style: FigureStyle, theme: ThemeColors): string {
    switch (object.kind) {
      case 'pad': {
        const holdsStack = tree.children(object.id).some(child => child.kind === 'stack');
        const panel = holdsStack ? new StackPanel(object, tree, style) : new ResidualsPanel(object, tree, style);
        return panel.render();
      }
      case 'legend':
        return renderLegend(object, tree.canvas.size, theme);
      case 'label':
        return this.renderLabel(object, tree.canvas.size, theme);
      default:
        throw new Error(`Cannot draw a ${object.kind} directly on the canvas`);
    }
  }

  private static renderLabel(label: LabelObject, canvas: CanvasSize, theme: ThemeColors): string {
    const sizePx = fontPixels(label.textSize, { x: 0, y: 0, ...canvas });
    const x = label.x * canvas.width;
    const y = (1 - label.y) * canvas.height;
    const anchor = label.align === 'left' ? 'start' : 'end';

    const spans = label.spans.map(span => {
      const attributes = [
        span.bold ? 'font-weight="bold"' : '',
        span.italic ? 'font-style="italic"' : '',
        span.scale !== undefined ? `font-size="${num(sizePx * span.scale)}px"` : ''
      ].filter(Boolean);
      return `<tspan${attributes.length ? ' ' + attributes.join(' ') : ''}>${escapeXml(span.text)}</tspan>`;
    });

    return `<text id="${label.id}" x="${num(x)}" y="${num(y)}" text-anchor="${anchor}" fill="${theme.text}" font-size="${num(sizePx)}px">${spans.join(' ')}</text>`;
  }
}
