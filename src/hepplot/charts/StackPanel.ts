/**
 * StackPanel - Extends BasePanel for the main pad: stacked simulation
 * with the data drawn on top
 * Features: no gaps between bins, cumulative layers, vertical-only error bars
 */

import { type AxisSpec, type PointsObject, type StackObject, isKind } from "../figure/DrawTree.ts";
import { BasePanel } from "./BasePanel.ts";
import { escapeXml, num } from "./svg.ts";

export class StackPanel extends BasePanel {
  protected get stack(): StackObject {
    const stack = this.tree.children(this.pad.id).find(o => isKind(o, 'stack'));
    if (!stack || !isKind(stack, 'stack')) {
      throw new Error(`Pad "${this.pad.id}" holds no stack`);
    }
    return stack;
  }

  protected get overlays(): PointsObject[] {
    return this.tree.children(this.pad.id).filter((o): o is PointsObject => isKind(o, 'points'));
  }

  protected getDomains(): [[number, number], [number, number]] {
    const { layers, minimum, maximum } = this.stack;
    const reference = layers[0].histogram;
    return [[reference.xMin, reference.xMax], [minimum, maximum]];
  }

  protected getAxes(): { xAxis: AxisSpec; yAxis: AxisSpec } {
    const { xAxis, yAxis } = this.stack;
    return { xAxis, yAxis };
  }

  protected renderPanelElements(): void {
    this.renderStack();
    this.overlays.forEach(points => this.renderPoints(points.histogram, points.color, `points ${points.id}`));
  }

  private renderStack(): void {
    const { layers } = this.stack;
    const edges = layers[0].histogram.getEdges();
    let lower: number[] = edges.slice(1).map(() => 0);

    layers.forEach(layer => {
      const contents = layer.histogram.getContents();
      const upper = lower.map((base, i) => base + contents[i]);

      const top: string[] = [];
      const bottom: string[] = [];
      upper.forEach((value, i) => {
        top.push(`${num(this.xScale(edges[i]))},${num(this.yScale(value))}`);
        top.push(`${num(this.xScale(edges[i + 1]))},${num(this.yScale(value))}`);
      });
      for (let i = lower.length - 1; i >= 0; i--) {
        bottom.push(`${num(this.xScale(edges[i + 1]))},${num(this.yScale(lower[i]))}`);
        bottom.push(`${num(this.xScale(edges[i]))},${num(this.yScale(lower[i]))}`);
      }

      this.svgElements.push(
        `<path class="stack-layer" data-series="${escapeXml(layer.histogram.name)}" d="M${top.join('L')}L${bottom.join('L')}Z" fill="${layer.color}" stroke="${this.themeColors.axis}" stroke-width="1"/>`
      );
      lower = upper;
    });
  }

  protected renderTitle(): void {
    const { title } = this.stack.title;
    if (!title) return;

    const { x, width } = this.frame;
    const size = this.text(this.style.figureTitleFontSize);
    const top = this.padRect.y + this.pad.layout.margins.top * this.padRect.height;
    this.svgElements.push(
      `<text class="figure-title" x="${num(x + width / 2)}" y="${num(top - size)}" text-anchor="middle" fill="${this.themeColors.text}" font-size="${num(size)}px">${escapeXml(title)}</text>`
    );
  }
}
