/**
 * ResidualsPanel - Extends BasePanel for the lower pad showing
 * (data - MC) / MC with a horizontal grid
 */

import { type AxisSpec, type PointsObject, isKind } from "../figure/DrawTree.ts";
import { BasePanel } from "./BasePanel.ts";

export class ResidualsPanel extends BasePanel {
  protected get residuals(): PointsObject & { xAxis: AxisSpec; yAxis: AxisSpec } {
    const points = this.tree.children(this.pad.id).find(o => isKind(o, 'points'));
    if (!points || !isKind(points, 'points') || !points.xAxis || !points.yAxis) {
      throw new Error(`Pad "${this.pad.id}" holds no residuals with axes`);
    }
    return { ...points, xAxis: points.xAxis, yAxis: points.yAxis };
  }

  protected getDomains(): [[number, number], [number, number]] {
    const { histogram, minimum, maximum } = this.residuals;
    return [[histogram.xMin, histogram.xMax], [minimum, maximum]];
  }

  protected getAxes(): { xAxis: AxisSpec; yAxis: AxisSpec } {
    const { xAxis, yAxis } = this.residuals;
    return { xAxis, yAxis };
  }

  protected renderPanelElements(): void {
    const { histogram, color, id } = this.residuals;
    this.renderPoints(histogram, color, `points ${id}`);
  }
}
