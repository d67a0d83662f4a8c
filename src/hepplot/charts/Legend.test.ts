import { describe, it, expect } from "vitest";
import type { LegendObject } from "../figure/DrawTree.ts";
import { getThemeColors } from "../figure/FigureStyle.ts";
import { renderLegend } from "./Legend.ts";

const legend: LegendObject = {
  kind: 'legend',
  id: 'legend',
  box: { x1: 0.86, y1: 0.82, x2: 0.99, y2: 0.9 },
  textSize: 0.03,
  entries: [
    { target: 'data', label: 'Data', style: 'p', color: '#000000' },
    { target: 'ttbar', label: 't<t>', style: 'f', color: '#658DCD' }
  ]
};

function entries(svg: string): string[] {
  return svg.split('<g class="legend-entry"').slice(1);
}

describe("renderLegend", () => {
  const svg = renderLegend(legend, { width: 1000, height: 1000 }, getThemeColors('light'));

  it("keeps the entry order", () => {
    const targets = [...svg.matchAll(/data-target="([^"]+)" data-style="([pf])"/g)].map(m => [m[1], m[2]]);
    expect(targets).toEqual([['data', 'p'], ['ttbar', 'f']]);
  });

  it("draws a marker for data and a filled box for simulation", () => {
    const [data, ttbar] = entries(svg);
    expect(data).toContain('<circle');
    expect(data).not.toContain('<rect');
    expect(ttbar).toContain('fill="#658DCD"');
    expect(ttbar).toContain('<rect');
  });

  it("escapes labels and sizes text from the canvas", () => {
    const [, ttbar] = entries(svg);
    expect(ttbar).toContain('font-size="30px">t&lt;t&gt;</text>');
  });

  it("fills the legend box", () => {
    expect(svg).toContain('<rect x="860" y="100" width="130" height="80" fill="#ffffff" stroke="none"/>');
  });
});
