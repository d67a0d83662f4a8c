import { describe, it, expect } from "vitest";
import { DegenerateNormalizationError } from "../errors.ts";
import { Histogram } from "../histogram/Histogram.ts";
import { normalizeMCToData } from "./Normalizer.ts";

const edges = [0, 10, 20];

describe("normalizeMCToData", () => {
  const data = new Histogram({ name: 'data', edges, contents: [60, 40] });
  const ttbar = new Histogram({ name: 'ttbar', edges, contents: [20, 20] });
  const wjets = new Histogram({ name: 'wjets', edges, contents: [15, 20] });

  it("scales every contribution by the same factor", () => {
    const result = normalizeMCToData(data, [ttbar, wjets], false);

    expect(result.dataIntegral).toBe(100);
    expect(result.mcIntegral).toBe(75);
    expect(result.factor).toBeCloseTo(4 / 3, 12);
    expect(result.mc[0].integral()).toBeCloseTo(53.333333, 5);
    expect(result.mc[1].integral()).toBeCloseTo(46.666667, 5);
  });

  it("makes the summed simulation integral equal the data integral", () => {
    const { mc } = normalizeMCToData(data, [ttbar, wjets], false);
    expect(mc.reduce((sum, h) => sum + h.integral(), 0)).toBeCloseTo(100, 10);
  });

  it("keeps names and order and leaves the inputs alone", () => {
    const { mc } = normalizeMCToData(data, [ttbar, wjets], false);
    expect(mc.map(h => h.name)).toEqual(['ttbar', 'wjets']);
    expect(ttbar.getContents()).toEqual([20, 20]);
  });

  it("scales errors with the contents", () => {
    const { mc } = normalizeMCToData(data, [ttbar, wjets], false);
    expect(mc[0].getErrors()[0]).toBeCloseTo(Math.sqrt(20) * 4 / 3, 10);
  });

  it("weights bins by width for density histograms", () => {
    const wide = [0, 1, 3];
    const density = new Histogram({ name: 'data', edges: wide, contents: [10, 20] });
    const sim = new Histogram({ name: 'sim', edges: wide, contents: [5, 5] });

    // data 10*1 + 20*2 = 50, simulation 5*1 + 5*2 = 15
    const result = normalizeMCToData(density, [sim], true);
    expect(result.factor).toBeCloseTo(50 / 15, 12);
    expect(result.mc[0].integral({ width: true })).toBeCloseTo(50, 10);
  });

  it("counts under- and overflow", () => {
    const withFlow = new Histogram({ name: 'data', edges: [0, 1], contents: [10], underflow: { content: 10, error: 1 } });
    const sim = new Histogram({ name: 'sim', edges: [0, 1], contents: [5] });
    expect(normalizeMCToData(withFlow, [sim], false).factor).toBe(4);
  });

  it("throws when the simulation is empty", () => {
    const empty = new Histogram({ name: 'empty', edges, contents: [0, 0] });
    expect(() => normalizeMCToData(data, [empty], false)).toThrow(DegenerateNormalizationError);
    expect(() => normalizeMCToData(data, [empty], false))
      .toThrow('Cannot normalize simulation to data: data integral 100, MC integral 0.');
  });
});
