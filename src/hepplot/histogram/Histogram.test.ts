import { describe, it, expect } from "vitest";
import { InconsistentBinningError, InvalidHistogramError } from "../errors.ts";
import { Histogram } from "./Histogram.ts";

function variableWidth(): Histogram {
  return new Histogram({
    name: 'jets',
    title: 'Jets',
    edges: [0, 1, 2, 4],
    contents: [1, 4, 9],
    underflow: { content: 2, error: 1 },
    overflow: { content: 3, error: 1 }
  });
}

describe("Histogram", () => {
  describe("construction", () => {
    it("defaults errors to the square root of the contents", () => {
      const h = new Histogram({ name: 'h', edges: [0, 1, 2, 3], contents: [4, -9, 0] });
      expect(h.getErrors()).toEqual([2, 3, 0]);
    });

    it("defaults title and flow bins", () => {
      const h = new Histogram({ name: 'h', edges: [0, 1], contents: [5] });
      expect(h.title).toBe('');
      expect(h.underflow).toEqual({ content: 0, error: 0 });
      expect(h.overflow).toEqual({ content: 0, error: 0 });
    });

    it("copies and freezes its arrays", () => {
      const contents = [1, 2];
      const h = new Histogram({ name: 'h', edges: [0, 1, 2], contents });
      contents[0] = 100;
      expect(h.getContents()).toEqual([1, 2]);
      expect(Object.isFrozen(h.getContents())).toBe(true);
    });

    it("rejects fewer than two edges", () => {
      expect(() => new Histogram({ name: 'h', edges: [0], contents: [] })).toThrow(InvalidHistogramError);
    });

    it("rejects edges that do not increase", () => {
      expect(() => new Histogram({ name: 'h', edges: [0, 1, 1], contents: [1, 2] }))
        .toThrow('Histogram "h" is invalid: bin edges must be strictly increasing');
    });

    it("rejects non-finite edges", () => {
      expect(() => new Histogram({ name: 'h', edges: [0, Infinity], contents: [1] }))
        .toThrow('Histogram "h" is invalid: bin edge 1 is not finite');
    });

    it("rejects content and error arrays of the wrong length", () => {
      expect(() => new Histogram({ name: 'h', edges: [0, 1, 2], contents: [1] }))
        .toThrow('Histogram "h" is invalid: expected 2 bin contents, got 1');
      expect(() => new Histogram({ name: 'h', edges: [0, 1, 2], contents: [1, 2], errors: [1] }))
        .toThrow('Histogram "h" is invalid: expected 2 bin errors, got 1');
    });

    it("rejects negative errors", () => {
      expect(() => new Histogram({ name: 'h', edges: [0, 1], contents: [1], errors: [-1] }))
        .toThrow(InvalidHistogramError);
    });
  });

  describe("bins", () => {
    it("describes a bin by its edges", () => {
      const h = variableWidth();
      expect(h.nBins).toBe(3);
      expect(h.xMin).toBe(0);
      expect(h.xMax).toBe(4);
      expect(h.bin(2)).toEqual({ index: 2, lowEdge: 2, width: 2, center: 3, content: 9, error: 3 });
    });

    it("lists every regular bin", () => {
      expect(variableWidth().bins().map(b => b.center)).toEqual([0.5, 1.5, 3]);
    });

    it("throws for an index outside the regular bins", () => {
      const h = variableWidth();
      expect(() => h.bin(3)).toThrow(RangeError);
      expect(() => h.bin(-1)).toThrow(RangeError);
      expect(() => h.bin(0.5)).toThrow(RangeError);
    });
  });

  describe("integral", () => {
    it("includes the flow bins by default", () => {
      expect(variableWidth().integral()).toBe(19);
    });

    it("can leave the flow bins out", () => {
      expect(variableWidth().integral({ includeFlow: false })).toBe(14);
    });

    it("weights by bin width, flow bins taking the adjacent width", () => {
      // 1*1 + 4*1 + 9*2 + underflow 2*1 + overflow 3*2
      expect(variableWidth().integral({ width: true })).toBe(31);
    });
  });

  describe("maximum", () => {
    it("ignores the flow bins", () => {
      const h = new Histogram({ name: 'h', edges: [0, 1, 2], contents: [3, 7], overflow: { content: 50, error: 0 } });
      expect(h.maximum()).toBe(7);
    });

    it("skips NaN bins", () => {
      const h = new Histogram({ name: 'h', edges: [0, 1, 2], contents: [NaN, 2], errors: [0, 0] });
      expect(h.maximum()).toBe(2);
    });
  });

  describe("binning comparison", () => {
    it("tolerates rounding noise in the edges", () => {
      const a = new Histogram({ name: 'a', edges: [0, 0.1 + 0.2, 1], contents: [1, 1] });
      const b = new Histogram({ name: 'b', edges: [0, 0.3, 1], contents: [1, 1] });
      expect(a.hasSameBinning(b)).toBe(true);
    });

    it("tells different edges apart", () => {
      const a = new Histogram({ name: 'a', edges: [0, 1, 2], contents: [1, 1] });
      const b = new Histogram({ name: 'b', edges: [0, 1, 3], contents: [1, 1] });
      const c = new Histogram({ name: 'c', edges: [0, 2], contents: [1] });
      expect(a.hasSameBinning(b)).toBe(false);
      expect(a.hasSameBinning(c)).toBe(false);
    });
  });

  describe("arithmetic", () => {
    const a = new Histogram({ name: 'a', title: 'A', edges: [0, 1, 2, 3], contents: [1, 4, 9], errors: [1, 2, 3] });
    const b = new Histogram({ name: 'b', edges: [0, 1, 2, 3], contents: [3, 0, 4], errors: [4, 0, 4] });

    it("adds contents and combines errors in quadrature", () => {
      const sum = a.plus(b);
      expect(sum.getContents()).toEqual([4, 4, 13]);
      expect(sum.getErrors()[0]).toBeCloseTo(Math.sqrt(17), 12);
      expect(sum.getErrors()[1]).toBe(2);
      expect(sum.getErrors()[2]).toBe(5);
    });

    it("keeps the name and title of the left operand", () => {
      const sum = a.plus(b);
      expect(sum.name).toBe('a');
      expect(sum.title).toBe('A');
    });

    it("subtracts contents", () => {
      expect(a.minus(b).getContents()).toEqual([-2, 4, 5]);
      expect(a.minus(b).getErrors()[2]).toBe(5);
    });

    it("leaves its operands untouched", () => {
      a.plus(b);
      expect(a.getContents()).toEqual([1, 4, 9]);
      expect(b.getContents()).toEqual([3, 0, 4]);
    });

    it("divides with uncorrelated error propagation", () => {
      const num = new Histogram({ name: 'n', edges: [0, 1, 2], contents: [6, 2], errors: [3, 1] });
      const den = new Histogram({ name: 'd', edges: [0, 1, 2], contents: [2, 0], errors: [1, 1] });
      const ratio = num.dividedBy(den);

      expect(ratio.getContents()[0]).toBe(3);
      // sqrt(3^2 * 2^2 + 1^2 * 6^2) / 2^2
      expect(ratio.getErrors()[0]).toBeCloseTo(Math.sqrt(72) / 4, 12);
      expect(ratio.getContents()[1]).toBeNaN();
      expect(ratio.getErrors()[1]).toBeNaN();
    });

    it("applies the operation to the flow bins", () => {
      const left = new Histogram({ name: 'l', edges: [0, 1], contents: [1], underflow: { content: 2, error: 3 } });
      const right = new Histogram({ name: 'r', edges: [0, 1], contents: [1], underflow: { content: 5, error: 4 } });
      expect(left.plus(right).underflow).toEqual({ content: 7, error: 5 });
    });

    it("refuses histograms with different binning", () => {
      const other = new Histogram({ name: 'other', edges: [0, 1, 2, 4], contents: [1, 1, 1] });
      expect(() => a.plus(other)).toThrow(InconsistentBinningError);
      expect(() => a.dividedBy(other)).toThrow('Histograms "a" and "other" have different binning.');
    });

    it("scales contents, errors and flow bins", () => {
      const scaled = variableWidth().scaled(-2);
      expect(scaled.getContents()).toEqual([-2, -8, -18]);
      expect(scaled.getErrors()).toEqual([2, 4, 6]);
      expect(scaled.underflow).toEqual({ content: -4, error: 2 });
      expect(scaled.overflow).toEqual({ content: -6, error: 2 });
    });
  });

  describe("copies", () => {
    it("renames without touching the bins", () => {
      const h = variableWidth().withName('other').withTitle('Other');
      expect(h.name).toBe('other');
      expect(h.title).toBe('Other');
      expect(h.getContents()).toEqual([1, 4, 9]);
      expect(h.overflow).toEqual({ content: 3, error: 1 });
    });

    it("serializes as a store entry", () => {
      const h = new Histogram({ name: 'h', title: 'H', edges: [0, 1], contents: [4], color: 'red' });
      expect(h.toJSON()).toEqual({
        kind: 'hist1d',
        name: 'h',
        title: 'H',
        type: 'double',
        edges: [0, 1],
        contents: [4],
        errors: [2],
        underflow: { content: 0, error: 0 },
        overflow: { content: 0, error: 0 },
        color: 'red'
      });
    });

    it("omits the colour when none is set", () => {
      expect('color' in variableWidth().toJSON()).toBe(false);
    });
  });
});
