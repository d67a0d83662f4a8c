/**
 * Histogram - one-dimensional binned distribution with per-bin uncertainties
 *
 * Instances are immutable: arithmetic returns new histograms. Under- and
 * overflow accumulators take part in integrals and arithmetic but never in
 * maximum() or bin().
 */

import { max } from "d3-array";
import { InconsistentBinningError, InvalidHistogramError } from "../errors.ts";

export interface FlowBin {
  content: number;
  error: number;
}

export interface Bin {
  index: number;
  lowEdge: number;
  width: number;
  center: number;
  content: number;
  error: number;
}

export interface HistogramInit {
  name: string;
  title?: string;
  edges: readonly number[];
  contents: readonly number[];
  /** Defaults to sqrt(|content|) per bin */
  errors?: readonly number[];
  underflow?: FlowBin;
  overflow?: FlowBin;
  /** Preferred fill colour, a CSS colour or a palette name */
  color?: string;
}

export interface IntegralOptions {
  /** Weight each bin by its width (event-density histograms) */
  width?: boolean;
  includeFlow?: boolean;
}

export interface HistogramJSON {
  kind: 'hist1d';
  name: string;
  title: string;
  type: 'double';
  edges: number[];
  contents: number[];
  errors: number[];
  underflow: FlowBin;
  overflow: FlowBin;
  color?: string;
}

const EDGE_TOLERANCE = 1e-10;
const EMPTY_FLOW: FlowBin = { content: 0, error: 0 };

export class Histogram {
  readonly name: string;
  readonly title: string;
  readonly color?: string;
  readonly underflow: FlowBin;
  readonly overflow: FlowBin;
  private readonly edges: readonly number[];
  private readonly contents: readonly number[];
  private readonly errors: readonly number[];

  constructor(init: HistogramInit) {
    const { name, edges, contents } = init;
    const nBins = edges.length - 1;

    if (nBins < 1) {
      throw new InvalidHistogramError(name, 'at least two bin edges are required');
    }
    for (let i = 0; i < edges.length; i++) {
      if (!Number.isFinite(edges[i])) {
        throw new InvalidHistogramError(name, `bin edge ${i} is not finite`);
      }
      if (i > 0 && edges[i] <= edges[i - 1]) {
        throw new InvalidHistogramError(name, 'bin edges must be strictly increasing');
      }
    }
    if (contents.length !== nBins) {
      throw new InvalidHistogramError(name, `expected ${nBins} bin contents, got ${contents.length}`);
    }

    const errors = init.errors ?? contents.map(c => Math.sqrt(Math.abs(c)));
    if (errors.length !== nBins) {
      throw new InvalidHistogramError(name, `expected ${nBins} bin errors, got ${errors.length}`);
    }
    if (errors.some(e => e < 0)) {
      throw new InvalidHistogramError(name, 'bin errors must be non-negative');
    }

    this.name = name;
    this.title = init.title ?? '';
    this.color = init.color;
    this.edges = Object.freeze([...edges]);
    this.contents = Object.freeze([...contents]);
    this.errors = Object.freeze([...errors]);
    this.underflow = Object.freeze({ ...(init.underflow ?? EMPTY_FLOW) });
    this.overflow = Object.freeze({ ...(init.overflow ?? EMPTY_FLOW) });
  }

  get nBins(): number {
    return this.contents.length;
  }

  get xMin(): number {
    return this.edges[0];
  }

  get xMax(): number {
    return this.edges[this.edges.length - 1];
  }

  getEdges(): readonly number[] {
    return this.edges;
  }

  getContents(): readonly number[] {
    return this.contents;
  }

  getErrors(): readonly number[] {
    return this.errors;
  }

  bin(index: number): Bin {
    if (!Number.isInteger(index) || index < 0 || index >= this.nBins) {
      throw new RangeError(`Bin index ${index} is out of range for histogram "${this.name}" with ${this.nBins} bins`);
    }
    const lowEdge = this.edges[index];
    const width = this.edges[index + 1] - lowEdge;
    return {
      index,
      lowEdge,
      width,
      center: lowEdge + width / 2,
      content: this.contents[index],
      error: this.errors[index]
    };
  }

  bins(): Bin[] {
    return this.contents.map((_, i) => this.bin(i));
  }

  integral(options: IntegralOptions = {}): number {
    const { width = false, includeFlow = true } = options;
    const binWidth = (i: number) => (width ? this.edges[i + 1] - this.edges[i] : 1);

    let total = 0;
    for (let i = 0; i < this.nBins; i++) {
      total += this.contents[i] * binWidth(i);
    }
    if (includeFlow) {
      // Flow accumulators borrow the width of the adjacent bin
      total += this.underflow.content * binWidth(0);
      total += this.overflow.content * binWidth(this.nBins - 1);
    }
    return total;
  }

  maximum(): number {
    return max(this.contents) ?? 0;
  }

  hasSameBinning(other: Histogram): boolean {
    if (other.edges.length !== this.edges.length) return false;
    return this.edges.every((edge, i) => {
      const scale = Math.max(Math.abs(edge), Math.abs(other.edges[i]), 1);
      return Math.abs(edge - other.edges[i]) <= EDGE_TOLERANCE * scale;
    });
  }

  scaled(factor: number): Histogram {
    const scaleFlow = (flow: FlowBin): FlowBin => ({
      content: flow.content * factor,
      error: flow.error * Math.abs(factor)
    });
    return this.derive({
      contents: this.contents.map(c => c * factor),
      errors: this.errors.map(e => e * Math.abs(factor)),
      underflow: scaleFlow(this.underflow),
      overflow: scaleFlow(this.overflow)
    });
  }

  plus(other: Histogram): Histogram {
    return this.combine(other, (a, b) => ({
      content: a.content + b.content,
      error: Math.hypot(a.error, b.error)
    }));
  }

  minus(other: Histogram): Histogram {
    return this.combine(other, (a, b) => ({
      content: a.content - b.content,
      error: Math.hypot(a.error, b.error)
    }));
  }

  /**
   * Bin-wise ratio assuming uncorrelated inputs. A zero denominator gives NaN
   * for that bin rather than an error.
   */
  dividedBy(other: Histogram): Histogram {
    return this.combine(other, (a, b) => {
      if (b.content === 0) {
        return { content: NaN, error: NaN };
      }
      const b2 = b.content * b.content;
      return {
        content: a.content / b.content,
        error: Math.sqrt(a.error * a.error * b2 + b.error * b.error * a.content * a.content) / b2
      };
    });
  }

  withName(name: string): Histogram {
    return this.derive({ name });
  }

  withTitle(title: string): Histogram {
    return this.derive({ title });
  }

  toJSON(): HistogramJSON {
    const json: HistogramJSON = {
      kind: 'hist1d',
      name: this.name,
      title: this.title,
      type: 'double',
      edges: [...this.edges],
      contents: [...this.contents],
      errors: [...this.errors],
      underflow: { ...this.underflow },
      overflow: { ...this.overflow }
    };
    if (this.color !== undefined) {
      json.color = this.color;
    }
    return json;
  }

  private derive(changes: Partial<HistogramInit>): Histogram {
    return new Histogram({
      name: this.name,
      title: this.title,
      color: this.color,
      edges: this.edges,
      contents: this.contents,
      errors: this.errors,
      underflow: this.underflow,
      overflow: this.overflow,
      ...changes
    });
  }

  private combine(other: Histogram, op: (a: FlowBin, b: FlowBin) => FlowBin): Histogram {
    if (!this.hasSameBinning(other)) {
      throw new InconsistentBinningError(this.name, other.name);
    }
    const binned = this.contents.map((content, i) =>
      op({ content, error: this.errors[i] }, { content: other.contents[i], error: other.errors[i] })
    );
    return this.derive({
      contents: binned.map(b => b.content),
      errors: binned.map(b => b.error),
      underflow: op(this.underflow, other.underflow),
      overflow: op(this.overflow, other.overflow)
    });
  }
}
