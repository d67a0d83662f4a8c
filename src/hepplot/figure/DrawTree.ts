/**
 * DrawTree - every visual object of a rendered figure, keyed by a stable id
 *
 * The tree is the single owner of the objects: pads list the ids of the
 * primitives drawn in them and the whole tree is released at once.
 */

import type { Histogram } from "../histogram/Histogram.ts";
import type { FigureTitle } from "./FigureTitle.ts";
import type { Box, CanvasSize, PadLayout } from "./Layout.ts";

export interface AxisSpec {
  title: string;
  /** Relative to the pad the axis is drawn in */
  titleSize: number;
  labelSize: number;
  labelOffset: number;
  titleOffset: number;
  divisions: number;
  tickLength: number;
  showLabels: boolean;
  centerTitle: boolean;
}

export interface StackLayer {
  histogram: Histogram;
  color: string;
}

export interface TextSpan {
  text: string;
  bold?: boolean;
  italic?: boolean;
  scale?: number;
}

export type LegendStyle = 'p' | 'f';

export interface LegendEntry {
  target: string;
  label: string;
  style: LegendStyle;
  color: string;
}

export interface CanvasObject {
  kind: 'canvas';
  id: 'canvas';
  size: CanvasSize;
  primitives: string[];
}

export interface PadObject {
  kind: 'pad';
  id: string;
  layout: PadLayout;
  primitives: string[];
  mirroredTicks: boolean;
  horizontalGrid: boolean;
}

export interface StackObject {
  kind: 'stack';
  id: string;
  title: FigureTitle;
  /** Bottom to top */
  layers: StackLayer[];
  minimum: number;
  maximum: number;
  xAxis: AxisSpec;
  yAxis: AxisSpec;
}

export interface PointsObject {
  kind: 'points';
  id: string;
  histogram: Histogram;
  minimum: number;
  maximum: number;
  color: string;
  /** Present when the points own the frame of their pad */
  xAxis?: AxisSpec;
  yAxis?: AxisSpec;
}

export interface LegendObject {
  kind: 'legend';
  id: string;
  box: Box;
  textSize: number;
  entries: LegendEntry[];
}

export interface LabelObject {
  kind: 'label';
  id: string;
  x: number;
  y: number;
  align: 'left' | 'right';
  textSize: number;
  spans: TextSpan[];
}

export type DrawObject = CanvasObject | PadObject | StackObject | PointsObject | LegendObject | LabelObject;
export type DrawObjectKind = DrawObject['kind'];
export type DrawObjectOf<K extends DrawObjectKind> = Extract<DrawObject, { kind: K }>;

export function isKind<K extends DrawObjectKind>(object: DrawObject, kind: K): object is DrawObjectOf<K> {
  return object.kind === kind;
}

export class DrawTree {
  private objects = new Map<string, DrawObject>();
  private released = false;

  constructor(size: CanvasSize) {
    this.objects.set('canvas', { kind: 'canvas', id: 'canvas', size, primitives: [] });
  }

  get canvas(): CanvasObject {
    return this.require('canvas', 'canvas');
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Register an object and append it to the primitives of `parent` */
  add<T extends DrawObject>(object: T, parent = 'canvas'): T {
    this.assertLive();
    if (this.objects.has(object.id)) {
      throw new Error(`Draw tree already holds an object "${object.id}"`);
    }
    const container = this.objects.get(parent);
    if (!container || (container.kind !== 'canvas' && container.kind !== 'pad')) {
      throw new Error(`"${parent}" is not a canvas or pad`);
    }
    container.primitives.push(object.id);
    this.objects.set(object.id, object);
    return object;
  }

  get(id: string): DrawObject | undefined {
    return this.objects.get(id);
  }

  find<K extends DrawObjectKind>(id: string, kind: K): DrawObjectOf<K> | undefined {
    const object = this.objects.get(id);
    return object && isKind(object, kind) ? object : undefined;
  }

  require<K extends DrawObjectKind>(id: string, kind: K): DrawObjectOf<K> {
    const object = this.find(id, kind);
    if (!object) {
      throw new Error(`Draw tree has no ${kind} "${id}"`);
    }
    return object;
  }

  /** Objects drawn directly in `parent`, in drawing order */
  children(parent: string): DrawObject[] {
    const container = this.objects.get(parent);
    if (!container || (container.kind !== 'canvas' && container.kind !== 'pad')) {
      return [];
    }
    return container.primitives.flatMap(id => {
      const child = this.objects.get(id);
      return child ? [child] : [];
    });
  }

  /** `base` if unused, otherwise `base-2`, `base-3`... */
  uniqueId(base: string): string {
    if (!this.objects.has(base)) return base;
    let n = 2;
    while (this.objects.has(`${base}-${n}`)) n++;
    return `${base}-${n}`;
  }

  ids(): string[] {
    return [...this.objects.keys()];
  }

  get size(): number {
    return this.objects.size;
  }

  release(): void {
    this.objects.clear();
    this.released = true;
  }

  toJSON(): { size: CanvasSize; objects: DrawObject[] } {
    return { size: this.canvas.size, objects: [...this.objects.values()] };
  }

  private assertLive(): void {
    if (this.released) {
      throw new Error('Draw tree has been released');
    }
  }
}
