import { describe, it, expect } from "vitest";
import { DEFAULT_STYLE } from "./FigureStyle.ts";
import { type LabelObject, type PadObject, DrawTree } from "./DrawTree.ts";
import { computeLayout } from "./Layout.ts";

const layout = computeLayout({ residuals: false, legendEntries: 1, style: DEFAULT_STYLE });

function pad(id: string): PadObject {
  return { kind: 'pad', id, layout: layout.mainPad, primitives: [], mirroredTicks: true, horizontalGrid: false };
}

function label(id: string): LabelObject {
  return { kind: 'label', id, x: 0, y: 0, align: 'left', textSize: 0.04, spans: [{ text: id }] };
}

describe("DrawTree", () => {
  it("starts with the canvas only", () => {
    const tree = new DrawTree(layout.canvas);
    expect(tree.size).toBe(1);
    expect(tree.canvas.size).toEqual({ width: 1500, height: 1000 });
  });

  it("keeps children in drawing order", () => {
    const tree = new DrawTree(layout.canvas);
    tree.add(pad('mainPad'));
    tree.add(label('first'), 'mainPad');
    tree.add(label('second'), 'mainPad');

    expect(tree.children('canvas').map(o => o.id)).toEqual(['mainPad']);
    expect(tree.children('mainPad').map(o => o.id)).toEqual(['first', 'second']);
    expect(tree.ids()).toEqual(['canvas', 'mainPad', 'first', 'second']);
  });

  it("finds objects by id and kind", () => {
    const tree = new DrawTree(layout.canvas);
    tree.add(pad('mainPad'));
    expect(tree.find('mainPad', 'pad')?.id).toBe('mainPad');
    expect(tree.find('mainPad', 'label')).toBeUndefined();
    expect(() => tree.require('mainPad', 'legend')).toThrow('Draw tree has no legend "mainPad"');
  });

  it("rejects duplicate ids and non-container parents", () => {
    const tree = new DrawTree(layout.canvas);
    tree.add(label('cms'));
    expect(() => tree.add(label('cms'))).toThrow('Draw tree already holds an object "cms"');
    expect(() => tree.add(label('other'), 'cms')).toThrow('"cms" is not a canvas or pad');
  });

  it("suffixes ids already in use", () => {
    const tree = new DrawTree(layout.canvas);
    expect(tree.uniqueId('cmsLabel')).toBe('cmsLabel');
    tree.add(label('cmsLabel'));
    expect(tree.uniqueId('cmsLabel')).toBe('cmsLabel-2');
    tree.add(label('cmsLabel-2'));
    expect(tree.uniqueId('cmsLabel')).toBe('cmsLabel-3');
  });

  it("gives nothing back once released", () => {
    const tree = new DrawTree(layout.canvas);
    tree.add(pad('mainPad'));
    tree.release();

    expect(tree.isReleased).toBe(true);
    expect(tree.size).toBe(0);
    expect(tree.get('mainPad')).toBeUndefined();
    expect(() => tree.add(label('late'))).toThrow('Draw tree has been released');
  });

  it("serializes its objects", () => {
    const tree = new DrawTree(layout.canvas);
    tree.add(label('cms'));
    const json = tree.toJSON();
    expect(json.size).toEqual({ width: 1500, height: 1000 });
    expect(json.objects.map(o => o.kind)).toEqual(['canvas', 'label']);
  });
});
