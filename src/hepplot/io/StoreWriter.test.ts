import { readFileSync } from "node:fs";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Histogram } from "../histogram/Histogram.ts";
import { type TempDir, createTempDir } from "../testing/stores.ts";
import { loadGroup } from "./HistogramStore.ts";
import { createStore, figureInputsDirectory, writeStore } from "./StoreWriter.ts";

const edges = [0, 5, 10];

describe("StoreWriter", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.remove();
  });

  const observed = new Histogram({ name: 'observed', title: 'Data', edges, contents: [9, 16] });
  const mc = [
    new Histogram({ name: 'zz', title: 'ZZ', edges, contents: [4, 8], color: 'red' }),
    new Histogram({ name: 'wz', title: 'WZ', edges, contents: [3, 5] })
  ];

  it("stores the data histogram under the reserved name", () => {
    const directory = figureInputsDirectory('inputs', 'Mass;m;Events', observed, mc);
    expect(directory.name).toBe('inputs');
    expect(directory.entries.map(e => e.name)).toEqual(['title', 'data', 'zz', 'wz']);
  });

  it("leaves data out when there is none", () => {
    const directory = figureInputsDirectory('inputs', '', undefined, mc);
    expect(directory.entries.map(e => e.name)).toEqual(['title', 'zz', 'wz']);
  });

  it("writes a store that loads back", () => {
    const path = dir.file('inputs.json');
    writeStore(path, createStore([figureInputsDirectory('inputs', 'Mass;m;Events', observed, mc)]));

    const group = loadGroup(path, 'inputs');
    expect(group.rawTitle).toBe('Mass;m;Events');
    expect(group.data.name).toBe('data');
    expect(group.data.title).toBe('Data');
    expect(group.data.getErrors()).toEqual([3, 4]);
    expect(group.mc.map(h => [h.name, h.title, h.color])).toEqual([['zz', 'ZZ', 'red'], ['wz', 'WZ', undefined]]);
  });

  it("writes indented JSON ending in a newline", () => {
    const path = dir.file('empty.json');
    writeStore(path, createStore([]));
    expect(readFileSync(path, 'utf-8')).toBe(
      '{\n  "format": "hepplot-store",\n  "version": 1,\n  "root": {\n    "kind": "directory",\n    "name": "",\n    "entries": []\n  }\n}\n'
    );
  });
});
