/**
 * StoreWriter - serializes histograms and rendered figures as a JSON store
 */

import { writeFileSync } from "node:fs";
import type { Histogram } from "../histogram/Histogram.ts";
import {
  type DirectoryEntry,
  type StoreDocument,
  type StoreEntry,
  STORE_FORMAT,
  STORE_VERSION
} from "./StoreSchema.ts";

export function histogramEntry(histogram: Histogram): StoreEntry {
  return histogram.toJSON();
}

export function directoryEntry(name: string, entries: StoreEntry[]): DirectoryEntry {
  return { kind: 'directory', name, entries };
}

/** A directory holding exactly what `loadGroup` expects */
export function figureInputsDirectory(name: string, rawTitle: string, data: Histogram | undefined, mc: readonly Histogram[]): DirectoryEntry {
  const entries: StoreEntry[] = [{ kind: 'string', name: 'title', value: rawTitle }];
  if (data) {
    entries.push(histogramEntry(data.withName('data')));
  }
  mc.forEach(h => entries.push(histogramEntry(h)));
  return directoryEntry(name, entries);
}

export function createStore(entries: StoreEntry[]): StoreDocument {
  return {
    format: STORE_FORMAT,
    version: STORE_VERSION,
    root: directoryEntry('', entries)
  };
}

export function writeStore(path: string, document: StoreDocument): void {
  writeFileSync(path, JSON.stringify(document, null, 2) + '\n', 'utf-8');
}
