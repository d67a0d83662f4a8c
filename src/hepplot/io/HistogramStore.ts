/**
 * HistogramStore - reads the inputs of a data/MC figure from a JSON store
 */

import { readFileSync } from "node:fs";
import {
  GroupNotFoundError,
  InvalidHistogramError,
  MissingDataHistogramError,
  NoSimulationFoundError,
  SourceUnavailableError
} from "../errors.ts";
import { type FigureTitle, parseFigureTitle } from "../figure/FigureTitle.ts";
import { Histogram } from "../histogram/Histogram.ts";
import { createLogger } from "../logger.ts";
import {
  type DirectoryEntry,
  type Hist1DEntry,
  type StoreDocument,
  StoreDocumentSchema,
  isDirectory,
  isNumericHist1D,
  isString
} from "./StoreSchema.ts";

const log = createLogger('store');

/** Entry names that never become simulated contributions */
export const RESERVED_NAMES: readonly string[] = ['data', 'syst_up', 'syst_down'];

export interface LoadedGroup {
  rawTitle: string;
  title: FigureTitle;
  data: Histogram;
  mc: Histogram[];
}

export function readStore(path: string): StoreDocument {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new SourceUnavailableError(path, 'file cannot be read', error);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SourceUnavailableError(path, 'content is not valid JSON', error);
  }

  const parsed = StoreDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SourceUnavailableError(path, `${issue.message}${where}`, parsed.error);
  }
  return parsed.data;
}

export function resolveGroup(root: DirectoryEntry, group: string): DirectoryEntry | undefined {
  let current: DirectoryEntry = root;
  for (const segment of group.split('/').filter(s => s.length > 0)) {
    const next = current.entries.find(e => e.name === segment && isDirectory(e));
    if (!next || !isDirectory(next)) {
      return undefined;
    }
    current = next;
  }
  return current;
}

export function histogramFromEntry(entry: Hist1DEntry): Histogram {
  return new Histogram({
    name: entry.name,
    title: entry.title,
    edges: entry.edges,
    contents: entry.contents,
    errors: entry.errors,
    underflow: entry.underflow,
    overflow: entry.overflow,
    color: entry.color
  });
}

/**
 * Load the title, the data histogram and every simulated histogram of one
 * directory. Returned histograms are built from copies of the parsed values.
 */
export function loadGroup(path: string, group = ''): LoadedGroup {
  const document = readStore(path);

  const directory = resolveGroup(document.root, group);
  if (!directory) {
    throw new GroupNotFoundError(path, group);
  }

  const titleEntry = directory.entries.find(e => e.name === 'title');
  const rawTitle = titleEntry && isString(titleEntry) ? titleEntry.value : '';

  const dataEntry = directory.entries.find(e => e.name === 'data');
  if (!dataEntry || !isNumericHist1D(dataEntry)) {
    throw new MissingDataHistogramError(path, group);
  }
  const build = (entry: Hist1DEntry): Histogram => {
    try {
      return histogramFromEntry(entry);
    } catch (error) {
      if (error instanceof InvalidHistogramError) {
        throw new SourceUnavailableError(path, error.message, error);
      }
      throw error;
    }
  };
  const data = build(dataEntry);

  const mc: Histogram[] = [];
  for (const entry of directory.entries) {
    if (!isNumericHist1D(entry)) continue;
    if (RESERVED_NAMES.includes(entry.name)) continue;
    mc.push(build(entry));
  }

  if (mc.length === 0) {
    throw new NoSimulationFoundError(path, group);
  }

  log.debug(`Loaded "${path}" [${group}]: data with ${data.nBins} bins, MC ${mc.map(h => h.name).join(', ')}`);

  return { rawTitle, title: parseFigureTitle(rawTitle), data, mc };
}
