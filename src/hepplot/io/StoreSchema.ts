/**
 * Zod schemas for the JSON histogram store
 *
 * A store is a tree of named entries. Array order inside a directory is the
 * declaration order, which decides the order of simulated contributions.
 */
import { z } from "zod";

export const STORE_FORMAT = 'hepplot-store';
export const STORE_VERSION = 1;
export const STORE_EXTENSION = '.json';

/** Bin content types accepted as one-dimensional histograms */
export const NUMERIC_CONTENT_TYPES = ['double', 'float', 'int', 'short', 'char'] as const;

const KNOWN_KINDS = ['directory', 'string', 'hist1d'];

const finiteNumber = z.number().finite();

export const FlowBinSchema = z.object({
  content: finiteNumber,
  error: finiteNumber.min(0),
});

export const Hist1DEntrySchema = z.object({
  kind: z.literal('hist1d'),
  name: z.string().min(1),
  title: z.string().default(''),
  // Non-numeric content types (e.g. "bool") are stored but never plotted
  type: z.string(),
  edges: z.array(finiteNumber).min(2),
  contents: z.array(finiteNumber),
  errors: z.array(finiteNumber.min(0)).optional(),
  underflow: FlowBinSchema.optional(),
  overflow: FlowBinSchema.optional(),
  color: z.string().optional(),
});

export const StringEntrySchema = z.object({
  kind: z.literal('string'),
  name: z.string().min(1),
  value: z.string(),
});

/** Anything else the store may hold (2-D histograms, canvases, legends...) */
export const OpaqueEntrySchema = z
  .object({
    kind: z.string().refine(kind => !KNOWN_KINDS.includes(kind), { message: 'known kind with invalid payload' }),
    name: z.string().min(1),
  })
  .passthrough();

export type Hist1DEntry = z.infer<typeof Hist1DEntrySchema>;
export type StringEntry = z.infer<typeof StringEntrySchema>;
export type OpaqueEntry = z.infer<typeof OpaqueEntrySchema>;

export interface DirectoryEntry {
  kind: 'directory';
  name: string;
  entries: StoreEntry[];
}

export type StoreEntry = DirectoryEntry | Hist1DEntry | StringEntry | OpaqueEntry;

type StoreEntryInput = z.input<typeof Hist1DEntrySchema> | StringEntry | OpaqueEntry | {
  kind: 'directory';
  name: string;
  entries: StoreEntryInput[];
};

export const DirectoryEntrySchema: z.ZodType<DirectoryEntry, z.ZodTypeDef, StoreEntryInput> = z.lazy(() =>
  z.object({
    kind: z.literal('directory'),
    name: z.string(),
    entries: z.array(StoreEntrySchema),
  })
);

export const StoreEntrySchema: z.ZodType<StoreEntry, z.ZodTypeDef, StoreEntryInput> = z.lazy(() =>
  z.union([DirectoryEntrySchema, Hist1DEntrySchema, StringEntrySchema, OpaqueEntrySchema])
);

export const StoreDocumentSchema = z.object({
  format: z.literal(STORE_FORMAT),
  version: z.literal(STORE_VERSION),
  root: DirectoryEntrySchema,
});

export type StoreDocument = z.infer<typeof StoreDocumentSchema>;

export function isDirectory(entry: StoreEntry): entry is DirectoryEntry {
  return entry.kind === 'directory';
}

export function isHist1D(entry: StoreEntry): entry is Hist1DEntry {
  return entry.kind === 'hist1d';
}

export function isNumericHist1D(entry: StoreEntry): entry is Hist1DEntry {
  return isHist1D(entry) && (NUMERIC_CONTENT_TYPES as readonly string[]).includes(entry.type);
}

export function isString(entry: StoreEntry): entry is StringEntry {
  return entry.kind === 'string';
}
