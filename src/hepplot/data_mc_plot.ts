/**
 * Data/MC figure entry point
 * Usage: tsx data_mc_plot.ts job.json
 *
 * job.json:
 *   {
 *     "source": "inputs.json", "directory": "muon_pt",
 *     "output": ["muon_pt.png", "muon_pt.json"],
 *     "normalize": { "density": false },
 *     "residuals": { "enabled": true, "min": -0.25, "max": 0.28 },
 *     "cmsLabel": "Preliminary", "energyLabel": "13 TeV"
 *   }
 */

import { readFileSync } from "node:fs";
import { isAbsolute, dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { HepPlotError } from "./errors.ts";
import { DataMCFigure } from "./figure/DataMCFigure.ts";
import { createLogger, setLogLevel } from "./logger.ts";

const log = createLogger('cli');

const TickStyleSchema = z.object({
  divisions: z.number().int().positive(),
  residualDivisions: z.number().int().positive(),
  length: z.number().min(0),
  mirrored: z.boolean(),
}).partial();

export const StyleSchema = z.object({
  fontFamily: z.string(),
  baseFontSize: z.number().positive(),
  titleFontSize: z.number().positive(),
  figureTitleFontSize: z.number().positive(),
  legendTextSize: z.number().positive(),
  annotationTextSize: z.number().positive(),
  axisLabelOffset: z.number(),
  titleXOffset: z.number(),
  titleYOffset: z.number(),
  residualsTitleYOffset: z.number(),
  maxAxisDigits: z.number().int().positive(),
  tickStyle: TickStyleSchema,
  markerRadius: z.number().positive(),
  colors: z.array(z.string()).min(1),
  theme: z.enum(['light', 'dark']),
  canvasWidth: z.number().int().positive(),
  canvasHeight: z.number().int().positive(),
  residualsFraction: z.number().gt(0).lt(1),
  margin: z.number().min(0),
  mainPadWidth: z.number().positive(),
  pngScale: z.number().positive(),
}).partial().strict();

export const JobSchema = z.object({
  source: z.string().min(1),
  directory: z.string().default(''),
  output: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  normalize: z.object({ density: z.boolean().default(false) }).optional(),
  residuals: z.object({
    enabled: z.boolean(),
    min: z.number().optional(),
    max: z.number().optional(),
  }).optional(),
  cmsLabel: z.string().optional(),
  energyLabel: z.string().optional(),
  style: StyleSchema.optional(),
  verbose: z.boolean().default(false),
});

export type Job = z.infer<typeof JobSchema>;

export function parseJob(input: unknown): Job {
  const parsed = JobSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid job: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Run a job; relative paths are taken relative to `baseDir`.
 * Returns the written files.
 */
export function runJob(job: Job, baseDir = process.cwd()): string[] {
  const locate = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));

  const figure = DataMCFigure.load(locate(job.source), job.directory, { style: job.style });
  try {
    if (job.normalize) {
      figure.normalizeMCToData(job.normalize.density);
    }
    if (job.residuals) {
      figure.requestResiduals(job.residuals.enabled, job.residuals.min, job.residuals.max);
    }

    figure.draw();
    if (job.cmsLabel !== undefined) {
      figure.addCMSLabel(job.cmsLabel);
    }
    if (job.energyLabel !== undefined) {
      figure.addEnergyLabel(job.energyLabel);
    }

    const outputs = (Array.isArray(job.output) ? job.output : [job.output]).map(locate);
    outputs.forEach(path => figure.print(path));
    return outputs;
  } finally {
    figure.dispose();
  }
}

function main(args: string[]): number {
  const jobPath = args[0];
  if (!jobPath) {
    console.error('Error: No job file provided');
    console.error('Usage: tsx data_mc_plot.ts job.json');
    return 1;
  }

  try {
    const job = parseJob(JSON.parse(readFileSync(jobPath, 'utf-8')));
    if (job.verbose) {
      setLogLevel('debug');
    }
    runJob(job, dirname(resolve(jobPath))).forEach(path => console.log(path));
    return 0;
  } catch (error) {
    if (error instanceof HepPlotError) {
      log.error(`Figure could not be produced [${error.code}]`, error);
    } else {
      log.error('Error generating figure', error);
    }
    return 1;
  }
}

// Main execution
if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  process.exitCode = main(process.argv.slice(2));
}
