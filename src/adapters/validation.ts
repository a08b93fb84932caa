import { z } from "zod";
import { requiredGroupsFor } from "../infrastructure/utils/marker.utils.js";

/**
 * Validation schema for the YAML configuration file.
 * Missing sections fall back to the FLAME GPU console-mode vocabulary.
 */

export const DEFAULT_ITERATION_PATTERN = String.raw`^Processing Simulation Step (?<index>\d+)`;

export const DEFAULT_MEASUREMENT_PATTERN = String.raw`^Instrumentation: (?<label>.+?) = (?<value>\S+?)(?: \(ms\))?$`;

export const DEFAULT_POPULATION_PATTERN = String.raw`^agent_(?<label>.+)_count: (?<value>\d+)$`;

export const DEFAULT_METADATA_PATTERNS = {
  totalProcessingTime: String.raw`^Total Processing time: (?<value>\S+?)(?: \(ms\))?$`,
  device: String.raw`^Device (?<value>.+)$`,
  initialStates: String.raw`^Initial states: (?<value>.+)$`,
  outputDir: String.raw`^Output dir: (?<value>.+)$`,
};

function checkPattern(
  pattern: string,
  groups: string[],
  ctx: z.RefinementCtx,
  path: (string | number)[] = [],
): void {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (e) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path,
      message: e instanceof Error ? e.message : "Invalid regular expression",
    });
    return;
  }
  for (const group of groups) {
    if (!regex.source.includes(`(?<${group}>`)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path,
        message: `Pattern must declare a named group "${group}"`,
      });
    }
  }
}

const Pattern = (groups: string[]) =>
  z
    .string()
    .min(1)
    .superRefine((pattern, ctx) => checkPattern(pattern, groups, ctx));

export const MeasurementMarkerSchema = z
  .object({
    pattern: z.string().min(1, "pattern is required"),
    label: z.string().min(1).optional(),
  })
  .superRefine((marker, ctx) =>
    checkPattern(marker.pattern, requiredGroupsFor(marker), ctx, ["pattern"]),
  );

export const ConfigSchema = z.object({
  log: z
    .object({
      signature: z.string().min(1).optional(),
    })
    .default({}),
  markers: z
    .object({
      iteration: Pattern([]).nullable().default(DEFAULT_ITERATION_PATTERN),
      measurements: z
        .array(MeasurementMarkerSchema)
        .min(1, "At least one measurement marker is required")
        .default([{ pattern: DEFAULT_MEASUREMENT_PATTERN }]),
      population: Pattern(["label", "value"])
        .nullable()
        .default(DEFAULT_POPULATION_PATTERN),
      metadata: z
        .object({
          totalProcessingTime: Pattern(["value"])
            .nullable()
            .default(DEFAULT_METADATA_PATTERNS.totalProcessingTime),
          device: Pattern(["value"])
            .nullable()
            .default(DEFAULT_METADATA_PATTERNS.device),
          initialStates: Pattern(["value"])
            .nullable()
            .default(DEFAULT_METADATA_PATTERNS.initialStates),
          outputDir: Pattern(["value"])
            .nullable()
            .default(DEFAULT_METADATA_PATTERNS.outputDir),
        })
        .default({}),
    })
    .default({}),
  output: z
    .object({
      includeMetadata: z.boolean().default(false),
      extension: z
        .string()
        .regex(/^\.[A-Za-z0-9]+$/, "extension must look like .csv")
        .default(".csv"),
    })
    .default({}),
});

export type ConfigInput = z.input<typeof ConfigSchema>;
