import type {
  MarkerConfig,
  MeasurementMarkerConfig,
  MetadataKey,
} from "../../core/domain/entities/config.entity.js";

export interface MeasurementMarker {
  regex: RegExp;
  /** Fixed label used when the pattern has no `label` group */
  label?: string;
}

export interface MarkerSet {
  iteration: RegExp | null;
  measurements: MeasurementMarker[];
  population: RegExp | null;
  metadata: Array<{ key: MetadataKey; regex: RegExp }>;
}

/** Column names the CSV writer uses itself. */
export const RESERVED_COLUMNS = new Set([
  "iteration",
  "input_file",
  "total_processing_time",
]);

const METADATA_KEYS: readonly MetadataKey[] = [
  "totalProcessingTime",
  "device",
  "initialStates",
  "outputDir",
];

const DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

export function requiredGroupsFor(marker: Pick<MeasurementMarkerConfig, "label">): string[] {
  return marker.label ? ["value"] : ["label", "value"];
}

/**
 * Compiles validated marker configuration. Patterns are matched per line,
 * so none of them carry the `g` flag.
 */
export function compileMarkers(config: MarkerConfig): MarkerSet {
  const metadata: MarkerSet["metadata"] = [];
  for (const key of METADATA_KEYS) {
    const pattern = config.metadata[key];
    if (pattern) metadata.push({ key, regex: new RegExp(pattern) });
  }
  return {
    iteration: config.iteration ? new RegExp(config.iteration) : null,
    measurements: config.measurements.map((m) => ({
      regex: new RegExp(m.pattern),
      label: m.label,
    })),
    population: config.population ? new RegExp(config.population) : null,
    metadata,
  };
}

/**
 * "processing time" → "processing_time". Labels that collide with a
 * reserved column get a `_value` suffix.
 */
export function toColumnName(label: string): string {
  const name = label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return RESERVED_COLUMNS.has(name) ? `${name}_value` : name;
}

export function isDecimal(text: string): boolean {
  return DECIMAL.test(text) && Number.isFinite(Number(text));
}
