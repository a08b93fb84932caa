export type MetadataKey =
  | "totalProcessingTime"
  | "device"
  | "initialStates"
  | "outputDir";

export interface MeasurementMarkerConfig {
  /** Regular expression with a `value` group and, unless `label` is set, a `label` group. */
  pattern: string;
  label?: string;
}

export interface MarkerConfig {
  /** Iteration boundary pattern; null disables explicit boundaries. */
  iteration: string | null;
  measurements: MeasurementMarkerConfig[];
  /** Agent population counts; `label` and `value` groups, last value per label wins. */
  population: string | null;
  metadata: Record<MetadataKey, string | null>;
}

export interface LogConfig {
  /** A log must contain a line starting with this text to be accepted. */
  signature?: string;
}

export interface OutputConfig {
  includeMetadata: boolean;
  extension: string;
}

export interface Config {
  log: LogConfig;
  markers: MarkerConfig;
  output: OutputConfig;
}
