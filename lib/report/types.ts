export type SectionKey = string;

export type ConfigurationKey = string;

export type ImplementationName = string;

export type TableSchema = "overview" | "detail";

export interface RunMetadata {
  /** Epoch seconds. */
  runAt: number;
  environment: string;
  cpu: number;
  runtimeVersion: string;
  subjectVersion: string;
}

export interface MetricRecord {
  rps: number;
  mean: number;
  p99: number;
  min: number;
  max: number;
}

export type MetricField = keyof MetricRecord;

export type ImplementationRecords = Record<ImplementationName, MetricRecord>;

export type SectionResults = Record<ConfigurationKey, ImplementationRecords>;

export type ResultTree = Partial<Record<SectionKey, SectionResults>>;

export interface BenchmarkResultsInput {
  run_at: number;
  cpu: number;
  pyver: string;
  veloxloop: string;
  env?: string;
  results: Record<SectionKey, SectionResults>;
}

export interface KeyLayout {
  key: ConfigurationKey;
  label?: string;
}

export interface SectionLayout {
  key: SectionKey;
  title: string;
  description: string;
  keys: KeyLayout[];
}

export interface ReportLayout {
  title: string;
  subject: string;
  runtimeLabel: string;
  implementations: ImplementationName[];
  sections: SectionLayout[];
}

export interface ReportResult {
  markdown: string;
  sha256: string;
  sections: SectionKey[];
}
