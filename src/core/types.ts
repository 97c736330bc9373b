import type { CargoPprofError } from "./errors.js";

/** One JSON record from `cargo build --message-format=json`. */
export interface BuildEvent {
  reason?: string;
  executable?: string | null;
  [key: string]: unknown;
}

export interface ArtifactPaths {
  capturePath: string;
  tracePath: string;
}

export interface ArtifactNames {
  captureFile: string;
  traceFile: string;
}

export interface PipelineOptions {
  openFirefoxProfiler: boolean;
  ignoreExit: boolean;
  appArgs: string[];
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type RunOutcome =
  | { ok: true; tracePath?: string }
  | { ok: false; error: CargoPprofError; exitCode: 1 };

export interface BuildConfig {
  profile: string;
  extraArgs: string[];
}

export interface RecordConfig {
  perf: string;
  frequency: number;
  captureFile: string;
}

export interface ConvertConfig {
  traceFile: string;
}

export interface ViewerConfig {
  browser: string;
  url: string;
}

export interface CargoPprofConfig {
  build: BuildConfig;
  record: RecordConfig;
  convert: ConvertConfig;
  viewer: ViewerConfig;
  logFile?: string;
}
