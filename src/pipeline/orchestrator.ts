import fs, { type FileHandle } from "node:fs/promises";
import { EnvironmentError, FilesystemError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type {
  ArtifactPaths,
  CargoPprofConfig,
  PipelineOptions,
  RunOutcome,
} from "../core/types.js";
import type { Reporter } from "../cli/reporter.js";
import { formatCommand, type ProcessRunner, type RunOptions, type RunResult } from "../utils/process.js";
import { findExecutable, parseBuildEvents, splitLines } from "./build-events.js";
import { resolveArtifactPaths } from "./artifacts.js";
import { assertSuccess, resolve } from "./outcome.js";
import { openViewer } from "./viewer.js";

export const CARGO_ENV_VAR = "CARGO";

export interface PipelineDeps {
  run: ProcessRunner;
  env: NodeJS.ProcessEnv;
  config: CargoPprofConfig;
  logger: Logger;
  reporter: Reporter;
}

export interface BuildResult {
  executable: string;
  paths: ArtifactPaths;
}

async function invoke(
  deps: PipelineDeps,
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<RunResult> {
  deps.logger.debug("Spawning", { command: formatCommand(command, args) });
  const result = await deps.run(command, args, options);
  deps.logger.debug("Exited", {
    command,
    code: result.status.code,
    signal: result.status.signal,
  });
  return result;
}

export function cargoPath(env: NodeJS.ProcessEnv): string {
  const value = env[CARGO_ENV_VAR];
  if (!value) {
    throw new EnvironmentError(
      `environment variable ${CARGO_ENV_VAR} not found (run this tool as \`cargo pprof\`)`,
      CARGO_ENV_VAR,
    );
  }
  return value;
}

export async function buildStage(cargo: string, deps: PipelineDeps): Promise<BuildResult> {
  const { build, record, convert } = deps.config;
  deps.reporter.step("Building binary");

  const output = await invoke(
    deps,
    cargo,
    [
      "build",
      "--message-format=json-render-diagnostics",
      `--profile=${build.profile}`,
      ...build.extraArgs,
    ],
    { stdin: "inherit", stdout: "capture", stderr: "inherit" },
  );
  assertSuccess(output.status, "cargo");

  const { executable, candidates } = findExecutable(parseBuildEvents(splitLines(output.stdout)));
  if (candidates.length > 1) {
    deps.logger.debug("Build produced several executables", { candidates });
    deps.reporter.warn(
      `Build produced ${candidates.length} executables; profiling the last one (${executable})`,
    );
  }

  const paths = resolveArtifactPaths(executable, {
    captureFile: record.captureFile,
    traceFile: convert.traceFile,
  });
  deps.reporter.detail(`Binary found: ${executable}`);
  return { executable, paths };
}

export async function captureStage(
  build: BuildResult,
  options: PipelineOptions,
  deps: PipelineDeps,
): Promise<void> {
  const { record } = deps.config;
  deps.reporter.step("Running program with perf");

  const args = [
    "record",
    `--output=${build.paths.capturePath}`,
    "-g",
    "-F",
    String(record.frequency),
    build.executable,
    ...options.appArgs,
  ];
  const { status } = await invoke(deps, record.perf, args);

  if (options.ignoreExit) {
    if (status.code !== 0) {
      deps.logger.info("Ignoring exit status of profiled program", {
        code: status.code,
        signal: status.signal,
      });
    }
    return;
  }
  assertSuccess(status, record.perf);
}

export async function convertStage(paths: ArtifactPaths, deps: PipelineDeps): Promise<void> {
  const { record } = deps.config;
  deps.reporter.step("Converting data to trace format");

  let traceFile: FileHandle;
  try {
    traceFile = await fs.open(paths.tracePath, "w");
  } catch (err) {
    throw new FilesystemError(
      `Could not create ${paths.tracePath}: ${err instanceof Error ? err.message : String(err)}`,
      paths.tracePath,
    );
  }

  let converted: RunResult;
  try {
    converted = await invoke(
      deps,
      record.perf,
      ["script", "-F", "+pid", `--input=${paths.capturePath}`],
      { stdin: "inherit", stdout: { fd: traceFile.fd }, stderr: "inherit" },
    );
  } finally {
    await traceFile.close();
  }
  assertSuccess(converted.status, record.perf);
}

/**
 * Build, record and convert, in that order. The first failing stage ends
 * the run; nothing here exits the process.
 */
export async function runPipeline(options: PipelineOptions, deps: PipelineDeps): Promise<RunOutcome> {
  if (options.openFirefoxProfiler) {
    const opened = await resolve(openViewer(deps.config.viewer, deps.run));
    return opened.ok ? { ok: true } : opened;
  }

  const outcome = await resolve(async () => {
    const cargo = cargoPath(deps.env);
    const build = await buildStage(cargo, deps);
    await captureStage(build, options, deps);
    await convertStage(build.paths, deps);
    return build.paths.tracePath;
  });

  if (!outcome.ok) {
    deps.logger.debug("Pipeline failed", { name: outcome.error.name, message: outcome.error.message });
    return outcome;
  }

  deps.reporter.traceReady(outcome.value, deps.config.viewer.url);
  return { ok: true, tracePath: outcome.value };
}
