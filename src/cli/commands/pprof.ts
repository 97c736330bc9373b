import { Command } from "@commander-js/extra-typings";
import { loadConfig } from "../../core/config.js";
import { Logger } from "../../core/logger.js";
import { getManifestPath } from "../../core/paths.js";
import { addProfilingProfile } from "../../pipeline/manifest.js";
import { runPipeline } from "../../pipeline/orchestrator.js";
import { reportOutcome, toCargoPprofError } from "../../pipeline/outcome.js";
import { runProcess } from "../../utils/process.js";
import { consoleReporter } from "../reporter.js";
import { success, info } from "../formatters.js";

export const pprofCommand = new Command("pprof")
  .description("Profile Rust applications with perf")
  .argument("[args...]", "Arguments that are passed to the profiled application (after --)")
  .option("-a, --add-profile", "Add the profiling profile to Cargo.toml and exit")
  .option("-o, --open-firefox-profiler", "Open the firefox profiler and exit")
  .option("-i, --ignore-exit", "Ignore exit code of the profiled application")
  .option("-c, --config <path>", "Path to cargo-pprof.yaml")
  .option("-v, --verbose", "Print debug logs to stderr")
  .action(async (appArgs, options) => {
    try {
      const config = await loadConfig({ configPath: options.config });
      const logger = Logger.createCliLogger({ verbose: options.verbose, logFile: config.logFile });

      if (options.addProfile) {
        const manifestPath = getManifestPath();
        const result = await addProfilingProfile(manifestPath, config.build.profile);
        if (result === "added") {
          console.log(success(`Added [profile.${config.build.profile}] to ${manifestPath}`));
        } else {
          console.log(info(`[profile.${config.build.profile}] already present in ${manifestPath}`));
        }
        return;
      }

      const outcome = await runPipeline(
        {
          openFirefoxProfiler: options.openFirefoxProfiler ?? false,
          ignoreExit: options.ignoreExit ?? false,
          appArgs,
        },
        { run: runProcess, env: process.env, config, logger, reporter: consoleReporter },
      );
      reportOutcome(outcome, consoleReporter);
      // The outcome is already reported; a lost log line must not change it.
      await logger.flush().catch((err: unknown) => {
        consoleReporter.warn(
          `Could not write log file: ${err instanceof Error ? err.message : String(err)}`,
        );
      });
    } catch (err) {
      reportOutcome({ ok: false, error: toCargoPprofError(err), exitCode: 1 }, consoleReporter);
    }
  });
