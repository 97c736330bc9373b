import fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { getConfigPath } from "./paths.js";
import { ConfigError } from "./errors.js";
import type { CargoPprofConfig } from "./types.js";

const FILE_NAME_PATTERN = /^[^/\\]+$/;

const BuildSchema = z
  .object({
    profile: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "profile must be a cargo profile name")
      .default("profiling"),
    extra_args: z.array(z.string()).default([]),
  })
  .strict()
  .default({ profile: "profiling", extra_args: [] });

const RecordSchema = z
  .object({
    perf: z.string().min(1).default("perf"),
    frequency: z.number().int().positive().default(999),
    capture_file: z
      .string()
      .regex(FILE_NAME_PATTERN, "capture_file must be a plain file name")
      .default("perf.data"),
  })
  .strict()
  .default({
    perf: "perf",
    frequency: 999,
    capture_file: "perf.data",
  });

const ConvertSchema = z
  .object({
    trace_file: z
      .string()
      .regex(FILE_NAME_PATTERN, "trace_file must be a plain file name")
      .default("perf.trace"),
  })
  .strict()
  .default({ trace_file: "perf.trace" });

const ViewerSchema = z
  .object({
    browser: z.string().min(1).default("firefox"),
    url: z.string().url().default("https://profiler.firefox.com"),
  })
  .strict()
  .default({ browser: "firefox", url: "https://profiler.firefox.com" });

const ConfigSchema = z
  .object({
    build: BuildSchema,
    record: RecordSchema,
    convert: ConvertSchema,
    viewer: ViewerSchema,
    log_file: z.string().min(1).nullable().optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    // The trace file is truncated before perf script reads the capture.
    if (config.record.capture_file === config.convert.trace_file) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["convert", "trace_file"],
        message: "trace_file must differ from record.capture_file",
      });
    }
  });

type RawConfig = z.infer<typeof ConfigSchema>;

function mapConfig(raw: RawConfig): CargoPprofConfig {
  return {
    build: {
      profile: raw.build.profile,
      extraArgs: raw.build.extra_args,
    },
    record: {
      perf: raw.record.perf,
      frequency: raw.record.frequency,
      captureFile: raw.record.capture_file,
    },
    convert: {
      traceFile: raw.convert.trace_file,
    },
    viewer: {
      browser: raw.viewer.browser,
      url: raw.viewer.url,
    },
    logFile: raw.log_file ?? undefined,
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function defaultConfig(): CargoPprofConfig {
  return mapConfig(ConfigSchema.parse({}));
}

export function parseConfig(content: string, source: string): CargoPprofConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  // An empty document parses to null; treat it like an empty mapping.
  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${source}:\n${issues}`);
  }

  return mapConfig(result.data);
}

/**
 * Loads `cargo-pprof.yaml`. Without an explicit path a missing file means
 * "use the defaults"; a path given on the command line must exist.
 */
export async function loadConfig(options: {
  base?: string;
  configPath?: string;
} = {}): Promise<CargoPprofConfig> {
  const configPath = options.configPath ?? getConfigPath(options.base);
  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (!options.configPath && isMissingFile(err)) {
      return defaultConfig();
    }
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  return parseConfig(content, configPath);
}

export async function validateConfig(options: {
  base?: string;
  configPath?: string;
} = {}): Promise<{ valid: boolean; config?: CargoPprofConfig; error?: string }> {
  try {
    const config = await loadConfig(options);
    return { valid: true, config };
  } catch (err) {
    return {
      valid: false,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}
