import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { defaultConfig, loadConfig, parseConfig, validateConfig } from "../../src/core/config.js";
import { ConfigError } from "../../src/core/errors.js";

describe("config", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "cargo-pprof-config-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("falls back to defaults when no config file exists", async () => {
    const config = await loadConfig({ base: tmpDir });

    expect(config).toEqual({
      build: { profile: "profiling", extraArgs: [] },
      record: { perf: "perf", frequency: 999, captureFile: "perf.data" },
      convert: { traceFile: "perf.trace" },
      viewer: { browser: "firefox", url: "https://profiler.firefox.com" },
      logFile: undefined,
    });
  });

  it("loads overrides from cargo-pprof.yaml", async () => {
    const yaml = `
build:
  profile: bench-prof
  extra_args: ["--bin", "server"]
record:
  frequency: 4000
viewer:
  browser: chromium
log_file: /tmp/cargo-pprof.log
`;
    await fs.writeFile(path.join(tmpDir, "cargo-pprof.yaml"), yaml);

    const config = await loadConfig({ base: tmpDir });

    expect(config.build).toEqual({ profile: "bench-prof", extraArgs: ["--bin", "server"] });
    expect(config.record).toEqual({
      perf: "perf",
      frequency: 4000,
      captureFile: "perf.data",
    });
    expect(config.viewer.browser).toBe("chromium");
    expect(config.viewer.url).toBe("https://profiler.firefox.com");
    expect(config.logFile).toBe("/tmp/cargo-pprof.log");
  });

  it("treats an empty file as all defaults", () => {
    expect(parseConfig("", "cargo-pprof.yaml")).toEqual(defaultConfig());
  });

  it("requires an explicitly named file to exist", async () => {
    const missing = path.join(tmpDir, "other.yaml");

    await expect(loadConfig({ configPath: missing })).rejects.toThrow(
      `Config file not found: ${missing}`,
    );
  });

  it("rejects invalid YAML", () => {
    expect(() => parseConfig("build: [unclosed", "x.yaml")).toThrow(ConfigError);
    expect(() => parseConfig("build: [unclosed", "x.yaml")).toThrow("Invalid YAML in x.yaml");
  });

  it("lists every schema violation", () => {
    const yaml = `
record:
  frequency: -5
convert:
  trace_file: out/perf.trace
`;
    let message = "";
    try {
      parseConfig(yaml, "x.yaml");
    } catch (err) {
      message = err instanceof Error ? err.message : "";
    }

    expect(message).toContain("Invalid config in x.yaml:");
    expect(message).toContain("  - record.frequency:");
    expect(message).toContain("  - convert.trace_file: trace_file must be a plain file name");
  });

  it("rejects a trace file that would overwrite the capture", () => {
    const yaml = "record:\n  capture_file: perf.out\nconvert:\n  trace_file: perf.out\n";

    expect(() => parseConfig(yaml, "x.yaml")).toThrow(ConfigError);
    expect(() => parseConfig(yaml, "x.yaml")).toThrow(
      "  - convert.trace_file: trace_file must differ from record.capture_file",
    );
  });

  it("rejects a call_graph key", () => {
    expect(() => parseConfig("record:\n  call_graph: false\n", "x.yaml")).toThrow(ConfigError);
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("record:\n  freq: 10\n", "x.yaml")).toThrow(ConfigError);
  });

  it("rejects profile names cargo would not accept", () => {
    expect(() => parseConfig("build:\n  profile: 'my profile'\n", "x.yaml")).toThrow(
      "profile must be a cargo profile name",
    );
  });

  it("validateConfig reports errors instead of throwing", async () => {
    await fs.writeFile(path.join(tmpDir, "bad.yaml"), "viewer:\n  url: not-a-url\n");

    const result = await validateConfig({ configPath: path.join(tmpDir, "bad.yaml") });

    expect(result.valid).toBe(false);
    expect(result.error).toContain("viewer.url");
  });

  it("validateConfig returns the parsed config when valid", async () => {
    const result = await validateConfig({ base: tmpDir });

    expect(result.valid).toBe(true);
    expect(result.config?.record.frequency).toBe(999);
  });
});
