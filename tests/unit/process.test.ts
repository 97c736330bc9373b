import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { formatCommand, isSuccess, runProcess } from "../../src/utils/process.js";
import { LaunchError } from "../../src/core/errors.js";

describe("runProcess", () => {
  it("captures stdout", async () => {
    const res = await runProcess("echo", ["hello"], { stdout: "capture" });
    expect(res.stdout.trim()).toBe("hello");
    expect(res.status).toEqual({ code: 0, signal: null });
  });

  it("captures stderr", async () => {
    const res = await runProcess("node", ["-e", "console.error('err')"], {
      stdout: "ignore",
      stderr: "capture",
    });
    expect(res.stderr.trim()).toBe("err");
    expect(res.stdout).toBe("");
  });

  it("returns a non-zero exit code instead of throwing", async () => {
    const res = await runProcess("node", ["-e", "process.exit(42)"]);
    expect(res.status.code).toBe(42);
    expect(isSuccess(res.status)).toBe(false);
  });

  it("reports the signal of a killed child", async () => {
    const res = await runProcess("node", ["-e", "process.kill(process.pid, 'SIGTERM')"]);
    expect(res.status).toEqual({ code: null, signal: "SIGTERM" });
  });

  it("forwards the argument vector verbatim", async () => {
    const res = await runProcess(
      "node",
      ["-e", "console.log(JSON.stringify(process.argv.slice(1)))", "--", "a b", "--flag", ""],
      { stdout: "capture" },
    );
    expect(JSON.parse(res.stdout)).toEqual(["a b", "--flag", ""]);
  });

  it("rejects with LaunchError when the program does not exist", async () => {
    await expect(runProcess("cargo-pprof-missing-binary", [])).rejects.toThrow(LaunchError);
  });

  describe("file redirection", () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "cargo-pprof-proc-"));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it("writes stdout into an open file", async () => {
      const target = path.join(tmpDir, "out.txt");
      const handle = await fs.open(target, "w");
      try {
        const res = await runProcess("node", ["-e", "process.stdout.write('to file')"], {
          stdout: { fd: handle.fd },
        });
        expect(res.stdout).toBe("");
      } finally {
        await handle.close();
      }

      expect(await fs.readFile(target, "utf-8")).toBe("to file");
    });
  });
});

describe("isSuccess", () => {
  it("is true only for exit code 0", () => {
    expect(isSuccess({ code: 0, signal: null })).toBe(true);
    expect(isSuccess({ code: 1, signal: null })).toBe(false);
    expect(isSuccess({ code: null, signal: "SIGINT" })).toBe(false);
  });
});

describe("formatCommand", () => {
  it("quotes only the parts that need it", () => {
    expect(formatCommand("perf", ["record", "-F", "999", "it's here", "--output=/t/perf.data"])).toBe(
      "perf record -F 999 'it'\\''s here' --output=/t/perf.data",
    );
  });
});
