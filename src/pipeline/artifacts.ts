import path from "node:path";
import { FilesystemError } from "../core/errors.js";
import type { ArtifactNames, ArtifactPaths } from "../core/types.js";

export const DEFAULT_ARTIFACT_NAMES: ArtifactNames = {
  captureFile: "perf.data",
  traceFile: "perf.trace",
};

/** Directory the executable lives in, or null for a bare file name or a root. */
export function outputDirectory(executable: string): string | null {
  if (executable === "") return null;
  const { root, dir } = path.parse(executable);
  if (dir === "" || executable === root) return null;
  return dir;
}

/** Places the capture and trace files next to the executable. */
export function resolveArtifactPaths(
  executable: string,
  names: ArtifactNames = DEFAULT_ARTIFACT_NAMES,
): ArtifactPaths {
  const dir = outputDirectory(executable);
  if (dir === null) {
    throw new FilesystemError("Could not determine output directory", executable);
  }
  return {
    capturePath: path.join(dir, names.captureFile),
    tracePath: path.join(dir, names.traceFile),
  };
}
