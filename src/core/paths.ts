import path from "node:path";

export const CONFIG_FILE_NAME = "cargo-pprof.yaml";
export const MANIFEST_FILE_NAME = "Cargo.toml";

export function getConfigPath(base: string = process.cwd()): string {
  return path.resolve(base, CONFIG_FILE_NAME);
}

export function getManifestPath(base: string = process.cwd()): string {
  return path.resolve(base, MANIFEST_FILE_NAME);
}
