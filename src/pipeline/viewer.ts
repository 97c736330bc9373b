import type { ViewerConfig } from "../core/types.js";
import type { ProcessRunner } from "../utils/process.js";
import { assertSuccess } from "./outcome.js";

export async function openViewer(viewer: ViewerConfig, run: ProcessRunner): Promise<void> {
  const { status } = await run(viewer.browser, [viewer.url]);
  assertSuccess(status, viewer.browser);
}
