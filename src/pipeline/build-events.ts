import { z } from "zod";
import { ProtocolError } from "../core/errors.js";
import type { BuildEvent } from "../core/types.js";

const BuildEventSchema = z
  .object({
    reason: z.string().optional(),
    executable: z.string().nullable().optional(),
  })
  .passthrough();

export interface ExecutableSelection {
  executable: string;
  /** Distinct executables in emission order; more than one means the pick was ambiguous. */
  candidates: string[];
}

export function* splitLines(text: string): Generator<string> {
  let start = 0;
  while (start < text.length) {
    let end = text.indexOf("\n", start);
    if (end === -1) end = text.length;
    const line = text.slice(start, end);
    yield line.endsWith("\r") ? line.slice(0, -1) : line;
    start = end + 1;
  }
}

/**
 * Yields the lines that parse as cargo JSON messages. Anything else (blank
 * lines, plain text a build script printed) is dropped.
 */
export function* parseBuildEvents(lines: Iterable<string>): Generator<BuildEvent> {
  for (const line of lines) {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      continue;
    }
    const result = BuildEventSchema.safeParse(json);
    if (result.success) {
      yield result.data;
    }
  }
}

/**
 * Picks the executable of the last event that names one. An empty string
 * counts as named; path resolution rejects it later.
 */
export function findExecutable(events: Iterable<BuildEvent>): ExecutableSelection {
  let executable: string | null = null;
  const candidates: string[] = [];

  for (const event of events) {
    if (event.executable == null) continue;
    executable = event.executable;
    if (!candidates.includes(executable)) {
      candidates.push(executable);
    }
  }

  if (executable === null) {
    throw new ProtocolError("Could not find executable");
  }
  return { executable, candidates };
}
