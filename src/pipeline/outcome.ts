import { CargoPprofError, SubprocessError } from "../core/errors.js";
import type { ExitStatus, RunOutcome } from "../core/types.js";
import { isSuccess } from "../utils/process.js";

export type Resolved<T> =
  | { ok: true; value: T }
  | { ok: false; error: CargoPprofError; exitCode: 1 };

export function toCargoPprofError(err: unknown): CargoPprofError {
  if (err instanceof CargoPprofError) return err;
  return new CargoPprofError(err instanceof Error ? err.message : String(err));
}

/**
 * Settles `work` into a value or a failure. Every failure maps to exit
 * code 1, whatever the cause.
 */
export async function resolve<T>(work: Promise<T> | (() => Promise<T>)): Promise<Resolved<T>> {
  try {
    const value = await (typeof work === "function" ? work() : work);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: toCargoPprofError(err), exitCode: 1 };
  }
}

/**
 * Throws a {@link SubprocessError} unless `status` is a zero exit. The
 * child's own code only appears in the message.
 */
export function assertSuccess(status: ExitStatus, tool: string): void {
  if (isSuccess(status)) return;

  if (status.code !== null) {
    throw new SubprocessError(
      `${tool} returned with exit code ${status.code}`,
      tool,
      status.code,
      status.signal,
    );
  }

  const suffix = status.signal ? ` (terminated by ${status.signal})` : "";
  throw new SubprocessError(`${tool} returned with an error${suffix}`, tool, null, status.signal);
}

export interface OutcomeSink {
  failure(message: string): void;
}

/** The one place a run's outcome becomes the process exit code. */
export function reportOutcome(outcome: RunOutcome, sink: OutcomeSink): number {
  const exitCode = outcome.ok ? 0 : outcome.exitCode;
  if (!outcome.ok) {
    sink.failure(outcome.error.message);
  }
  process.exitCode = exitCode;
  return exitCode;
}
