import { step, warn, error, highlight, link } from "./formatters.js";

/** User-facing output of a run, kept apart from the JSON log. */
export interface Reporter {
  step(description: string): void;
  detail(message: string): void;
  warn(message: string): void;
  traceReady(tracePath: string, viewerUrl: string): void;
  failure(message: string): void;
}

export const consoleReporter: Reporter = {
  step(description) {
    console.error(`\n${step(description)}`);
  },
  detail(message) {
    console.error(message);
  },
  warn(message) {
    console.error(warn(message));
  },
  traceReady(tracePath, viewerUrl) {
    console.log(`Trace file: ${highlight(tracePath)}`);
    console.log(`This file can be viewed using the Firefox Profiler (${link(viewerUrl)})`);
  },
  failure(message) {
    console.error(error(message));
  },
};
