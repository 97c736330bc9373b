import { Command } from "@commander-js/extra-typings";
import { pprofCommand } from "./commands/pprof.js";
import { configCommand } from "./commands/config.js";

export const program = new Command()
  .name("cargo-pprof")
  .description("Build, profile with perf and convert the capture for the Firefox Profiler")
  .version("0.1.0");

program.addCommand(pprofCommand);
program.addCommand(configCommand);
