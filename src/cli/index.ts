import { cli } from "cleye";
import { synthCommand } from "./commands/synth.js";

export const VERSION = "0.1.0";

export const run = (argv: readonly string[] = process.argv.slice(2)) =>
  cli(
    {
      name: "terrasynth",
      version: VERSION,
      commands: [synthCommand],
    },
    undefined,
    [...argv],
  );
