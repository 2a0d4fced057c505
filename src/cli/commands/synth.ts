import { command } from "cleye";
import { formatAnnotation } from "../../facade/annotations.js";
import { formatCliError, runSynth } from "../synth.js";

export const synthCommand = command(
  {
    name: "synth",
    alias: "synthesize",
    help: {
      description: "Synthesize a declarations file into Terraform JSON",
    },
    flags: {
      config: {
        type: String,
        description: "Config file path (default: terrasynth.json)",
      },
      input: {
        type: String,
        description: "Declarations file to synthesize",
      },
      output: {
        type: String,
        description: "Output file (default: terrasynth.out/main.tf.json)",
      },
    },
  },
  async (argv) => {
    const result = await runSynth({
      configPath: argv.flags.config,
      input: argv.flags.input,
      output: argv.flags.output,
    });

    if (result.isErr()) {
      console.error(`Error: ${formatCliError(result.error)}`);
      process.exitCode = 1;
      return;
    }

    const report = result.value;
    for (const annotation of report.annotations) {
      console.warn(formatAnnotation(annotation));
    }
    console.log(`Synthesized ${report.resourceCount} resource(s) to ${report.outputPath}`);
  },
);
