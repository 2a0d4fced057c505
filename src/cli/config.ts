import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import * as path from "node:path";

export const DEFAULT_CONFIG_PATH = "terrasynth.json";
export const DEFAULT_OUTPUT = "terrasynth.out/main.tf.json";
export const OUTPUT_ENV = "TERRASYNTH_OUTPUT";

const ConfigSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1).default(DEFAULT_OUTPUT),
  pretty: z.boolean().default(true),
  onDuplicate: z.enum(["overwrite", "error"]).default("overwrite"),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigError = {
  readonly field: string;
  readonly message: string;
};

export type Env = Readonly<Record<string, string | undefined>>;

export const parseConfig = (parsed: unknown, env: Env = {}): Result<Config, ConfigError> => {
  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue !== undefined) {
      return err({ field: issue.path.join(".") || "root", message: issue.message });
    }
    return err({ field: "root", message: "Invalid config" });
  }
  const override = env[OUTPUT_ENV];
  if (override === undefined || override === "") {
    return ok(result.data);
  }
  return ok({ ...result.data, output: override });
};

/** Reads a config file; `input` and `output` are resolved against its directory. */
export const readConfig = async (
  configPath: string,
  env: Env = process.env,
): Promise<Result<Config, ConfigError>> => {
  if (!existsSync(configPath)) {
    return err({ field: "path", message: `Config file not found: ${configPath}` });
  }

  const text = await fs.readFile(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err({ field: "root", message: `Config file is not valid JSON: ${reason}` });
  }

  const base = path.dirname(configPath);
  return parseConfig(parsed, env).map((config) => ({
    ...config,
    input: path.resolve(base, config.input),
    output: path.resolve(base, config.output),
  }));
};
