import { ok, err, type Result } from "neverthrow";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import * as path from "node:path";
import {
  AttributeValidationError,
  DslUsageError,
  DuplicateDeclarationError,
} from "../core/errors.js";
import type { Annotation } from "../facade/annotations.js";
import { Session } from "../facade/session.js";
import { registerAwsResources } from "../resources/aws/index.js";
import {
  type Config,
  type ConfigError,
  DEFAULT_CONFIG_PATH,
  type Env,
  parseConfig,
  readConfig,
} from "./config.js";
import { applyDeclarations, parseDeclarations } from "./declarations.js";

export type SynthOptions = {
  readonly configPath?: string;
  readonly input?: string;
  readonly output?: string;
  readonly env?: Env;
};

export type CliError =
  | { readonly kind: "config"; readonly error: ConfigError }
  | { readonly kind: "input"; readonly message: string }
  | { readonly kind: "io"; readonly message: string };

export type SynthReport = {
  readonly outputPath: string;
  readonly resourceCount: number;
  readonly annotations: readonly Annotation[];
};

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

const isDeclarationError = (e: unknown): e is Error =>
  e instanceof AttributeValidationError ||
  e instanceof DslUsageError ||
  e instanceof DuplicateDeclarationError;

const loadConfig = async (
  options: SynthOptions,
  env: Env,
): Promise<Result<Config, ConfigError>> => {
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  if (options.configPath === undefined && options.input !== undefined && !existsSync(configPath)) {
    return parseConfig({ input: options.input }, env);
  }
  return readConfig(configPath, env);
};

const readInput = async (inputPath: string): Promise<Result<unknown, CliError>> => {
  let text: string;
  try {
    text = await fs.readFile(inputPath, "utf-8");
  } catch (e) {
    return err({ kind: "io", message: `Cannot read ${inputPath}: ${errorMessage(e)}` });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (e) {
    return err({ kind: "input", message: `${inputPath} is not valid JSON: ${errorMessage(e)}` });
  }
};

export const runSynth = async (
  options: SynthOptions = {},
): Promise<Result<SynthReport, CliError>> => {
  const env = options.env ?? process.env;
  const configResult = await loadConfig(options, env);
  if (configResult.isErr()) {
    return err({ kind: "config", error: configResult.error });
  }

  const config = configResult.value;
  const inputPath = options.input ?? config.input;
  const outputPath = options.output ?? config.output;

  const inputResult = await readInput(inputPath);
  if (inputResult.isErr()) {
    return err(inputResult.error);
  }
  const declarations = parseDeclarations(inputResult.value);
  if (declarations.isErr()) {
    return err({ kind: "input", message: declarations.error });
  }

  const session = new Session({
    onDuplicate: config.onDuplicate,
    registry: registerAwsResources(),
  });
  try {
    applyDeclarations(session, declarations.value);
  } catch (e) {
    if (isDeclarationError(e)) {
      return err({ kind: "input", message: e.message });
    }
    throw e;
  }

  const written = await writeOutput(outputPath, session.toJson({ pretty: config.pretty }));
  return written.map(() => ({
    outputPath,
    resourceCount: declarations.value.resources.length,
    annotations: session.annotations,
  }));
};

export const writeOutput = async (
  outputPath: string,
  json: string,
): Promise<Result<void, CliError>> => {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, `${json}\n`);
  } catch (e) {
    return err({ kind: "io", message: `Cannot write ${outputPath}: ${errorMessage(e)}` });
  }
  return ok(undefined);
};

export const formatCliError = (error: CliError): string => {
  switch (error.kind) {
    case "config":
      return `${error.error.field}: ${error.error.message}`;
    case "input":
      return error.message;
    case "io":
      return error.message;
  }
};
