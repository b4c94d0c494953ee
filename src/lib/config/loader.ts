import { Interfaces } from "@oclif/core";
import * as fs from "fs/promises";
import path from "path";
import * as yaml from "yaml";
import { z } from "zod";
import { ConfigurationError } from "$shared/errors";
import { log } from "../log";
import { Config } from "./config";
import { CommandName, commands, definitions, isOption, OptionName, ResolvedCommandConfig } from "./definitions";

export const CONFIG_FILE = "notion-export.yaml";

type Source = Record<string, unknown>;

const record = (value: unknown): value is Source => typeof value === "object" && value !== null && !Array.isArray(value);

const optionsOf = (schema: z.AnyZodObject): OptionName[] => Object.keys(schema.shape).filter(isOption);

/**
 * Options of a command, in declaration order.
 */
export const getCommandOptions = (command: CommandName): OptionName[] => optionsOf(commands[command]);

/**
 * The oclif flags of a command.
 */
export const createCommandFlags = (command: CommandName): Interfaces.FlagInput => {
  const flags: Interfaces.FlagInput = {};
  for (const name of getCommandOptions(command)) {
    flags[name] = definitions[name].flag;
  }
  return flags;
};

/**
 * Read the YAML configuration file of `directory`. A missing file is an empty configuration.
 */
export const readConfigFile = async (directory: string = process.cwd()): Promise<Source> => {
  const file = path.join(directory, CONFIG_FILE);

  let contents: string;
  try {
    contents = await fs.readFile(file, "utf8");
  } catch (error) {
    if (record(error) && error.code === "ENOENT") {
      return {};
    }
    throw new ConfigurationError(`Could not read ${CONFIG_FILE}.`, { file, error });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${CONFIG_FILE}.`, { file, error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!record(parsed)) {
    throw new ConfigurationError(`${CONFIG_FILE} must contain a mapping of option names to values.`, { file });
  }
  return parsed;
};

/**
 * Pick the options of a command out of one configuration source, matching every variant.
 */
const collect = (names: readonly OptionName[], source: Source): Source => {
  const values: Source = {};
  for (const name of names) {
    for (const variant of definitions[name].variants) {
      const value = source[variant];
      if (value !== undefined && value !== "") {
        values[name] = value;
      }
    }
  }
  return values;
};

export interface LoadOptions {
  /** Directory holding the YAML file. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const load = async <S extends z.AnyZodObject>(
  schema: S,
  flags: Source,
  options: LoadOptions
): Promise<Config<z.infer<S>>> => {
  const names = optionsOf(schema);
  const merged = {
    ...collect(names, await readConfigFile(options.cwd)),
    ...collect(names, options.env ?? process.env),
    ...collect(names, flags)
  };

  const result = schema.safeParse(merged);

  if (!result.success) {
    log.error("Configuration validation failed:");
    for (const issue of result.error.issues) {
      log.error(`- ${issue.path.join(".")}: ${issue.message}`);
    }
    throw new ConfigurationError("Configuration validation failed.", { issues: result.error.issues });
  }

  return new Config(result.data);
};

/**
 * Loads, merges, and validates configuration for a specific command from multiple sources.
 *
 * The configuration is loaded from the following sources, with later sources taking precedence:
 * 1. YAML file (`notion-export.yaml`)
 * 2. Environment variables
 * 3. CLI flags
 */
export const loadCommandConfig = <C extends CommandName>(
  command: C,
  flags: Source,
  options: LoadOptions = {}
): Promise<Config<ResolvedCommandConfig<C>>> => load(commands[command], flags, options);
