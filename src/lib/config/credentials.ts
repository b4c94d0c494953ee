import { parse } from "dotenv";
import * as fs from "fs/promises";
import os from "os";
import path from "path";
import { ConfigurationError } from "$shared/errors";
import { log } from "../log";

export const TOKEN_PREFIXES = ["secret_", "ntn_"];
export const MIN_TOKEN_LENGTH = 20;

/**
 * File holding `NOTION_TOKEN=...` when it is not given any other way.
 */
export const secretFile = (home: string = os.homedir()) => path.join(home, ".ssh", "secret.env");

export const isValidToken = (token: string): boolean =>
  token.length >= MIN_TOKEN_LENGTH && TOKEN_PREFIXES.some((prefix) => token.startsWith(prefix));

const fromSecretFile = async (file: string): Promise<string | undefined> => {
  let contents: string;
  try {
    contents = await fs.readFile(file, "utf8");
  } catch {
    return undefined;
  }

  log.debug(`read token from ${file}`);
  return parse(contents).NOTION_TOKEN;
};

/**
 * Resolve the integration token: the configured one, otherwise `NOTION_TOKEN`
 * from the environment, otherwise from the secret file.
 */
export const resolveToken = async (
  configured: string | undefined,
  options: { env?: NodeJS.ProcessEnv; home?: string } = {}
): Promise<string> => {
  const env = options.env ?? process.env;
  const file = secretFile(options.home);
  const token = configured || env.NOTION_TOKEN || (await fromSecretFile(file));

  if (!token) {
    throw new ConfigurationError(
      `No Notion token found. Pass --token, set NOTION_TOKEN, or add NOTION_TOKEN to ${file}.`
    );
  }

  const trimmed = token.trim();
  if (!isValidToken(trimmed)) {
    throw new ConfigurationError(
      `Invalid Notion token: it must start with ${TOKEN_PREFIXES.join(" or ")} and be at least ${MIN_TOKEN_LENGTH} characters.`
    );
  }

  return trimmed;
};
