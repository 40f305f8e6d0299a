import { resolve } from "path";
import { homedir } from "os";
import { existsSync, readFileSync, statSync } from "fs";
import { parse } from "dotenv";
import { ConfigurationError } from "./errors.js";

export const API_KEY_ENV = "APIDANCE_API_KEY";
export const AUTH_TOKEN_ENV = "X_AUTH_TOKEN";

export interface Credentials {
  apiKey: string;
  /** Session token; only create/note/favorite need it */
  authToken?: string;
}

export type CredentialOverrides = Partial<Credentials>;

export interface LoadCredentialsOptions {
  env?: NodeJS.ProcessEnv;
  configPaths?: string[];
  warn?: (message: string) => void;
}

export function defaultConfigPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  return [
    resolve(process.cwd(), ".env"),
    resolve(env.HOME ?? homedir(), ".config/apidance/.env"),
  ];
}

function readConfigFile(path: string, warn: (message: string) => void): Record<string, string> {
  if (!existsSync(path)) return {};

  try {
    const mode = statSync(path).mode;
    if (mode & 0o004) {
      warn(`⚠ ${path} is world-readable. Run: chmod 600 ${path}`);
    }
  } catch (error) {
    warn(`⚠ Could not stat ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parse(readFileSync(path, "utf-8"));
}

function firstDefined(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

/**
 * Resolve credentials with precedence: explicit value → environment → config file.
 * Files are searched in order: ./.env → ~/.config/apidance/.env
 */
export function loadCredentials(
  overrides: CredentialOverrides = {},
  options: LoadCredentialsOptions = {}
): Credentials {
  const env = options.env ?? process.env;
  const warn = options.warn ?? ((message: string) => console.warn(message));

  const files = (options.configPaths ?? defaultConfigPaths(env)).map((path) => readConfigFile(path, warn));
  const fromFiles = (name: string) => firstDefined(...files.map((file) => file[name]));

  const apiKey = firstDefined(overrides.apiKey, env[API_KEY_ENV], fromFiles(API_KEY_ENV));
  const authToken = firstDefined(overrides.authToken, env[AUTH_TOKEN_ENV], fromFiles(AUTH_TOKEN_ENV));

  if (!apiKey) {
    throw new ConfigurationError(
      API_KEY_ENV,
      `Missing credentials: ${API_KEY_ENV}\n` +
      `Pass it explicitly, set it as an environment variable, or put it in .env / ~/.config/apidance/.env`
    );
  }

  return authToken ? { apiKey, authToken } : { apiKey };
}

/** Fail fast for operations that act on behalf of an account */
export function requireAuthToken(credentials: Credentials, operation: string): string {
  if (!credentials.authToken) {
    throw new ConfigurationError(
      AUTH_TOKEN_ENV,
      `${operation} needs a session token. Set ${AUTH_TOKEN_ENV} or pass authToken explicitly.`
    );
  }
  return credentials.authToken;
}
