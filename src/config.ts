import { promises as fs } from "node:fs";
import path from "node:path";

import dotenv from "dotenv";

import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "drive_config.json";
export const DEFAULT_CREDENTIALS_FILE = "credentials.json";
export const DEFAULT_TOKEN_FILE = "token_drive.json";
export const DEFAULT_BATCH_FOLDER_NAME = "Copied Folders";
// Drive's alias for the signed-in user's My Drive.
export const DRIVE_ROOT_ALIAS = "root";

const KNOWN_KEYS = new Set([
  "FOLDERS_TO_COPY",
  "SOURCE_PARENT_FOLDER_ID",
  "DESTINATION_PARENT_FOLDER_ID",
  "NEW_BATCH_FOLDER_NAME",
]);

export interface BatchConfig {
  folderNames: string[];
  sourceParentId: string;
  /** Every parent receives its own batch folder. */
  destinationParentIds: string[];
  batchFolderName: string;
}

export interface DuplicateConfig extends RuntimeSettings {
  /** Null when no config file exists (single-folder runs need none). */
  batch: BatchConfig | null;
  warnings: string[];
}

export interface ConfigValidationResult {
  ok: boolean;
  errors: string[];
  warnings: string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isObject(raw)) {
    return { ok: false, errors: ["config root must be an object"], warnings };
  }

  const names = raw.FOLDERS_TO_COPY;
  if (!Array.isArray(names) || names.length === 0) {
    errors.push("FOLDERS_TO_COPY must be a non-empty array of folder names");
  } else {
    const seen = new Set<string>();
    names.forEach((name: unknown, index) => {
      if (!isNonEmptyString(name)) {
        errors.push(`FOLDERS_TO_COPY[${index}] must be a non-empty string`);
        return;
      }
      if (seen.has(name)) warnings.push(`FOLDERS_TO_COPY lists "${name}" more than once`);
      seen.add(name);
    });
  }

  if (!isNonEmptyString(raw.SOURCE_PARENT_FOLDER_ID)) {
    errors.push("SOURCE_PARENT_FOLDER_ID must be a non-empty string");
  }
  const destination = raw.DESTINATION_PARENT_FOLDER_ID;
  if (Array.isArray(destination)) {
    if (destination.length === 0 || !destination.every(isNonEmptyString)) {
      errors.push("DESTINATION_PARENT_FOLDER_ID must list at least one non-empty folder id");
    }
  } else if (destination !== undefined && !isNonEmptyString(destination)) {
    errors.push("DESTINATION_PARENT_FOLDER_ID must be a non-empty string or an array of them when set");
  }
  if (raw.NEW_BATCH_FOLDER_NAME !== undefined && !isNonEmptyString(raw.NEW_BATCH_FOLDER_NAME)) {
    errors.push("NEW_BATCH_FOLDER_NAME must be a non-empty string when set");
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) warnings.push(`unknown key: ${key}`);
  }

  return { ok: errors.length === 0, errors, warnings };
}

function destinationList(value: unknown): string[] {
  if (Array.isArray(value)) {
    const ids = value.filter(isNonEmptyString);
    return ids.length > 0 ? Array.from(new Set(ids)) : [DRIVE_ROOT_ALIAS];
  }
  return isNonEmptyString(value) ? [value] : [DRIVE_ROOT_ALIAS];
}

function toBatchConfig(raw: Record<string, unknown>): BatchConfig {
  const names = Array.isArray(raw.FOLDERS_TO_COPY) ? raw.FOLDERS_TO_COPY.filter(isNonEmptyString) : [];
  return {
    folderNames: Array.from(new Set(names)),
    sourceParentId: isNonEmptyString(raw.SOURCE_PARENT_FOLDER_ID) ? raw.SOURCE_PARENT_FOLDER_ID : "",
    destinationParentIds: destinationList(raw.DESTINATION_PARENT_FOLDER_ID),
    batchFolderName: isNonEmptyString(raw.NEW_BATCH_FOLDER_NAME)
      ? raw.NEW_BATCH_FOLDER_NAME
      : DEFAULT_BATCH_FOLDER_NAME,
  };
}

/** Read and validate a config file. `exists` is false when there is no file at all. */
export async function readConfigFile(
  configPath: string,
): Promise<ConfigValidationResult & { exists: boolean; batch: BatchConfig | null }> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch {
    return { ok: false, exists: false, errors: [`config file not found: ${configPath}`], warnings: [], batch: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text) as unknown;
  } catch (error) {
    return { ok: false, exists: true, errors: [`config read/parse failed: ${String(error)}`], warnings: [], batch: null };
  }

  const result = validateConfig(raw);
  return {
    ...result,
    exists: true,
    batch: result.ok && isObject(raw) ? toBatchConfig(raw) : null,
  };
}

async function readDotenv(cwd: string): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await fs.readFile(path.join(cwd, ".env"), "utf8"));
  } catch {
    return {};
  }
}

function parseCount(value: string | undefined, fallback: number, name: string, min: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${name} must be an integer >= ${String(min)}, got "${value}"`);
  }
  return parsed;
}

export interface RuntimeSettings {
  cwd: string;
  configPath: string;
  credentialsPath: string;
  tokenPath: string;
  concurrency: number;
  maxRetries: number;
}

/** Paths and options from `.env` and the environment; process variables win over `.env`. */
export async function resolveSettings(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<RuntimeSettings> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const vars: Record<string, string | undefined> = { ...(await readDotenv(cwd)), ...(options.env ?? process.env) };

  return {
    cwd,
    configPath: path.resolve(cwd, vars.DRIVE_DUPLICATE_CONFIG ?? DEFAULT_CONFIG_FILE),
    credentialsPath: path.resolve(cwd, vars.DRIVE_CREDENTIALS_PATH ?? DEFAULT_CREDENTIALS_FILE),
    tokenPath: path.resolve(cwd, vars.DRIVE_TOKEN_PATH ?? DEFAULT_TOKEN_FILE),
    concurrency: parseCount(vars.DRIVE_DUPLICATE_CONCURRENCY, 1, "DRIVE_DUPLICATE_CONCURRENCY", 1),
    maxRetries: parseCount(vars.DRIVE_DUPLICATE_MAX_RETRIES, 4, "DRIVE_DUPLICATE_MAX_RETRIES", 0),
  };
}

/**
 * Settings plus the JSON config file. A missing config file is fine; an
 * invalid one is a ConfigError.
 */
export async function loadConfig(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<DuplicateConfig> {
  const settings = await resolveSettings(options);

  const file = await readConfigFile(settings.configPath);
  if (file.exists && !file.ok) {
    throw new ConfigError(`Invalid config ${settings.configPath}: ${file.errors.join("; ")}`, file.errors);
  }

  return { ...settings, batch: file.batch, warnings: file.warnings };
}
