// @author lockerdb contributors
// @date 2026-10-19
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { getErrorMessage, isEnoentError } from './errors.mjs';

export const CONFIG_ENV_VAR = 'LOCKERDB_CONFIG';
export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_DATA_DIR = 'db';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const text = z.string().default('');

/** Ports are written as strings by default but numbers are accepted too. */
const port = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform((value) => String(value))
  .default('');

/**
 * Connection details as sent to `/v1/connect` and stored in `config.json`.
 * Missing fields read as empty strings; {@link validateConnection} decides whether that is acceptable.
 */
export const connectionDetailsSchema = z
  .object({
    username: text,
    password: text,
    host: text,
    port,
    schema_name: text,
  })
  .transform(({ schema_name, ...rest }) => ({ ...rest, schemaName: schema_name }));

const configFileSchema = z.object({
  username: text,
  password: text,
  host: text,
  port,
  schema_name: text,
  data_dir: z.string().min(1).optional(),
});

export type ConnectionDetails = z.output<typeof connectionDetailsSchema>;

export interface LockerConfig extends ConnectionDetails {
  /** Absolute storage root. */
  dataDir: string;
  /** File the configuration was loaded from. */
  configPath: string;
}

export const DEFAULT_CONFIG = {
  username: 'admin',
  password: 'admin',
  host: 'localhost',
  port: '4141',
  schema_name: 'public',
} as const;

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG_ENV_VAR];
  return path.resolve(fromEnv !== undefined && fromEnv !== '' ? fromEnv : DEFAULT_CONFIG_FILE);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function toConfig(file: z.output<typeof configFileSchema>, configPath: string): LockerConfig {
  return {
    username: file.username,
    password: file.password,
    host: file.host,
    port: file.port,
    schemaName: file.schema_name,
    dataDir: path.resolve(path.dirname(configPath), file.data_dir ?? DEFAULT_DATA_DIR),
    configPath,
  };
}

/**
 * Reads the configuration file. When it does not exist the defaults are written to it
 * (owner-only) and returned.
 *
 * @throws {ConfigError} If the file cannot be read, written or parsed, or has fields of the wrong type.
 */
export async function loadConfig(configPath: string = resolveConfigPath()): Promise<LockerConfig> {
  let contents: string;
  try {
    contents = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (!isEnoentError(error)) {
      throw new ConfigError(`Failed to read config: ${getErrorMessage(error)}`, { cause: error });
    }
    try {
      await fs.writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), { mode: 0o600 });
    } catch (writeError) {
      throw new ConfigError(`Failed to write default config: ${getErrorMessage(writeError)}`, { cause: writeError });
    }
    return toConfig(configFileSchema.parse(DEFAULT_CONFIG), configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Failed to parse config: ${getErrorMessage(error)}`, { cause: error });
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${configPath}: ${formatIssues(result.error)}`);
  }
  return toConfig(result.data, configPath);
}

/**
 * Checks that every connection field is filled in.
 * @throws {ConfigError} Naming the first missing field.
 */
export function validateConnection(details: ConnectionDetails): void {
  if (details.username === '' || details.password === '') {
    throw new ConfigError('username and password are required');
  }
  if (details.host === '') {
    throw new ConfigError('host is required');
  }
  if (details.port === '') {
    throw new ConfigError('port is required');
  }
  if (details.schemaName === '') {
    throw new ConfigError('schema_name is required');
  }
}

/**
 * Parses an untrusted connection payload.
 * @throws {ConfigError} If it is not an object of string (or numeric port) fields.
 */
export function parseConnectionDetails(body: unknown): ConnectionDetails {
  const result = connectionDetailsSchema.safeParse(body);
  if (!result.success) {
    throw new ConfigError(`Invalid connection details: ${formatIssues(result.error)}`);
  }
  return result.data;
}
