import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { ConfigError } from '../../src/index.js';
import { errorMessage, log } from './log.js';

export interface Config {
  /** Override type spec, e.g. `feat=scope;docs=` */
  types?: string;
  ignoreCase: boolean;
  continueOnError: boolean;
}

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE = '.commitgrammarrc';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function searchDirs(cwd: string, homeDir: string): string[] {
  return cwd === homeDir ? [cwd] : [cwd, homeDir];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadEnvFiles(dirs: string[], env: NodeJS.ProcessEnv): void {
  // Earlier files win, and nothing already set in the environment is overridden
  for (const dir of dirs) {
    const envFile = path.join(dir, '.env');
    if (!fs.existsSync(envFile)) {
      continue;
    }

    const parsed = dotenv.parse(fs.readFileSync(envFile));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    log(`Loaded ${envFile}`);
  }
}

function typesFromMap(types: Record<string, unknown>, source: string): string {
  return Object.entries(types)
    .map(([name, fields]) => {
      if (!Array.isArray(fields) || !fields.every((field): field is string => typeof field === 'string')) {
        throw new ConfigError(`"types.${name}" in ${source} must be an array of field names`);
      }
      return `${name}=${fields.join(',')}`;
    })
    .join(';');
}

export function validateConfigFile(data: unknown, source: string): Partial<Config> {
  if (!isRecord(data)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }

  const validated: Partial<Config> = {};

  if (typeof data.types === 'string') {
    validated.types = data.types;
  } else if (isRecord(data.types)) {
    validated.types = typesFromMap(data.types, source);
  } else if (data.types !== undefined) {
    throw new ConfigError(`"types" in ${source} must be a type spec string or an object`);
  }

  for (const key of ['ignoreCase', 'continueOnError'] as const) {
    const value = data[key];
    if (typeof value === 'boolean') {
      validated[key] = value;
    } else if (value !== undefined) {
      throw new ConfigError(`"${key}" in ${source} must be a boolean`);
    }
  }

  return validated;
}

function loadConfigFile(dirs: string[]): Partial<Config> {
  // Check local config first, then the home directory
  for (const dir of dirs) {
    const configFile = path.join(dir, CONFIG_FILE);
    if (!fs.existsSync(configFile)) {
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to parse ${configFile}: ${errorMessage(error)}`);
    }
    log(`Loaded ${configFile}`);
    return validateConfigFile(data, configFile);
  }

  return {};
}

export function parseBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new ConfigError(`Invalid boolean "${value}" for ${name}`);
}

/**
 * Resolves configuration from the environment, topped up from `.env` files, and
 * `.commitgrammarrc`. Environment values win over the rc file; CLI flags are
 * layered on top by the caller.
 *
 * @throws {ConfigError} when the rc file or an environment value is malformed
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const dirs = searchDirs(options.cwd ?? process.cwd(), options.homeDir ?? os.homedir());
  const env = options.env ?? process.env;

  loadEnvFiles(dirs, env);
  const fileConfig = loadConfigFile(dirs);

  return {
    types: env.COMMIT_GRAMMAR_TYPES || fileConfig.types,
    ignoreCase: parseBoolean(env, 'COMMIT_GRAMMAR_IGNORE_CASE') ?? fileConfig.ignoreCase ?? false,
    continueOnError: parseBoolean(env, 'COMMIT_GRAMMAR_CONTINUE_ON_ERROR') ?? fileConfig.continueOnError ?? false
  };
}
