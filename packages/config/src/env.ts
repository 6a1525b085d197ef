/**
 * Environment loader for test-harness sessions
 *
 * Locates the workspace root and loads .env / .env.local deterministically.
 * Provides diagnostics and typed readers without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface LoadEnvOptions {
  /** Directory to start the root search from (defaults to process.cwd()) */
  cwd?: string;
  /** Explicit env file, takes precedence over ENV_FILE and <root>/.env */
  envFile?: string;
}

export interface LoadEnvResult {
  rootDir: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, '.env' | '.env.local'>;
}

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
}

export interface EnvDiagnostics {
  cwd: string;
  requiredKeys: EnvKeyStatus[];
  warnings: string[];
}

const SECRET_MARKERS = ['SECRET', 'TOKEN', 'PASSWORD', 'KEY'];

/**
 * Find the workspace root by walking up from startPath
 */
export function findRootDir(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
      return current;
    }
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

function hasWorkspaces(packageJsonPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch {
    // unreadable package.json is not a root marker
    return false;
  }
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return SECRET_MARKERS.some((marker) => key.includes(marker));
}

function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Load environment variables for a session.
 *
 * Loads <root>/.env (or the override) and then <root>/.env.local, each
 * overriding earlier values. A variable that was already set to a non-empty
 * value is restored if a file assigns it an empty one.
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvResult {
  const rootDir = findRootDir(options.cwd ?? process.cwd());
  const envFilePath = resolve(options.envFile ?? process.env.ENV_FILE ?? join(rootDir, '.env'));
  const envLocalFilePath = resolve(join(rootDir, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (nonEmpty(value)) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, '.env' | '.env.local'> = {};

  const loadFile = (path: string, source: '.env' | '.env.local'): boolean => {
    if (!existsSync(path)) {
      return false;
    }
    const result = config({ path, override: true });
    if (result.error) {
      console.warn(`[env] Error loading ${source} file: ${result.error.message}`);
      return false;
    }
    for (const [key, value] of Object.entries(result.parsed ?? {})) {
      if (nonEmpty(value)) {
        keySources[key] = source;
        if (!keysLoaded.includes(key)) {
          keysLoaded.push(key);
        }
      }
    }
    return true;
  };

  const loaded = loadFile(envFilePath, '.env');
  if (!loaded && !existsSync(envFilePath)) {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }
  const localLoaded = loadFile(envLocalFilePath, '.env.local');

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    if (!nonEmpty(process.env[key])) {
      process.env[key] = existingValue;
    }
  }

  return { rootDir, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded, keySources };
}

/**
 * Describe the given keys (safe for logging, no secrets)
 */
export function describeEnv(keys: readonly string[]): EnvDiagnostics {
  const warnings: string[] = [];

  const requiredKeys = keys.map((key): EnvKeyStatus => {
    const value = process.env[key];
    if (!nonEmpty(value)) {
      return { key, present: false };
    }

    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }

    const trimmed = value.trim();
    return {
      key,
      present: true,
      length: trimmed.length,
      maskedValue: isSecretKey(key) ? maskValue(trimmed) : undefined,
    };
  });

  return { cwd: process.cwd(), requiredKeys, warnings };
}

/**
 * Read an optional variable, trimmed; empty counts as unset
 */
export function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return nonEmpty(value) ? value.trim() : undefined;
}

/**
 * Read a required variable
 *
 * @throws Error naming the key if it is missing or empty
 */
export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (value === undefined) {
    throw new Error(
      `Missing or empty required environment variable: ${key}\n` +
        `Please check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }
  return value;
}

/**
 * Require several variables at once, reporting every missing one
 */
export function requireEnvMultiple(keys: readonly string[]): void {
  const missing = keys.filter((key) => readEnv(key) === undefined);
  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}\n` +
        `Please check your .env file and ensure all required variables are set.`
    );
  }
}

export function readEnvFlag(key: string, fallback: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
}

export function readEnvNumber(key: string, fallback: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}
