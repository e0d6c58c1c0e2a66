import { z } from 'zod';
import { readFileSync, readdirSync, existsSync, statSync } from 'fs';
import { basename, extname, join } from 'path';
import { parse as parseYaml } from 'yaml';

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      return defaultValue ?? '';
    }
  );
}

/**
 * Recursively interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

// YAML values may arrive as strings after interpolation
const Port = z.coerce.number().int().min(0).max(65535);
const PositiveInt = z.coerce.number().int().positive();
const Flag = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((v) => v === 'true'),
]);

const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormat = z.enum(['json', 'pretty']);

const ListFileSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

export type ListFile = z.infer<typeof ListFileSchema>;

const ConfigSchema = z.object({
  server: z
    .object({
      listen_port: Port.default(8080),
      host: z.string().min(1).default('0.0.0.0'),
      body_limit_bytes: PositiveInt.default(10 * 1024 * 1024),
      api_key: z.string().min(1).optional(),
      cors_origin: z.string().min(1).optional(),
      rate_limit: z
        .object({
          max: PositiveInt.default(1000),
          window_ms: PositiveInt.default(60000),
        })
        .default({}),
    })
    .default({}),
  engine: z
    .object({
      enabled: Flag.default(true),
      cache_capacity: PositiveInt.default(1000),
      max_rules_per_list: PositiveInt.default(500000),
      load_default_list: Flag.default(true),
    })
    .default({}),
  lists: z
    .object({
      directory: z.string().min(1).optional(),
      files: z.array(ListFileSchema).default([]),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevel.default('info'),
      format: LogFormat.default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Empty strings left by "${VAR:-}" mean "not set"
function dropEmptyStrings(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(dropEmptyStrings);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== '') {
        result[key] = dropEmptyStrings(value);
      }
    }
    return result;
  }
  return obj;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(dropEmptyStrings(processEnvVars(raw ?? {})));
}

export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    return parseConfig(parseYaml(content));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return parseConfig({});
    }
    throw error;
  }
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type EnvConfig = DeepPartial<Config>;

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function envFlag(name: string): boolean | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }
  return value !== 'false' && value !== '0';
}

function envString(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

function envEnum<T extends [string, ...string[]]>(
  name: string,
  schema: z.ZodEnum<T>
): T[number] | undefined {
  const value = envString(name);
  if (value === undefined) {
    return undefined;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new Error(`Environment variable ${name} must be one of ${schema.options.join(', ')}`);
  }
  return result.data;
}

/**
 * Settings taken from the environment. Variables that are not set are left
 * undefined and do not override the file config.
 */
export function loadConfigFromEnv(): EnvConfig {
  return {
    server: {
      listen_port: envInt('LISTEN_PORT'),
      host: envString('LISTEN_HOST'),
      api_key: envString('API_KEY'),
      cors_origin: envString('CORS_ORIGIN'),
      rate_limit: {
        max: envInt('RATE_LIMIT_MAX'),
        window_ms: envInt('RATE_LIMIT_WINDOW_MS'),
      },
    },
    engine: {
      enabled: envFlag('FILTERING_ENABLED'),
      cache_capacity: envInt('CACHE_CAPACITY'),
      max_rules_per_list: envInt('MAX_RULES_PER_LIST'),
      load_default_list: envFlag('LOAD_DEFAULT_LIST'),
    },
    lists: {
      directory: envString('LISTS_DIR'),
    },
    logging: {
      level: envEnum('LOG_LEVEL', LogLevel),
      format: envEnum('LOG_FORMAT', LogFormat),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function overlay(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      result[key] = overlay(base[key], value);
    }
  }
  return result;
}

/**
 * File config with environment overrides applied, validated again so the
 * result honours the schema's bounds.
 */
export function mergeConfig(fileConfig: Config, envConfig: EnvConfig): Config {
  return ConfigSchema.parse(overlay(fileConfig, envConfig));
}

export interface FilterListSource {
  name: string;
  content: string;
}

export interface FilterListDirectoryResult {
  lists: FilterListSource[];
  errors: Array<{ file: string; error: string }>;
}

const LIST_EXTENSIONS = new Set(['.txt', '.list']);

export function loadFilterListFile(name: string, path: string): FilterListSource {
  return { name, content: readFileSync(path, 'utf-8') };
}

/**
 * Read every *.txt / *.list file in `dirPath`, named after the file without
 * its extension.
 */
export function loadFilterListsFromDirectory(dirPath: string): FilterListDirectoryResult {
  const result: FilterListDirectoryResult = { lists: [], errors: [] };

  if (!existsSync(dirPath)) {
    return result;
  }

  try {
    if (!statSync(dirPath).isDirectory()) {
      return result;
    }
  } catch {
    return result;
  }

  let files: string[];
  try {
    files = readdirSync(dirPath)
      .filter((f) => LIST_EXTENSIONS.has(extname(f)))
      .filter((f) => !f.startsWith('_') && !f.startsWith('.'))
      .sort();
  } catch (error) {
    result.errors.push({
      file: dirPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return result;
  }

  for (const file of files) {
    try {
      result.lists.push(loadFilterListFile(basename(file, extname(file)), join(dirPath, file)));
    } catch (error) {
      result.errors.push({
        file,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}
