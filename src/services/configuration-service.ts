/**
 * Configuration service for the pipeline
 * Loads and validates the JSON config file, applies environment overrides and
 * rewrites resource names in place
 *
 * @module configuration-service
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { config as loadEnv } from 'dotenv';
import type { ZodError } from 'zod';
import { CONFIG_FILE_NAME, PIPELINE_DIR } from '../constants/pipeline-constants.js';
import { InputError } from '../lib/errors.js';
import { isPlainObject } from '../lib/jsonl.js';
import { Result, err, ok } from '../lib/result-types.js';
import { PipelineConfigSchema, type PipelineConfig } from '../models/pipeline-config.js';

/**
 * Values read from the environment
 */
export interface EnvironmentSettings {
  embeddingEndpoint?: string;
  embeddingApiKey?: string;
  configPath?: string;
}

/**
 * Resource names that can be rewritten after the index is provisioned
 */
export interface ResourceNameUpdate {
  indexId?: string;
  endpointId?: string;
  deployedIndexId?: string;
}

export interface ConfigurationServiceOptions {
  /** Explicit config path; wins over VECTOR_PIPELINE_CONFIG */
  configPath?: string;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load a .env file into process.env without overriding variables already set
 *
 * @param envPath - Path to the .env file (defaults to ./.env)
 */
export function loadEnvironmentFile(envPath?: string): Result<void, InputError> {
  const result = loadEnv({ path: envPath });
  if (result.error && envPath) {
    return err(new InputError('config', `Failed to load ${envPath}: ${result.error.message}`));
  }
  return ok(undefined);
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  return {
    embeddingEndpoint: env.EMBEDDING_ENDPOINT || undefined,
    embeddingApiKey: env.EMBEDDING_API_KEY || undefined,
    configPath: env.VECTOR_PIPELINE_CONFIG || undefined,
  };
}

export function defaultConfigPath(): string {
  return join(PIPELINE_DIR, CONFIG_FILE_NAME);
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read the raw JSON object stored in a config file; a missing file is empty
 */
function readRawConfig(configPath: string): Result<Record<string, unknown>, InputError> {
  if (!existsSync(configPath)) {
    return ok({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return err(new InputError('config', `Invalid JSON in ${configPath}: ${detail}`));
  }

  if (!isPlainObject(parsed)) {
    return err(new InputError('config', `Configuration in ${configPath} must be a JSON object`));
  }
  return ok(parsed);
}

/**
 * Validate raw configuration and apply defaults
 *
 * @param raw - Parsed file contents
 * @param source - Where the contents came from, for error messages
 */
export function parseConfig(raw: unknown, source: string): Result<PipelineConfig, InputError> {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    return err(new InputError('config', `Invalid configuration in ${source}: ${formatZodError(result.error)}`));
  }
  return ok(result.data);
}

/**
 * Load, validate and freeze the configuration at a path
 *
 * A missing file yields the defaults. EMBEDDING_ENDPOINT overrides
 * `embedding.endpoint`.
 */
export function loadPipelineConfig(
  configPath: string,
  env: EnvironmentSettings = readEnvironment()
): Result<Readonly<PipelineConfig>, InputError> {
  return readRawConfig(configPath)
    .andThen((raw) => parseConfig(raw, configPath))
    .map((config) => {
      if (env.embeddingEndpoint) {
        config.embedding.endpoint = env.embeddingEndpoint;
      }
      return deepFreeze(config);
    });
}

/**
 * Rewrite the given resource names in a config file, leaving every other
 * setting as written
 *
 * @returns The configuration after the update
 */
export function updateResourceNames(
  configPath: string,
  names: ResourceNameUpdate
): Result<PipelineConfig, InputError> {
  return readRawConfig(configPath).andThen((raw) => {
    const current = isPlainObject(raw.resourceNames) ? raw.resourceNames : {};
    const resourceNames: Record<string, unknown> = { ...current };

    if (names.indexId !== undefined) resourceNames.indexId = names.indexId;
    if (names.endpointId !== undefined) resourceNames.endpointId = names.endpointId;
    if (names.deployedIndexId !== undefined) resourceNames.deployedIndexId = names.deployedIndexId;

    const updated = { ...raw, resourceNames };
    return parseConfig(updated, configPath).andThen((config) => {
      try {
        mkdirSync(dirname(configPath), { recursive: true });
        writeFileSync(configPath, JSON.stringify(updated, null, 2) + '\n');
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        return err(new InputError('config', `Failed to write ${configPath}: ${detail}`));
      }
      return ok(config);
    });
  });
}

/**
 * Configuration for one process: the frozen config plus environment secrets
 */
export class ConfigurationService {
  private constructor(
    private readonly config: Readonly<PipelineConfig>,
    private readonly configPath: string,
    private readonly env: EnvironmentSettings
  ) {}

  /**
   * Resolve the config path (option, then VECTOR_PIPELINE_CONFIG, then the
   * working directory default) and load it
   */
  static load(options: ConfigurationServiceOptions = {}): Result<ConfigurationService, InputError> {
    const env = readEnvironment(options.env);
    const configPath = options.configPath || env.configPath || defaultConfigPath();

    return loadPipelineConfig(configPath, env).map(
      (config) => new ConfigurationService(config, configPath, env)
    );
  }

  getConfig(): Readonly<PipelineConfig> {
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * API key for the embedding endpoint, never stored in the config file
   */
  getEmbeddingApiKey(): string | undefined {
    return this.env.embeddingApiKey;
  }

  /**
   * Persist new resource names and return a service over the updated file
   */
  updateResourceNames(names: ResourceNameUpdate): Result<ConfigurationService, InputError> {
    return updateResourceNames(this.configPath, names)
      .andThen(() => loadPipelineConfig(this.configPath, this.env))
      .map((config) => new ConfigurationService(config, this.configPath, this.env));
  }
}
