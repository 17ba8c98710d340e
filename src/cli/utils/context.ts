/**
 * Shared wiring for CLI commands: global options, configuration and the
 * local collaborators every command builds on
 */

import { mkdirSync } from 'fs';
import { dirname, join } from 'path';
import type { Command } from 'commander';
import { PIPELINE_DIR } from '../../constants/pipeline-constants.js';
import { unwrapOrThrow } from '../../lib/result-types.js';
import type { PipelineConfig } from '../../models/pipeline-config.js';
import { FileSystemBlobStore } from '../../services/blob-store.js';
import { ConfigurationService } from '../../services/configuration-service.js';
import { HttpDenseEmbedder } from '../../services/dense-embedder.js';
import { SqliteVectorIndex } from '../../services/vector-search-service.js';
import { OutputFormat, OutputFormatter } from './output.js';

export interface GlobalOptions {
  config?: string;
  json?: boolean;
}

export interface CommandContext {
  output: OutputFormatter;
  configuration: ConfigurationService;
  config: Readonly<PipelineConfig>;
  store: FileSystemBlobStore;
}

/**
 * Global options of the program a subcommand belongs to
 */
export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    config: typeof opts.config === 'string' ? opts.config : undefined,
    json: opts.json === true,
  };
}

export function createOutput(command: Command): OutputFormatter {
  return new OutputFormatter(globalOptions(command).json ? OutputFormat.JSON : OutputFormat.HUMAN);
}

/**
 * Load configuration and the blob store; throws the config's InputError
 */
export function createContext(command: Command): CommandContext {
  const options = globalOptions(command);
  const configuration = unwrapOrThrow(ConfigurationService.load({ configPath: options.config }));
  const config = configuration.getConfig();

  return {
    output: createOutput(command),
    configuration,
    config,
    store: new FileSystemBlobStore(config.storageRoot),
  };
}

/**
 * Local index database, kept beside the config file
 */
export function openVectorIndex(context: CommandContext): SqliteVectorIndex {
  const configDir = dirname(context.configuration.getConfigPath()) || PIPELINE_DIR;
  mkdirSync(configDir, { recursive: true });

  const { search } = context.config;
  return SqliteVectorIndex.open(join(configDir, 'index.db'), context.store, {
    distanceMeasure: search.distanceMeasure,
    rrfK: search.rrfK,
    rrfAlpha: search.rrfAlpha,
  });
}

export function createEmbedder(context: CommandContext): HttpDenseEmbedder {
  return new HttpDenseEmbedder({
    endpoint: context.config.embedding.endpoint,
    model: context.config.embedding.modelName,
    apiKey: context.configuration.getEmbeddingApiKey(),
  });
}

/**
 * Run a command action, printing any error with its stage and exiting 1
 */
export async function runAction(command: Command, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    createOutput(command).error(message, error);
    process.exitCode = 1;
  }
}
