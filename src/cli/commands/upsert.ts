/**
 * Upsert Command
 *
 * Implements `vector-pipeline upsert`: streams serialized entries from a local
 * JSONL file or a blob store prefix into the local index.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { InputError } from '../../lib/errors.js';
import { parseJsonObjectLine } from '../../lib/jsonl.js';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { IndexUpdater, type StreamingUpdateRequest } from '../../services/index-updates.js';
import { createContext, openVectorIndex, runAction, type CommandContext } from '../utils/context.js';

interface UpsertCommandOptions {
  file?: string;
  prefix?: string;
  indexId?: string;
}

export function createUpsertCommand(): Command {
  return new Command('upsert')
    .description('Upsert serialized index entries from a JSONL file or a store prefix')
    .option('--file <path>', 'Local JSONL file of entries')
    .option('--prefix <prefix>', 'Blob store prefix holding JSONL files')
    .option('--index-id <id>', 'Target index (defaults to resourceNames.indexId)')
    .action(async (options: UpsertCommandOptions, command: Command) => {
      await runAction(command, () => runUpsertCommand(options, command));
    });
}

/**
 * Objects on the non-blank lines of a local file; other lines are reported
 * and dropped
 */
function readDatapointsFile(path: string, context: CommandContext): unknown[] {
  const items: unknown[] = [];

  readFileSync(path, 'utf-8')
    .split('\n')
    .forEach((rawLine, i) => {
      const line = rawLine.trim();
      if (!line) return;

      const parsed = parseJsonObjectLine(line);
      if (parsed.isErr()) {
        context.output.warning(`Skipped ${path}:${i + 1}`, { reason: parsed.error });
        return;
      }
      items.push(parsed.value);
    });

  return items;
}

async function runUpsertCommand(options: UpsertCommandOptions, command: Command): Promise<void> {
  if (options.file && options.prefix) {
    throw new InputError('load', 'Use either --file or --prefix, not both');
  }
  if (!options.file && !options.prefix) {
    throw new InputError('load', 'One of --file or --prefix is required');
  }

  const context = createContext(command);
  const request: StreamingUpdateRequest = options.prefix
    ? { indexId: options.indexId, datapointsSource: 'store', datapointsPrefix: options.prefix }
    : { indexId: options.indexId, datapointsSource: 'api', datapoints: readDatapointsFile(options.file ?? '', context) };

  const index = openVectorIndex(context);
  try {
    const updater = new IndexUpdater({ service: index, store: context.store, config: context.config });
    const result = unwrapOrThrow(await updater.streamingUpdate(request));

    context.output.success(`Upserted ${result.upserted} datapoints into ${result.indexId}`, {
      indexId: result.indexId,
      upserted: result.upserted,
      skipped: result.skipped.length,
    });
  } finally {
    index.close();
  }
}
