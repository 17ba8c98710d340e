/**
 * Batch Update Command
 *
 * Implements `vector-pipeline batch-update`: imports every JSONL file under a
 * prefix into the index, optionally replacing its contents.
 */

import { Command } from 'commander';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { IndexUpdater } from '../../services/index-updates.js';
import { createContext, openVectorIndex, runAction } from '../utils/context.js';

interface BatchUpdateCommandOptions {
  prefix?: string;
  overwrite?: boolean;
  indexId?: string;
}

export function createBatchUpdateCommand(): Command {
  return new Command('batch-update')
    .description('Import all entries under a prefix into the index')
    .option('--prefix <prefix>', 'Prefix holding JSONL files (defaults to batchPaths.batchRoot)')
    .option('--overwrite', 'Replace the index contents instead of upserting', false)
    .option('--index-id <id>', 'Target index (defaults to resourceNames.indexId)')
    .action(async (options: BatchUpdateCommandOptions, command: Command) => {
      await runAction(command, async () => {
        const context = createContext(command);
        const index = openVectorIndex(context);
        try {
          const updater = new IndexUpdater({ service: index, store: context.store, config: context.config });
          const result = unwrapOrThrow(
            await updater.batchUpdate({
              indexId: options.indexId,
              contentsDeltaUri: options.prefix,
              isCompleteOverwrite: options.overwrite ?? false,
            })
          );

          context.output.success(`Batch update ${result.status.toLowerCase()} for ${result.indexId}`, {
            contentsDeltaUri: result.contentsDeltaUri,
            files: result.files,
          });
        } finally {
          index.close();
        }
      });
    });
}
