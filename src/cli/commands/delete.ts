/**
 * Delete Command
 *
 * Implements `vector-pipeline delete <ids...>`.
 */

import { Command } from 'commander';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { IndexUpdater } from '../../services/index-updates.js';
import { createContext, openVectorIndex, runAction } from '../utils/context.js';

interface DeleteCommandOptions {
  indexId?: string;
}

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Remove datapoints from the index by id')
    .argument('<ids...>', 'Datapoint ids')
    .option('--index-id <id>', 'Target index (defaults to resourceNames.indexId)')
    .action(async (ids: string[], options: DeleteCommandOptions, command: Command) => {
      await runAction(command, async () => {
        const context = createContext(command);
        const index = openVectorIndex(context);
        try {
          const updater = new IndexUpdater({ service: index, store: context.store, config: context.config });
          const result = unwrapOrThrow(
            await updater.streamingDelete({ indexId: options.indexId, datapointIds: ids })
          );
          context.output.success(`Deleted ${result.deleted} datapoints from ${result.indexId}`, {
            indexId: result.indexId,
            deleted: result.deleted,
          });
        } finally {
          index.close();
        }
      });
    });
}
