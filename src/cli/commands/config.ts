import { Command } from 'commander';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { createContext, runAction } from '../utils/context.js';

interface SetResourcesOptions {
  indexId?: string;
  endpointId?: string;
  deployedIndexId?: string;
}

/**
 * Configuration command implementation
 */
export function createConfigCommand(): Command {
  const cmd = new Command('config');

  cmd
    .description('Inspect and update pipeline configuration');

  // config show
  cmd
    .command('show')
    .description('Print the effective configuration')
    .action(async (_options: Record<string, never>, command: Command) => {
      await runAction(command, async () => {
        const context = createContext(command);
        context.output.json({
          configPath: context.configuration.getConfigPath(),
          config: context.config,
        });
      });
    });

  // config set-resources --index-id <id> ...
  cmd
    .command('set-resources')
    .description('Rewrite resource names in the config file, leaving other settings untouched')
    .option('--index-id <id>', 'Index id')
    .option('--endpoint-id <id>', 'Index endpoint id')
    .option('--deployed-index-id <id>', 'Deployed index id')
    .action(async (options: SetResourcesOptions, command: Command) => {
      await runAction(command, async () => {
        const context = createContext(command);
        const updated = unwrapOrThrow(context.configuration.updateResourceNames(options));

        context.output.success(`Updated ${updated.getConfigPath()}`, {
          ...updated.getConfig().resourceNames,
        });
      });
    });

  return cmd;
}
