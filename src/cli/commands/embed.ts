/**
 * Embed Command
 *
 * Implements `vector-pipeline embed`: reads rows from a SQLite table, embeds
 * them and writes one line-delimited file under the output prefix.
 */

import { Command } from 'commander';
import { join } from 'path';
import { PIPELINE_DIR } from '../../constants/pipeline-constants.js';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { EmbeddingPipeline } from '../../services/embedding-pipeline.js';
import { SqliteRecordSource } from '../../services/record-source.js';
import { createContext, createEmbedder, runAction } from '../utils/context.js';

/**
 * CLI options for embed command
 */
interface EmbedCommandOptions {
	runId: string;
	table: string;
	where: string;
	database: string;
	outputPrefix?: string;
	dimension?: number;
	bm25: boolean;
}

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new Error(`Expected a positive integer, got "${value}"`);
	}
	return parsed;
}

/**
 * Create the embed command
 */
export function createEmbedCommand(): Command {
	const cmd = new Command('embed');

	cmd
		.description('Embed table rows and write index entries under an output prefix')
		.requiredOption('--run-id <id>', 'Identifier of this embedding run')
		.requiredOption('--table <name>', 'Source table')
		.option('--where <condition>', 'SQL condition selecting rows', '1 = 1')
		.option('--database <path>', 'SQLite database holding the table', join(PIPELINE_DIR, 'source.db'))
		.option('--output-prefix <prefix>', 'Prefix to write to (defaults to batchPaths.batchRoot)')
		.option('--dimension <n>', 'Dense embedding dimensionality', parsePositiveInt)
		.option('--no-bm25', 'Do not attach BM25 sparse vectors')
		.action(async (options: EmbedCommandOptions, command: Command) => {
			await runAction(command, () => runEmbedCommand(options, command));
		});

	return cmd;
}

/**
 * Run the embed command
 */
async function runEmbedCommand(options: EmbedCommandOptions, command: Command): Promise<void> {
	const context = createContext(command);
	const source = SqliteRecordSource.open(options.database);

	try {
		const pipeline = new EmbeddingPipeline({
			source,
			embedder: createEmbedder(context),
			store: context.store,
			config: context.config,
		});

		const result = unwrapOrThrow(
			await pipeline.embedRecords({
				runId: options.runId,
				table: options.table,
				where: options.where,
				outputPrefix: options.outputPrefix,
				dimension: options.dimension,
				useBm25: options.bm25,
			})
		);

		context.output.success(`Embedded ${result.written} of ${result.rowCount} rows`, {
			status: result.status,
			runId: result.runId,
			outputPrefix: result.outputPrefix,
			outputFile: result.outputFile,
			rowCount: result.rowCount,
			written: result.written,
			skipped: result.skipped.length,
		});
	} finally {
		source.close();
	}
}
