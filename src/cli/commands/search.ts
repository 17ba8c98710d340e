/**
 * Search Command
 *
 * Implements `vector-pipeline search`: text or vector queries against the
 * local index, optionally hybrid, with metadata backfilled from the store.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { InputError } from '../../lib/errors.js';
import { unwrapOrThrow } from '../../lib/result-types.js';
import { SearchService, type SearchResponse } from '../../services/search-service.js';
import { OutputFormat } from '../utils/output.js';
import { createContext, createEmbedder, openVectorIndex, runAction } from '../utils/context.js';

interface SearchCommandOptions {
  vector?: boolean;
  topK: string;
  hybrid?: boolean;
  restrict: string[];
  deny: string[];
  metadataPrefix?: string;
  endpointId?: string;
  deployedIndexId?: string;
  indexId?: string;
}

interface RestrictClause {
  namespace: string;
  allow: string[];
  deny: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse `namespace=a,b` into a namespace and its tokens
 */
export function parseRestrictOption(value: string): { namespace: string; tokens: string[] } {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InputError('search', `Expected namespace=token[,token...], got "${value}"`, 'restrict');
  }
  return {
    namespace: value.slice(0, separator).trim(),
    tokens: value
      .slice(separator + 1)
      .split(',')
      .map((token) => token.trim())
      .filter((token) => token.length > 0),
  };
}

/**
 * Merge allow and deny options into one clause per namespace
 */
export function buildRestrictClauses(allow: readonly string[], deny: readonly string[]): RestrictClause[] {
  const clauses = new Map<string, RestrictClause>();
  const clauseFor = (namespace: string): RestrictClause => {
    let clause = clauses.get(namespace);
    if (!clause) {
      clause = { namespace, allow: [], deny: [] };
      clauses.set(namespace, clause);
    }
    return clause;
  };

  for (const value of allow) {
    const { namespace, tokens } = parseRestrictOption(value);
    clauseFor(namespace).allow.push(...tokens);
  }
  for (const value of deny) {
    const { namespace, tokens } = parseRestrictOption(value);
    clauseFor(namespace).deny.push(...tokens);
  }

  return [...clauses.values()];
}

/**
 * Parse a vector given as a JSON array or comma-separated numbers
 */
export function parseVectorQuery(value: string): unknown {
  const trimmed = value.trim();
  if (trimmed.startsWith('[')) {
    try {
      return JSON.parse(trimmed);
    } catch {
      throw new InputError('query', `Vector query is not valid JSON: ${value}`, 'query');
    }
  }
  return trimmed.split(',').map((part) => Number(part.trim()));
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search the index with a text or vector query')
    .argument('<query>', 'Query text, or numbers with --vector')
    .option('--vector', 'Treat the query as a dense vector')
    .option('-k, --top-k <n>', 'Number of neighbors to return', '10')
    .option('--hybrid', 'Combine dense and BM25 sparse scores (text queries)')
    .option('--restrict <namespace=tokens>', 'Allow tokens in a namespace (repeatable)', collect, [])
    .option('--deny <namespace=tokens>', 'Deny tokens in a namespace (repeatable)', collect, [])
    .option('--metadata-prefix <prefix>', 'Prefix used to backfill missing metadata')
    .option('--endpoint-id <id>', 'Endpoint (defaults to resourceNames.endpointId)')
    .option('--deployed-index-id <id>', 'Deployed index (defaults to resourceNames.deployedIndexId)')
    .option('--index-id <id>', 'Index served by the deployment (defaults to resourceNames.indexId)')
    .action(async (query: string, options: SearchCommandOptions, command: Command) => {
      await runAction(command, () => executeSearch(query, options, command));
    });
}

function printResults(response: SearchResponse): void {
  const query = typeof response.query === 'string' ? `"${response.query}"` : `[${response.query.length} dims]`;
  console.log(chalk.cyan(`\nSearch: ${query}`));
  console.log(chalk.gray(`Found ${response.numRecommendations} results (${response.backfilled} backfilled)\n`));

  if (response.results.length === 0) {
    console.log(chalk.yellow('No results found'));
    return;
  }

  response.results.forEach((result, i) => {
    const score = result.score === null ? 'n/a' : result.score.toFixed(4);
    console.log(chalk.bold.white(`${i + 1}. ${result.id}`) + chalk.gray(` (score: ${score})`));
    if (result.metadata) {
      console.log(chalk.dim(`   ${JSON.stringify(result.metadata)}`));
    }
  });
  console.log();
}

async function executeSearch(query: string, options: SearchCommandOptions, command: Command): Promise<void> {
  const context = createContext(command);
  const topK = Number(options.topK);
  const restricts = buildRestrictClauses(options.restrict, options.deny);

  const index = openVectorIndex(context);
  try {
    const service = new SearchService({
      embedder: createEmbedder(context),
      service: index,
      store: context.store,
      config: context.config,
    });

    const response = unwrapOrThrow(
      await service.search({
        endpointId: options.endpointId,
        deployedIndexId: options.deployedIndexId,
        indexId: options.indexId,
        queryType: options.vector ? 'vector' : 'text',
        query: options.vector ? parseVectorQuery(query) : query,
        topK,
        hybrid: options.hybrid ?? false,
        restricts,
        metadataPrefix: options.metadataPrefix,
      })
    );

    if (context.output.getFormat() === OutputFormat.JSON) {
      context.output.json(response);
    } else {
      printResults(response);
    }
  } finally {
    index.close();
  }
}
