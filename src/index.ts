#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command, Option } from 'commander';
import { FileCache } from './cache/fileCache.js';
import { RedditClient } from './clients/reddit.js';
import { loadCredentials, normalizeUsername, parsePositiveInteger } from './config.js';
import { DEFAULT_MAX_CHARS, buildDefinition } from './definition/index.js';
import type { AssembledDefinition, ExchangeOrder, WarningKind } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { epochToIso, toUnixSeconds } from './utils/time.js';

type GenerateCommandOptions = {
  limit?: string;
  output?: string;
  maxChars?: string;
  minLength?: string;
  maxLength?: string;
  minParentLength?: string;
  maxParentLength?: string;
  maxBlockLength?: string;
  order: ExchangeOrder;
  stripMarkup?: boolean;
  since?: string;
  credentials?: string;
  cache: boolean;
  cacheDir: string;
  verbose?: boolean;
};

const program = new Command();
program
  .name('reddit-character')
  .description("Generate an AI character definition from a Reddit user's public comments.")
  .version('0.1.0');

program
  .command('generate')
  .description('Build a character definition from the recent comments of <username> (with or without the u/ prefix).')
  .argument('<username>', 'Reddit username to analyze.')
  .option('-l, --limit <number>', 'Number of recent comments to analyze (default 100).')
  .option('-o, --output <path>', 'Write the definition to a file instead of stdout.')
  .option('--max-chars <number>', `Character ceiling for the definition (default ${DEFAULT_MAX_CHARS}).`)
  .option('--min-length <number>', 'Skip comments shorter than this (default 10).')
  .option('--max-length <number>', 'Skip comments longer than this (default 300).')
  .option('--min-parent-length <number>', 'Skip replies whose parent text is shorter than this (default --min-length).')
  .option('--max-parent-length <number>', 'Skip replies whose parent text is longer than this (default --max-length).')
  .option('--max-block-length <number>', 'Skip exchanges whose formatted dialog block is longer than this (default 800).')
  .addOption(new Option('--order <order>', 'Example ordering.').choices(['recent', 'score']).default('recent'))
  .option('--strip-markup', 'Remove Reddit markdown, quotes, links and u/ r/ references from dialog lines.')
  .option('--since <iso>', 'Only use comments created at or after this date (ISO or epoch seconds).')
  .option('--credentials <path>', 'Path to a credentials .env file.')
  .option('--no-cache', 'Do not read or write the parent lookup cache.')
  .option('--cache-dir <path>', 'Directory for cached parent lookups.', '.cache')
  .option('-v, --verbose', 'Enable debug logging.')
  .action(async (username: string, rawOptions: GenerateCommandOptions) => {
    await handleGenerate(username, rawOptions);
  });

process.on('SIGINT', () => {
  console.error('\nOperation cancelled by user');
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  const verbose = process.argv.includes('--verbose') || process.argv.includes('-v');
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});

async function handleGenerate(rawUsername: string, rawOptions: GenerateCommandOptions) {
  const verbose = rawOptions.verbose ?? false;
  const log = createLogger('generate', { verbose });
  const username = normalizeUsername(rawUsername);
  const limit = parsePositiveInteger(rawOptions.limit, 100, 'limit');
  const maxChars = parsePositiveInteger(rawOptions.maxChars, DEFAULT_MAX_CHARS, 'max-chars');
  const minCommentLength = parsePositiveInteger(rawOptions.minLength, 10, 'min-length');
  const maxCommentLength = parsePositiveInteger(rawOptions.maxLength, 300, 'max-length');
  const minParentLength = parsePositiveInteger(rawOptions.minParentLength, minCommentLength, 'min-parent-length');
  const maxParentLength = parsePositiveInteger(rawOptions.maxParentLength, maxCommentLength, 'max-parent-length');
  const maxBlockLength = parsePositiveInteger(rawOptions.maxBlockLength, 800, 'max-block-length');
  const since = rawOptions.since ? toUnixSeconds(rawOptions.since) : undefined;

  const loaded = loadCredentials({ explicitPath: rawOptions.credentials });
  if (loaded.source) {
    log.info(`Using credentials from: ${loaded.source}`);
  }
  if (!loaded.credentials) {
    log.info('No Reddit API credentials configured; using the public JSON endpoints.');
  }

  const client = new RedditClient({
    credentials: loaded.credentials,
    ...(loaded.userAgent ? { userAgent: loaded.userAgent } : {}),
    cache: rawOptions.cache ? new FileCache({ baseDir: rawOptions.cacheDir }) : undefined,
    logger: createLogger('reddit', { verbose }).debug,
  });

  log.info(`Generating character definition for u/${username}${since !== undefined ? ` since ${epochToIso(since)}` : ''}`);
  const comments = await client.fetchUserComments(username, { limit, since });
  log.info(`Processing ${comments.length} comments`);
  const resolveParent = await client.resolveParents(comments);

  const definition = buildDefinition(username, comments, {
    resolveParent,
    maxChars,
    minCommentLength,
    maxCommentLength,
    minParentLength,
    maxParentLength,
    maxBlockLength,
    order: rawOptions.order,
    stripMarkup: rawOptions.stripMarkup ?? false,
  });
  reportWarnings(definition, log);
  log.info(
    `Included ${definition.includedExchanges} of ${definition.totalExchanges} exchanges (${definition.length} characters)`,
  );

  if (rawOptions.output) {
    const outputPath = path.resolve(rawOptions.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, definition.text, 'utf8');
    console.error(`Character definition saved to ${outputPath}`);
    console.error(`Definition length: ${definition.length}/${maxChars} characters`);
    return;
  }

  const rule = '='.repeat(50);
  console.log([rule, 'CHARACTER DEFINITION', rule, definition.text, rule].join('\n'));
  console.error(`Length: ${definition.length}/${maxChars} characters`);
}

function reportWarnings(definition: AssembledDefinition, log: Logger) {
  const counts = new Map<WarningKind, number>();
  for (const warning of definition.warnings) {
    counts.set(warning.kind, (counts.get(warning.kind) ?? 0) + 1);
    log.debug(JSON.stringify(warning));
  }

  if (counts.get('no-exchanges')) {
    log.warn('No dialog examples were included; the definition only contains the introduction.');
  }
  const summary = [...counts.entries()]
    .filter(([kind]) => kind !== 'no-exchanges')
    .map(([kind, count]) => `${kind}: ${count}`);
  if (summary.length > 0) {
    log.info(`Warnings: ${summary.join(', ')}`);
  }
}
