#!/usr/bin/env node

// CLI entry point
// - Command name: `passmith` with the `generate` subcommand.
// - `generate` reads a JSON config plus base words (--words, --input or the
//   config's base_words), runs the @passmith/core pipeline and prints one
//   candidate per line (or a JSON array with --out json).

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  isPassmithError,
  type PassmithError,
} from '@passmith/core';

import { runGenerate } from './commands/generate.js';
import type { CliOptions } from './flags.js';
import { renderCLIView } from './render.js';

const program = new Command();

program
  .name('passmith')
  .description('Generate password candidate wordlists from templates')
  .version('0.1.0');

program
  .command('generate')
  .description('Expand base words through the configured templates')
  .option('-w, --words <list>', 'Comma-separated base words')
  .option('-i, --input <file>', 'File with one base word per line')
  .option('-c, --config <file>', 'JSON config file')
  .option('-o, --output <file>', 'Also write candidates to this file')
  .option('--minlen <number>', 'Discard candidates shorter than this', '0')
  .option(
    '--maxlen <number>',
    'Discard candidates longer than this (0 = no limit)',
    '0'
  )
  .option('-y, --years <number>', 'Include current + N-1 previous years', '2')
  .option('--leet', 'Apply exhaustive character substitutions', false)
  .option(
    '--enforce-policy',
    'Keep only candidates meeting the config policy requirements',
    false
  )
  .option(
    '--separator-mode <mode>',
    'Separator placeholders: independent|shared',
    'independent'
  )
  .option(
    '--max-leet-rounds <number>',
    'Abort when substitution closure needs more rounds than this'
  )
  .option(
    '--max-leet-variants <number>',
    'Abort when one candidate has more substitution variants than this'
  )
  .option('--out <format>', 'Output format: text|json', 'text')
  .option('--quiet', 'With --output, do not echo candidates to stdout', false)
  .option('--print-metrics', 'Print pipeline metrics as JSON to stderr', false)
  .option('--no-metrics', 'Disable stage timings and counters')
  .option('--debug-passes', 'Print effective configuration to stderr')
  .action((options: CliOptions) => {
    try {
      runGenerate(options);
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

function toPassmithError(err: unknown): PassmithError {
  if (isPassmithError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(message, err instanceof Error ? err : undefined);
}

function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = toPassmithError(err);
  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program, handleCliError, toPassmithError };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
